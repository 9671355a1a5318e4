import { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('notifications', (table) => {
    table.increments('id').primary();
    table.integer('recipient_id').notNullable();
    table.string('kind', 50).notNullable();
    table.integer('challenge_id').notNullable();
    table.integer('participation_id').notNullable();
    table.timestamp('read_at').nullable();
    table.timestamp('created_at').notNullable().defaultTo(knex.fn.now());

    table.foreign('challenge_id').references('id').inTable('challenges').onDelete('CASCADE');
    table
      .foreign('participation_id')
      .references('id')
      .inTable('participations')
      .onDelete('CASCADE');

    table.index(['recipient_id', 'created_at']);

    // Retried jobs must not notify twice
    table.unique(['kind', 'participation_id']);
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('notifications');
}
