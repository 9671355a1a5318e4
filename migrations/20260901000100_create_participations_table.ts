import { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('participations', (table) => {
    table.increments('id').primary();
    table.integer('user_id').notNullable();
    table.integer('challenge_id').notNullable();
    table
      .string('acceptation_status', 20)
      .notNullable()
      .defaultTo('pending')
      .checkIn(['pending', 'accepted', 'rejected'], 'participations_acceptation_status_check');
    table.timestamp('accepted_at').nullable();
    table.timestamp('created_at').notNullable().defaultTo(knex.fn.now());
    table.timestamp('updated_at').notNullable().defaultTo(knex.fn.now());

    table.foreign('challenge_id').references('id').inTable('challenges').onDelete('CASCADE');

    table.index('challenge_id');
    table.index('user_id');

    // One participation per user per challenge, backs the check done before insert
    table.unique(['user_id', 'challenge_id']);
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('participations');
}
