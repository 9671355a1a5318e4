import { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('challenges', (table) => {
    table.increments('id').primary();
    table.string('title', 255).notNullable();
    table.text('description').notNullable().defaultTo('');
    table.integer('creator_id').notNullable();
    table.boolean('open').notNullable().defaultTo(false);
    table.boolean('sponsored').notNullable().defaultTo(false);
    table.integer('participations_count').notNullable().defaultTo(0);
    table.timestamp('submission_ends_at').nullable();
    table.string('invitation_token', 64).notNullable().unique();
    table
      .string('status', 20)
      .notNullable()
      .defaultTo('open')
      .checkIn(['open', 'full', 'closed'], 'challenges_status_check');
    table.timestamp('created_at').notNullable().defaultTo(knex.fn.now());
    table.timestamp('updated_at').notNullable().defaultTo(knex.fn.now());

    table.index('creator_id');
    table.index('status');
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('challenges');
}
