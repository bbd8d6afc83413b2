import type { Knex } from 'knex'

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('webhook_events', (table) => {
    table.increments('id').primary()
    table.string('event_type').notNullable()
    table.string('raw_type').notNullable()
    table.string('seerr_username').nullable()
    table.text('payload').notNullable()
    table.boolean('processed').notNullable().defaultTo(false)
    table.boolean('sent_dm').notNullable().defaultTo(false)
    table.boolean('sent_channel').notNullable().defaultTo(false)
    table.string('recipient').nullable()
    table.timestamp('created_at').notNullable()
    table.timestamp('processed_at').nullable()
    table.index('created_at')
    table.index(['processed', 'created_at'])
  })
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('webhook_events')
}
