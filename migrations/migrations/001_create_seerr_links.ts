import type { Knex } from 'knex'

export async function up(knex: Knex): Promise<void> {
  // Uniqueness is enforced by the store inside a transaction. Rows written
  // before that existed may still share a side, which findConflicts reports.
  await knex.schema.createTable('seerr_links', (table) => {
    table.increments('id').primary()
    table.string('discord_id').notNullable()
    table.string('seerr_username').notNullable()
    table.integer('seerr_user_id').nullable()
    table.string('linked_by').notNullable().defaultTo('self')
    table.timestamp('linked_at').notNullable()
    table.index('discord_id')
    table.index('seerr_username')
  })
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('seerr_links')
}
