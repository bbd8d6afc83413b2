import type { Knex } from 'knex'
import * as createSeerrLinks from './migrations/001_create_seerr_links.js'
import * as createWebhookEvents from './migrations/002_create_webhook_events.js'

interface NamedMigration {
  name: string
  migration: Knex.Migration
}

const migrations: NamedMigration[] = [
  { name: '001_create_seerr_links', migration: createSeerrLinks },
  { name: '002_create_webhook_events', migration: createWebhookEvents },
]

/**
 * Migrations compiled into the application, so the schema can be brought up
 * to date from the built output without a migrations directory on disk.
 */
export const migrationSource: Knex.MigrationSource<NamedMigration> = {
  getMigrations: async () => migrations,
  getMigrationName: (entry) => entry.name,
  getMigration: async (entry) => entry.migration,
}
