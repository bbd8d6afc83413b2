/**
 * Database Service
 *
 * Persistence for the relay, backed by better-sqlite3 through Knex.js:
 * - the link table mapping Discord accounts to Seerr accounts
 * - the log of received webhook events and their delivery outcome
 *
 * Exposed to the application by the 'database' plugin as `fastify.db`.
 * Table-specific operations live in ./database/methods and are mixed into the
 * prototype at the bottom of this file; their signatures are declared in
 * ./database/types.
 *
 * @example
 * const link = await fastify.db.findByDiscordId(interaction.user.id)
 */
import fs from 'node:fs'
import { dirname, resolve } from 'node:path'
import { createServiceLogger } from '@utils/logger.js'
import type BetterSqlite3 from 'better-sqlite3'
import type { FastifyBaseLogger } from 'fastify'
import knex, { type Knex } from 'knex'
import { migrationSource } from '../../migrations/index.js'
import * as linkMethods from './database/methods/links.js'
import * as webhookEventMethods from './database/methods/webhook-events.js'

export class DatabaseService {
  readonly knex: Knex
  readonly log: FastifyBaseLogger

  private constructor(
    baseLog: FastifyBaseLogger,
    readonly databasePath: string,
  ) {
    this.log = createServiceLogger(baseLog, 'DATABASE')
    this.knex = knex(DatabaseService.createKnexConfig(databasePath, this.log))
  }

  /**
   * Opens the database file, creating its directory if needed, and brings
   * the schema up to date.
   *
   * @param databasePath - SQLite file path, relative to the working directory
   */
  static async create(
    baseLog: FastifyBaseLogger,
    databasePath: string,
  ): Promise<DatabaseService> {
    const filename =
      databasePath === ':memory:' ? databasePath : resolve(databasePath)

    if (filename !== ':memory:') {
      fs.mkdirSync(dirname(filename), { recursive: true })
    }

    const service = new DatabaseService(baseLog, filename)
    try {
      await service.migrate()
    } catch (error) {
      await service.close()
      throw error
    }
    return service
  }

  /**
   * Single connection: better-sqlite3 is synchronous, and one connection
   * makes every transaction run in turn. WAL with full sync makes each commit
   * durable before the write resolves.
   */
  private static createKnexConfig(
    filename: string,
    log: FastifyBaseLogger,
  ): Knex.Config {
    return {
      client: 'better-sqlite3',
      connection: {
        filename,
      },
      useNullAsDefault: true,
      pool: {
        min: 1,
        max: 1,
        afterCreate: (
          conn: BetterSqlite3.Database,
          done: (err: Error | null, conn: BetterSqlite3.Database) => void,
        ) => {
          conn.pragma('journal_mode = WAL')
          conn.pragma('synchronous = FULL')
          conn.pragma('busy_timeout = 5000')
          done(null, conn)
        },
      },
      log: {
        warn: (message: string) => log.warn(message),
        error: (message: string | Error) => {
          log.error(message instanceof Error ? message.message : message)
        },
        debug: (message: string) => log.debug(message),
      },
      debug: false,
    }
  }

  private async migrate(): Promise<void> {
    const [batch, applied] = await this.knex.migrate.latest({
      migrationSource,
    })
    if (applied.length > 0) {
      this.log.info({ batch, applied }, 'Applied database migrations')
    }
  }

  /**
   * Closes the database connection
   *
   * Called during application shutdown.
   */
  async close(): Promise<void> {
    await this.knex.destroy()
  }

  /** Round-trip used by the health checks */
  async ping(): Promise<void> {
    await this.knex.raw('SELECT 1')
  }

  get timestamp(): string {
    return new Date().toISOString()
  }

  /**
   * Reads the ID from an insert result, which is `[{ id }]` with RETURNING
   * and `[id]` without it.
   */
  extractId(result: unknown[]): number {
    const first = result[0]
    const id =
      typeof first === 'object' && first !== null && 'id' in first
        ? first.id
        : first
    if (typeof id !== 'number' && typeof id !== 'string') {
      throw new Error('Insert did not return a row ID')
    }
    return Number(id)
  }
}

Object.assign(DatabaseService.prototype, linkMethods, webhookEventMethods)
