import { LinkConflictError } from '@root/types/errors.js'
import type {
  ForceLinkResult,
  Link,
  LinkConflict,
  LinkOrigin,
} from '@root/types/link.types.js'
import type { DatabaseService } from '@services/database.service.js'
import type { Knex } from 'knex'

/**
 * Database row representation for the seerr_links table
 */
interface LinkRow {
  id: number
  discord_id: string
  seerr_username: string
  seerr_user_id: number | null
  linked_by: string
  linked_at: string
}

function mapRowToLink(row: LinkRow): Link {
  return {
    id: row.id,
    discordId: row.discord_id,
    seerrUsername: row.seerr_username,
    seerrUserId: row.seerr_user_id,
    linkedAt: row.linked_at,
    linkedBy: row.linked_by === 'admin' ? 'admin' : 'self',
  }
}

function sameUsername(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase()
}

function linksByDiscordId(db: Knex, discordId: string) {
  return db<LinkRow>('seerr_links')
    .where('discord_id', discordId)
    .orderBy([
      { column: 'linked_at', order: 'desc' },
      { column: 'id', order: 'desc' },
    ])
}

function linksBySeerrUsername(
  db: Knex,
  seerrUsername: string,
) {
  return db<LinkRow>('seerr_links')
    .whereRaw('LOWER(seerr_username) = ?', [seerrUsername.toLowerCase()])
    .orderBy([
      { column: 'linked_at', order: 'desc' },
      { column: 'id', order: 'desc' },
    ])
}

/**
 * Links a Discord account to a Seerr account.
 *
 * Both lookups and the insert run in one transaction, so two concurrent
 * writers cannot both pass the uniqueness checks. Linking an identical pair
 * again returns the stored link, refreshing its Seerr user ID if one is given.
 *
 * @throws LinkConflictError when the Discord ID is linked to another Seerr
 * user, or the Seerr user is linked to another Discord ID
 */
export async function upsertLink(
  this: DatabaseService,
  discordId: string,
  seerrUsername: string,
  linkedBy: LinkOrigin,
  seerrUserId: number | null = null,
): Promise<Link> {
  return this.knex.transaction(async (trx) => {
    const byDiscordId = await linksByDiscordId(trx, discordId).first()

    if (byDiscordId) {
      if (!sameUsername(byDiscordId.seerr_username, seerrUsername)) {
        throw new LinkConflictError('discord_id', mapRowToLink(byDiscordId))
      }

      if (seerrUserId !== null && byDiscordId.seerr_user_id !== seerrUserId) {
        await trx('seerr_links')
          .where('id', byDiscordId.id)
          .update({ seerr_user_id: seerrUserId })
        return mapRowToLink({ ...byDiscordId, seerr_user_id: seerrUserId })
      }

      return mapRowToLink(byDiscordId)
    }

    const bySeerrUsername = await linksBySeerrUsername(
      trx,
      seerrUsername,
    ).first()

    if (bySeerrUsername) {
      throw new LinkConflictError(
        'seerr_username',
        mapRowToLink(bySeerrUsername),
      )
    }

    const linkedAt = this.timestamp
    const result = await trx('seerr_links')
      .insert({
        discord_id: discordId,
        seerr_username: seerrUsername,
        seerr_user_id: seerrUserId,
        linked_by: linkedBy,
        linked_at: linkedAt,
      })
      .returning('id')

    return {
      id: this.extractId(result),
      discordId,
      seerrUsername,
      seerrUserId,
      linkedAt,
      linkedBy,
    }
  })
}

/**
 * Admin takeover: removes every link held by the Discord ID or the Seerr
 * username, then inserts the new pair. Readers never see the old and new
 * links side by side.
 */
export async function forceLink(
  this: DatabaseService,
  discordId: string,
  seerrUsername: string,
  seerrUserId: number | null = null,
): Promise<ForceLinkResult> {
  const result = await this.knex.transaction(async (trx) => {
    const previous = await trx<LinkRow>('seerr_links')
      .where('discord_id', discordId)
      .orWhereRaw('LOWER(seerr_username) = ?', [seerrUsername.toLowerCase()])
      .orderBy('id', 'asc')

    if (previous.length > 0) {
      await trx('seerr_links')
        .whereIn(
          'id',
          previous.map((row) => row.id),
        )
        .del()
    }

    const linkedAt = this.timestamp
    const inserted = await trx('seerr_links')
      .insert({
        discord_id: discordId,
        seerr_username: seerrUsername,
        seerr_user_id: seerrUserId,
        linked_by: 'admin',
        linked_at: linkedAt,
      })
      .returning('id')

    const link: Link = {
      id: this.extractId(inserted),
      discordId,
      seerrUsername,
      seerrUserId,
      linkedAt,
      linkedBy: 'admin',
    }

    const displaced = previous
      .filter(
        (row) =>
          row.discord_id !== discordId ||
          !sameUsername(row.seerr_username, seerrUsername),
      )
      .map(mapRowToLink)

    return { link, displaced }
  })

  for (const old of result.displaced) {
    this.log.warn(
      {
        discordId: old.discordId,
        seerrUsername: old.seerrUsername,
        newDiscordId: discordId,
        newSeerrUsername: seerrUsername,
      },
      'Force-link replaced an existing link',
    )
  }

  return result
}

export async function removeLink(
  this: DatabaseService,
  discordId: string,
): Promise<boolean> {
  const deleted = await this.knex('seerr_links')
    .where('discord_id', discordId)
    .del()
  return deleted > 0
}

export async function findByDiscordId(
  this: DatabaseService,
  discordId: string,
): Promise<Link | null> {
  const row = await linksByDiscordId(this.knex, discordId).first()
  return row ? mapRowToLink(row) : null
}

export async function findBySeerrUsername(
  this: DatabaseService,
  seerrUsername: string,
): Promise<Link | null> {
  const row = await linksBySeerrUsername(this.knex, seerrUsername).first()
  return row ? mapRowToLink(row) : null
}

export async function listLinks(
  this: DatabaseService,
  limit?: number,
): Promise<Link[]> {
  const query = this.knex<LinkRow>('seerr_links').orderBy([
    { column: 'linked_at', order: 'desc' },
    { column: 'id', order: 'desc' },
  ])
  if (limit !== undefined) {
    query.limit(limit)
  }
  const rows = await query
  return rows.map(mapRowToLink)
}

export async function countLinks(this: DatabaseService): Promise<number> {
  const result = await this.knex('seerr_links').count('* as count').first()
  return Number(result?.count || 0)
}

/**
 * Reports rows that share a Discord ID or a Seerr username with another row.
 * The store never writes such rows itself; they come from older data or
 * edits made outside the application.
 */
export async function findConflicts(
  this: DatabaseService,
): Promise<LinkConflict[]> {
  const rows = await this.knex<LinkRow>('seerr_links').orderBy('id', 'asc')

  const discordCounts = new Map<string, number>()
  const usernameCounts = new Map<string, number>()
  for (const row of rows) {
    const username = row.seerr_username.toLowerCase()
    discordCounts.set(
      row.discord_id,
      (discordCounts.get(row.discord_id) ?? 0) + 1,
    )
    usernameCounts.set(username, (usernameCounts.get(username) ?? 0) + 1)
  }

  const conflicts: LinkConflict[] = []
  for (const row of rows) {
    if ((discordCounts.get(row.discord_id) ?? 0) > 1) {
      conflicts.push({
        discordId: row.discord_id,
        seerrUsername: row.seerr_username,
        reason: 'duplicate_discord_id',
      })
    } else if (
      (usernameCounts.get(row.seerr_username.toLowerCase()) ?? 0) > 1
    ) {
      conflicts.push({
        discordId: row.discord_id,
        seerrUsername: row.seerr_username,
        reason: 'duplicate_seerr_username',
      })
    }
  }

  return conflicts
}
