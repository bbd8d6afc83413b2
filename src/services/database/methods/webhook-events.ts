import type { DeliveryOutcome } from '@root/types/discord.types.js'
import type {
  WebhookEventCounts,
  WebhookEventCreate,
  WebhookEventRecord,
} from '@root/types/webhook.types.js'
import type { DatabaseService } from '@services/database.service.js'

interface WebhookEventRow {
  id: number
  event_type: string
  raw_type: string
  seerr_username: string | null
  payload: string
  processed: boolean | number
  sent_dm: boolean | number
  sent_channel: boolean | number
  recipient: string | null
  created_at: string
  processed_at: string | null
}

interface WebhookEventTotalsRow {
  total: number | string
  processed: number | string
  sent_dm: number | string
  sent_channel: number | string
}

function mapRowToWebhookEvent(row: WebhookEventRow): WebhookEventRecord {
  return {
    id: row.id,
    eventType: row.event_type,
    rawType: row.raw_type,
    seerrUsername: row.seerr_username,
    processed: Boolean(row.processed),
    sentDm: Boolean(row.sent_dm),
    sentChannel: Boolean(row.sent_channel),
    recipient: row.recipient,
    createdAt: row.created_at,
    processedAt: row.processed_at,
  }
}

/**
 * Stores an accepted webhook with its raw payload. Runs before the HTTP
 * acknowledgement, so a failure here is reported to Seerr as a 500.
 */
export async function logWebhookEvent(
  this: DatabaseService,
  event: WebhookEventCreate,
): Promise<number> {
  const result = await this.knex('webhook_events')
    .insert({
      event_type: event.eventType,
      raw_type: event.rawType,
      seerr_username: event.seerrUsername,
      payload: JSON.stringify(event.payload),
      processed: false,
      sent_dm: false,
      sent_channel: false,
      created_at: this.timestamp,
    })
    .returning('id')

  return this.extractId(result)
}

export async function markWebhookEventProcessed(
  this: DatabaseService,
  id: number,
  outcome: DeliveryOutcome,
): Promise<void> {
  await this.knex('webhook_events').where('id', id).update({
    processed: true,
    sent_dm: outcome.dmSent,
    sent_channel: outcome.channelSent,
    recipient: outcome.recipient,
    processed_at: this.timestamp,
  })
}

export async function getRecentWebhookEvents(
  this: DatabaseService,
  limit = 10,
): Promise<WebhookEventRecord[]> {
  const rows = await this.knex<WebhookEventRow>('webhook_events')
    .orderBy([
      { column: 'created_at', order: 'desc' },
      { column: 'id', order: 'desc' },
    ])
    .limit(limit)
  return rows.map(mapRowToWebhookEvent)
}

export async function countWebhookEvents(
  this: DatabaseService,
): Promise<WebhookEventCounts> {
  const [row] = await this.knex('webhook_events').select<
    WebhookEventTotalsRow[]
  >(
    this.knex.raw('COUNT(*) AS total'),
    this.knex.raw('COALESCE(SUM(processed), 0) AS processed'),
    this.knex.raw('COALESCE(SUM(sent_dm), 0) AS sent_dm'),
    this.knex.raw('COALESCE(SUM(sent_channel), 0) AS sent_channel'),
  )

  return {
    total: Number(row?.total || 0),
    processed: Number(row?.processed || 0),
    sentDm: Number(row?.sent_dm || 0),
    sentChannel: Number(row?.sent_channel || 0),
  }
}
