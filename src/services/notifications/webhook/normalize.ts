import {
  type SeerrWebhookPayload,
  SeerrWebhookPayloadSchema,
} from '@root/schemas/webhook/seerr-webhook.schema.js'
import type {
  NotificationCategory,
  NotificationEvent,
  NotificationEventType,
} from '@root/types/notification.types.js'

const EVENT_TYPES: Record<string, NotificationEventType> = {
  MEDIA_PENDING: 'request-pending',
  MEDIA_AUTO_APPROVED: 'request-auto-approved',
  MEDIA_APPROVED: 'request-approved',
  MEDIA_DECLINED: 'request-declined',
  MEDIA_AVAILABLE: 'request-available',
  MEDIA_FAILED: 'request-failed',
  ISSUE_CREATED: 'issue-reported',
  ISSUE_COMMENT: 'issue-comment',
  ISSUE_RESOLVED: 'issue-resolved',
  ISSUE_REOPENED: 'issue-reopened',
  TEST_NOTIFICATION: 'test',
}

// Keys inside Seerr's default nested "media" object that differ from the
// flat template variable names
const MEDIA_KEY_ALIASES: Record<string, string> = {
  tmdbId: 'media_tmdbid',
  tvdbId: 'media_tvdbid',
  status: 'media_status',
  status4k: 'media_status4k',
}

const NESTED_SECTIONS = ['media', 'request', 'issue', 'comment'] as const

export function isPlainObject(
  value: unknown,
): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Lifts the nested `media`, `request`, `issue` and `comment` objects of
 * Seerr's default JSON template to the flat variable names. A flat key
 * already present in the payload is kept.
 */
export function flattenPayload(
  payload: Record<string, unknown>,
): Record<string, unknown> {
  const flat: Record<string, unknown> = { ...payload }

  for (const section of NESTED_SECTIONS) {
    const nested = payload[section]
    if (!isPlainObject(nested)) continue

    for (const [key, value] of Object.entries(nested)) {
      const target =
        section === 'media' ? (MEDIA_KEY_ALIASES[key] ?? key) : key
      if (flat[target] === undefined) {
        flat[target] = value
      }
    }
  }

  return flat
}

export function resolveEventType(rawType: string): NotificationEventType {
  return EVENT_TYPES[rawType.trim().toUpperCase()] ?? 'generic'
}

export function categoryOf(type: NotificationEventType): NotificationCategory {
  if (type === 'test' || type === 'generic') return type
  return type.startsWith('issue-') ? 'issue' : 'request'
}

function toEvent(
  payload: SeerrWebhookPayload,
  receivedAt: string,
): NotificationEvent {
  const rawType = payload.notification_type ?? 'UNKNOWN'
  const type = resolveEventType(rawType)

  return {
    type,
    rawType,
    category: categoryOf(type),
    receivedAt,
    event: payload.event,
    subject: payload.subject,
    message: payload.message,
    imageUrl: payload.image,
    notifyUser: {
      username: payload.notifyuser_username,
      email: payload.notifyuser_email,
      avatar: payload.notifyuser_avatar,
      discordId: payload.notifyuser_settings_discordId,
    },
    media: {
      mediaType: payload.media_type,
      tmdbId: payload.media_tmdbid,
      tvdbId: payload.media_tvdbid,
      status: payload.media_status,
      status4k: payload.media_status4k,
    },
    request: {
      id: payload.request_id,
      requestedBy: {
        username: payload.requestedBy_username,
        email: payload.requestedBy_email,
        avatar: payload.requestedBy_avatar,
        discordId: payload.requestedBy_settings_discordId,
      },
    },
    issue: {
      id: payload.issue_id,
      type: payload.issue_type,
      status: payload.issue_status,
      reportedBy: {
        username: payload.reportedBy_username,
        email: payload.reportedBy_email,
        avatar: payload.reportedBy_avatar,
        discordId: payload.reportedBy_settings_discordId,
      },
    },
    comment: {
      message: payload.comment_message,
      commentedBy: {
        username: payload.commentedBy_username,
        email: payload.commentedBy_email,
        avatar: payload.commentedBy_avatar,
        discordId: payload.commentedBy_settings_discordId,
      },
    },
    extra: payload.extra,
  }
}

/**
 * Builds a NotificationEvent from a decoded webhook body. Never throws:
 * fields that are missing or of the wrong type are left undefined, and an
 * unrecognised notification_type becomes a `generic` event.
 */
export function normalizeWebhookPayload(
  payload: Record<string, unknown>,
  receivedAt: Date = new Date(),
): NotificationEvent {
  // Every field schema catches its own failures, so an object always parses
  const parsed = SeerrWebhookPayloadSchema.parse(flattenPayload(payload))
  return toEvent(parsed, receivedAt.toISOString())
}
