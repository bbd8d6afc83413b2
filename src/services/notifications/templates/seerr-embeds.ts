/**
 * Notification Templates
 *
 * Turns a NotificationEvent into a RenderedMessage. The mapping depends only
 * on the event and the Seerr URL, and every optional field has a placeholder,
 * so rendering cannot fail.
 */

import type {
  EmbedField,
  LinkButton,
  RenderedMessage,
} from '@root/types/discord.types.js'
import type {
  NotificationEvent,
  NotificationEventType,
  SeerrUserRef,
} from '@root/types/notification.types.js'

export interface FormatOptions {
  /** Seerr base URL without trailing slash */
  seerrUrl: string
}

// Discord embed limits
export const EMBED_LIMITS = {
  title: 256,
  description: 4096,
  fieldName: 256,
  fieldValue: 1024,
  fields: 25,
} as const

export const EMBED_COLORS = {
  orange: 0xe67e22,
  purple: 0x9b59b6,
  red: 0xe74c3c,
  green: 0x2ecc71,
  blue: 0x3498db,
  gold: 0xf1c40f,
  grey: 0x95a5a6,
} as const

const TYPE_COLORS: Record<NotificationEventType, number> = {
  'request-pending': EMBED_COLORS.orange,
  'request-auto-approved': EMBED_COLORS.purple,
  'request-approved': EMBED_COLORS.purple,
  'request-declined': EMBED_COLORS.red,
  'request-available': EMBED_COLORS.green,
  'request-failed': EMBED_COLORS.red,
  'issue-reported': EMBED_COLORS.red,
  'issue-comment': EMBED_COLORS.blue,
  'issue-resolved': EMBED_COLORS.green,
  'issue-reopened': EMBED_COLORS.gold,
  test: EMBED_COLORS.blue,
  generic: EMBED_COLORS.grey,
}

const REQUEST_STATUS_LABELS: Partial<Record<NotificationEventType, string>> = {
  'request-pending': 'Pending Approval',
  'request-auto-approved': 'Processing',
  'request-approved': 'Processing',
  'request-declined': 'Declined',
  'request-available': 'Available',
  'request-failed': 'Failed',
}

export const UNKNOWN = 'Unknown'
export const UNKNOWN_TITLE = 'Unknown Title'

/**
 * Clips to `max` UTF-16 units, ellipsis included, without splitting a
 * surrogate pair.
 */
export function truncate(text: string, max: number): string {
  if (text.length <= max) return text
  let clipped = ''
  for (const char of text) {
    if (clipped.length + char.length > max - 3) break
    clipped += char
  }
  return `${clipped}...`
}

function field(name: string, value: string, inline = true): EmbedField {
  return {
    name: truncate(name, EMBED_LIMITS.fieldName),
    value: truncate(value || UNKNOWN, EMBED_LIMITS.fieldValue),
    inline,
  }
}

function userName(...refs: SeerrUserRef[]): string {
  for (const ref of refs) {
    if (ref.username) return ref.username
    if (ref.email) return ref.email
  }
  return UNKNOWN
}

function authorOf(ref: SeerrUserRef): RenderedMessage['author'] {
  const name = ref.username ?? ref.email
  return name ? { name, iconUrl: ref.avatar ?? null } : null
}

/**
 * Seerr page of the media, e.g. https://seerr.example/movie/603, when the
 * payload names both the media type and its TMDB ID.
 */
export function mediaUrl(
  event: NotificationEvent,
  seerrUrl: string,
): string | null {
  const { mediaType, tmdbId } = event.media
  if (!tmdbId || (mediaType !== 'movie' && mediaType !== 'tv')) return null
  return `${seerrUrl}/${mediaType}/${tmdbId}`
}

function subjectLine(event: NotificationEvent, seerrUrl: string): string {
  const subject = event.subject ?? UNKNOWN_TITLE
  const url = mediaUrl(event, seerrUrl)
  const heading = url ? `[${subject}](${url})` : subject
  return event.message ? `${heading}\n\n${event.message}` : heading
}

function extraValues(event: NotificationEvent, keyword: string): string[] {
  return event.extra
    .filter((item) => item.name.toLowerCase().includes(keyword))
    .map((item) => item.value)
    .filter((value) => value !== '')
}

function renderRequest(
  event: NotificationEvent,
  options: FormatOptions,
): Omit<RenderedMessage, 'timestamp' | 'color'> {
  const requester = event.request.requestedBy
  const fields: EmbedField[] = [
    field('Requested By', userName(requester, event.notifyUser)),
  ]

  if (event.media.mediaType === 'tv') {
    const seasons = extraValues(event, 'season')
    if (seasons.length > 0) {
      fields.push(field('Requested Seasons', seasons.join(', ')))
    }
  }

  fields.push(
    field('Request Status', REQUEST_STATUS_LABELS[event.type] ?? UNKNOWN),
  )

  if (event.type === 'request-failed') {
    const details = event.extra
      .filter((item) => !item.name.toLowerCase().includes('season'))
      .map((item) => `${item.name}: ${item.value}`)
    if (details.length > 0) {
      fields.push(field('Error', details.join('\n'), false))
    }
  }

  const buttons: LinkButton[] = [
    {
      label: 'View Request',
      url: mediaUrl(event, options.seerrUrl) ?? `${options.seerrUrl}/requests`,
    },
  ]

  return {
    title: event.event ?? 'Request Update',
    description: subjectLine(event, options.seerrUrl),
    imageUrl: event.imageUrl ?? null,
    author: authorOf(requester.username ? requester : event.notifyUser),
    fields,
    buttons,
  }
}

function renderIssue(
  event: NotificationEvent,
  options: FormatOptions,
): Omit<RenderedMessage, 'timestamp' | 'color'> {
  const { issue, comment } = event
  const fields: EmbedField[] = [
    field('Issue', event.message ?? UNKNOWN, false),
    field('Reported By', userName(issue.reportedBy, event.notifyUser)),
    field('Issue Type', issue.type ?? UNKNOWN),
    field(
      'Issue Status',
      issue.status ?? (event.type === 'issue-resolved' ? 'Resolved' : 'Open'),
    ),
  ]

  const seasons = extraValues(event, 'season')
  if (seasons.length > 0) {
    fields.push(field('Affected Season', seasons.join(', ')))
  }
  const episodes = extraValues(event, 'episode')
  if (episodes.length > 0) {
    fields.push(field('Affected Episode', episodes.join(', ')))
  }

  if (event.type === 'issue-comment') {
    fields.push(
      field(
        `Comment from ${userName(comment.commentedBy)}`,
        comment.message ?? UNKNOWN,
        false,
      ),
    )
  }

  const buttons: LinkButton[] = issue.id
    ? [{ label: 'View Issue', url: `${options.seerrUrl}/issues/${issue.id}` }]
    : []

  const author =
    event.type === 'issue-comment'
      ? authorOf(comment.commentedBy)
      : authorOf(issue.reportedBy)

  return {
    title: event.event ?? 'Issue Update',
    description: subjectLine(event, options.seerrUrl),
    imageUrl: event.imageUrl ?? null,
    author,
    fields,
    buttons,
  }
}

function renderTest(
  event: NotificationEvent,
): Omit<RenderedMessage, 'timestamp' | 'color'> {
  return {
    title: 'Test Notification',
    description: event.message ?? 'Seerr webhook test received.',
    imageUrl: event.imageUrl ?? null,
    author: null,
    fields: [],
    buttons: [],
  }
}

function renderGeneric(
  event: NotificationEvent,
): Omit<RenderedMessage, 'timestamp' | 'color'> {
  const fields: EmbedField[] = [field('Notification Type', event.rawType)]
  const user = userName(event.notifyUser)
  if (user !== UNKNOWN) {
    fields.push(field('User', user))
  }

  return {
    title: event.event ?? event.subject ?? 'Seerr Notification',
    description: event.message ?? event.subject ?? '',
    imageUrl: event.imageUrl ?? null,
    author: null,
    fields,
    buttons: [],
  }
}

/**
 * Renders an event with the template for its category and clips every text
 * to Discord's embed limits.
 */
export function formatNotification(
  event: NotificationEvent,
  options: FormatOptions,
): RenderedMessage {
  const body =
    event.category === 'request'
      ? renderRequest(event, options)
      : event.category === 'issue'
        ? renderIssue(event, options)
        : event.category === 'test'
          ? renderTest(event)
          : renderGeneric(event)

  return {
    ...body,
    title: truncate(body.title, EMBED_LIMITS.title),
    description: truncate(body.description, EMBED_LIMITS.description),
    fields: body.fields.slice(0, EMBED_LIMITS.fields),
    color: TYPE_COLORS[event.type],
    timestamp: event.receivedAt,
  }
}
