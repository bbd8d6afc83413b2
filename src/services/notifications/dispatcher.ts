/**
 * Notification Dispatcher
 *
 * Delivers a rendered notification: one direct message to the linked Seerr
 * user when there is one, otherwise a single post to the shared notification
 * channel. A failed DM falls back to the channel immediately; only Discord
 * rate limits are waited out and retried.
 */

import type {
  DeliveryOutcome,
  DiscordMessenger,
  RenderedMessage,
} from '@root/types/discord.types.js'
import { DeliveryError } from '@root/types/errors.js'
import type { Link } from '@root/types/link.types.js'
import type {
  NotificationEvent,
  NotificationEventType,
} from '@root/types/notification.types.js'
import { withRateLimitBackoff } from '@utils/discord/rate-limit.js'
import type { FastifyBaseLogger } from 'fastify'

export interface LinkLookup {
  findByDiscordId(discordId: string): Promise<Link | null>
  findBySeerrUsername(seerrUsername: string): Promise<Link | null>
}

export interface DispatcherDeps {
  links: LinkLookup
  messenger: DiscordMessenger
  channelId: string
  log: FastifyBaseLogger
  /** Rate-limit retries per send */
  maxRetries: number
  sleep?: (ms: number) => Promise<void>
}

// Events meant for administrators rather than the requester
const CHANNEL_ONLY_TYPES: ReadonlySet<NotificationEventType> = new Set([
  'request-pending',
  'request-auto-approved',
  'request-failed',
  'issue-reported',
  'test',
])

export function isUserAudience(type: NotificationEventType): boolean {
  return !CHANNEL_ONLY_TYPES.has(type)
}

function unique(values: Array<string | undefined>): string[] {
  return [...new Set(values.filter((value): value is string => !!value))]
}

/**
 * Discord IDs and Seerr usernames that may identify the recipient, most
 * specific first. The commenter is never the target of their own comment.
 */
export function recipientCandidates(event: NotificationEvent): {
  discordIds: string[]
  usernames: string[]
} {
  const { notifyUser, request, issue } = event

  if (event.category === 'request') {
    return {
      discordIds: unique([notifyUser.discordId, request.requestedBy.discordId]),
      usernames: unique([notifyUser.username, request.requestedBy.username]),
    }
  }

  if (event.category === 'issue') {
    return {
      discordIds: unique([notifyUser.discordId, issue.reportedBy.discordId]),
      usernames: unique([notifyUser.username, issue.reportedBy.username]),
    }
  }

  return {
    discordIds: unique([notifyUser.discordId]),
    usernames: unique([notifyUser.username]),
  }
}

/**
 * Finds the linked Discord account an event is addressed to. A Discord ID in
 * the payload only counts when it is linked; Seerr usernames are tried after
 * every ID.
 */
export async function resolveRecipient(
  event: NotificationEvent,
  links: LinkLookup,
): Promise<string | null> {
  const { discordIds, usernames } = recipientCandidates(event)

  for (const discordId of discordIds) {
    const link = await links.findByDiscordId(discordId)
    if (link) return link.discordId
  }

  for (const username of usernames) {
    const link = await links.findBySeerrUsername(username)
    if (link) return link.discordId
  }

  return null
}

export class NotificationDispatcher {
  constructor(private readonly deps: DispatcherDeps) {}

  async dispatch(
    event: NotificationEvent,
    rendered: RenderedMessage,
  ): Promise<DeliveryOutcome> {
    const { log } = this.deps
    const recipient = isUserAudience(event.type)
      ? await this.findRecipient(event)
      : null

    if (recipient) {
      try {
        await withRateLimitBackoff(
          () => this.deps.messenger.sendDirectMessage(recipient, rendered),
          {
            maxRetries: this.deps.maxRetries,
            log,
            label: `DM to ${recipient}`,
            sleep: this.deps.sleep,
          },
        )
        log.info(
          { recipient, type: event.type },
          `Sent "${rendered.title}" by direct message`,
        )
        return {
          dmSent: true,
          channelFallbackUsed: false,
          channelSent: false,
          recipient,
        }
      } catch (cause) {
        log.warn(
          { error: new DeliveryError(recipient, { cause }), type: event.type },
          'Direct message failed, falling back to notification channel',
        )
      }
    } else {
      log.debug(
        { type: event.type },
        'No linked recipient, posting to notification channel',
      )
    }

    const channelSent = await this.postToChannel(event, rendered)
    return {
      dmSent: false,
      channelFallbackUsed: true,
      channelSent,
      recipient,
    }
  }

  private async findRecipient(
    event: NotificationEvent,
  ): Promise<string | null> {
    try {
      return await resolveRecipient(event, this.deps.links)
    } catch (error) {
      // The webhook is already acknowledged; the channel still gets the event
      this.deps.log.error(
        { error, type: event.type },
        'Link lookup failed while resolving recipient',
      )
      return null
    }
  }

  private async postToChannel(
    event: NotificationEvent,
    rendered: RenderedMessage,
  ): Promise<boolean> {
    const { channelId, log, messenger } = this.deps
    try {
      await withRateLimitBackoff(
        () => messenger.sendChannelMessage(channelId, rendered),
        {
          maxRetries: this.deps.maxRetries,
          log,
          label: `Post to channel ${channelId}`,
          sleep: this.deps.sleep,
        },
      )
      log.info(
        { channelId, type: event.type },
        `Posted "${rendered.title}" to notification channel`,
      )
      return true
    } catch (error) {
      log.error(
        { error, channelId, type: event.type },
        'Failed to post notification to channel; event dropped',
      )
      return false
    }
  }
}
