import type {
  DiscordMessenger,
  RenderedMessage,
} from '@root/types/discord.types.js'
import type { Link } from '@root/types/link.types.js'
import {
  isUserAudience,
  type LinkLookup,
  NotificationDispatcher,
  recipientCandidates,
  resolveRecipient,
} from '@services/notifications/dispatcher.js'
import { normalizeWebhookPayload } from '@services/notifications/webhook/normalize.js'
import { RateLimitError } from 'discord.js'
import { describe, expect, it, vi } from 'vitest'
import { createMockLogger } from '../../../mocks/logger.js'

const CHANNEL_ID = '900000000000000001'

const rendered: RenderedMessage = {
  title: 'Movie Request Now Available',
  description: 'Dune (2021)',
  color: 0x2ecc71,
  imageUrl: null,
  author: null,
  fields: [],
  buttons: [],
  timestamp: '2026-01-15T12:00:00.000Z',
}

function link(discordId: string, seerrUsername: string): Link {
  return {
    id: 1,
    discordId,
    seerrUsername,
    seerrUserId: null,
    linkedAt: '2026-01-01T00:00:00.000Z',
    linkedBy: 'self',
  }
}

function fakeLinks(...links: Link[]): LinkLookup {
  return {
    findByDiscordId: async (discordId) =>
      links.find((l) => l.discordId === discordId) ?? null,
    findBySeerrUsername: async (username) =>
      links.find(
        (l) => l.seerrUsername.toLowerCase() === username.toLowerCase(),
      ) ?? null,
  }
}

function fakeMessenger() {
  return {
    sendDirectMessage: vi.fn<DiscordMessenger['sendDirectMessage']>(
      async () => {},
    ),
    sendChannelMessage: vi.fn<DiscordMessenger['sendChannelMessage']>(
      async () => {},
    ),
  }
}

function rateLimitError(): RateLimitError {
  return new RateLimitError({
    timeToReset: 50,
    limit: 5,
    method: 'POST',
    hash: 'test-hash',
    url: 'https://discord.test/api/v10/channels/1/messages',
    route: '/channels/:id/messages',
    majorParameter: '1',
    global: false,
    retryAfter: 50,
    sublimitTimeout: 0,
    scope: 'user',
  })
}

const availableEvent = (extra: Record<string, unknown> = {}) =>
  normalizeWebhookPayload({
    notification_type: 'MEDIA_AVAILABLE',
    subject: 'Dune (2021)',
    notifyuser_username: 'alice',
    notifyuser_settings_discordId: '123',
    ...extra,
  })

function createDispatcher(links: LinkLookup, maxRetries = 0) {
  const messenger = fakeMessenger()
  const log = createMockLogger()
  const dispatcher = new NotificationDispatcher({
    links,
    messenger,
    channelId: CHANNEL_ID,
    log,
    maxRetries,
    sleep: async () => {},
  })
  return { dispatcher, messenger, log }
}

describe('NotificationDispatcher', () => {
  it('should send exactly one direct message to a linked recipient', async () => {
    const { dispatcher, messenger } = createDispatcher(
      fakeLinks(link('123', 'alice')),
    )

    const outcome = await dispatcher.dispatch(availableEvent(), rendered)

    expect(messenger.sendDirectMessage).toHaveBeenCalledTimes(1)
    expect(messenger.sendDirectMessage).toHaveBeenCalledWith('123', rendered)
    expect(messenger.sendChannelMessage).not.toHaveBeenCalled()
    expect(outcome).toEqual({
      dmSent: true,
      channelFallbackUsed: false,
      channelSent: false,
      recipient: '123',
    })
  })

  it('should post once to the channel when nobody is linked', async () => {
    const { dispatcher, messenger } = createDispatcher(fakeLinks())

    const outcome = await dispatcher.dispatch(availableEvent(), rendered)

    expect(messenger.sendDirectMessage).not.toHaveBeenCalled()
    expect(messenger.sendChannelMessage).toHaveBeenCalledTimes(1)
    expect(messenger.sendChannelMessage).toHaveBeenCalledWith(
      CHANNEL_ID,
      rendered,
    )
    expect(outcome).toEqual({
      dmSent: false,
      channelFallbackUsed: true,
      channelSent: true,
      recipient: null,
    })
  })

  it('should fall back to the channel after a single failed DM', async () => {
    const { dispatcher, messenger, log } = createDispatcher(
      fakeLinks(link('123', 'alice')),
      3,
    )
    messenger.sendDirectMessage.mockRejectedValue(
      new Error('Cannot send messages to this user'),
    )

    const outcome = await dispatcher.dispatch(availableEvent(), rendered)

    expect(messenger.sendDirectMessage).toHaveBeenCalledTimes(1)
    expect(messenger.sendChannelMessage).toHaveBeenCalledTimes(1)
    expect(outcome).toEqual({
      dmSent: false,
      channelFallbackUsed: true,
      channelSent: true,
      recipient: '123',
    })
    expect(log.warn).toHaveBeenCalledWith(
      expect.objectContaining({ type: 'request-available' }),
      'Direct message failed, falling back to notification channel',
    )
  })

  it('should retry a rate-limited DM before succeeding', async () => {
    const { dispatcher, messenger } = createDispatcher(
      fakeLinks(link('123', 'alice')),
      2,
    )
    messenger.sendDirectMessage
      .mockRejectedValueOnce(rateLimitError())
      .mockResolvedValueOnce(undefined)

    const outcome = await dispatcher.dispatch(availableEvent(), rendered)

    expect(messenger.sendDirectMessage).toHaveBeenCalledTimes(2)
    expect(messenger.sendChannelMessage).not.toHaveBeenCalled()
    expect(outcome.dmSent).toBe(true)
  })

  it('should post admin-facing events to the channel even when linked', async () => {
    const { dispatcher, messenger } = createDispatcher(
      fakeLinks(link('123', 'alice')),
    )

    await dispatcher.dispatch(
      availableEvent({ notification_type: 'MEDIA_PENDING' }),
      rendered,
    )

    expect(messenger.sendDirectMessage).not.toHaveBeenCalled()
    expect(messenger.sendChannelMessage).toHaveBeenCalledTimes(1)
  })

  it('should report a channel post that fails', async () => {
    const { dispatcher, messenger, log } = createDispatcher(fakeLinks())
    messenger.sendChannelMessage.mockRejectedValue(new Error('Missing Access'))

    const outcome = await dispatcher.dispatch(availableEvent(), rendered)

    expect(outcome).toEqual({
      dmSent: false,
      channelFallbackUsed: true,
      channelSent: false,
      recipient: null,
    })
    expect(log.error).toHaveBeenCalledWith(
      expect.objectContaining({ channelId: CHANNEL_ID }),
      'Failed to post notification to channel; event dropped',
    )
  })

  it('should still post to the channel when the link lookup fails', async () => {
    const { dispatcher, messenger } = createDispatcher({
      findByDiscordId: async () => {
        throw new Error('database is locked')
      },
      findBySeerrUsername: async () => null,
    })

    const outcome = await dispatcher.dispatch(availableEvent(), rendered)

    expect(messenger.sendChannelMessage).toHaveBeenCalledTimes(1)
    expect(outcome.recipient).toBeNull()
  })
})

describe('resolveRecipient', () => {
  it('should ignore a payload Discord ID that is not linked', async () => {
    const recipient = await resolveRecipient(
      availableEvent({ notifyuser_settings_discordId: '999' }),
      fakeLinks(link('123', 'alice')),
    )

    expect(recipient).toBe('123')
  })

  it('should match the requester when notifyuser is missing', async () => {
    const event = normalizeWebhookPayload({
      notification_type: 'MEDIA_DECLINED',
      requestedBy_username: 'Bob',
    })

    expect(await resolveRecipient(event, fakeLinks(link('456', 'bob')))).toBe(
      '456',
    )
  })

  it('should return null when no candidate is linked', async () => {
    expect(
      await resolveRecipient(availableEvent(), fakeLinks(link('456', 'bob'))),
    ).toBeNull()
  })
})

describe('recipientCandidates', () => {
  it('should use the reporter for issue events and drop duplicates', () => {
    const event = normalizeWebhookPayload({
      notification_type: 'ISSUE_RESOLVED',
      notifyuser_username: 'alice',
      reportedBy_username: 'alice',
      reportedBy_settings_discordId: '123',
      commentedBy_username: 'owner',
    })

    expect(recipientCandidates(event)).toEqual({
      discordIds: ['123'],
      usernames: ['alice'],
    })
  })
})

describe('isUserAudience', () => {
  it('should keep pending and failed requests in the channel', () => {
    expect(isUserAudience('request-available')).toBe(true)
    expect(isUserAudience('issue-comment')).toBe(true)
    expect(isUserAudience('request-pending')).toBe(false)
    expect(isUserAudience('request-failed')).toBe(false)
    expect(isUserAudience('test')).toBe(false)
  })
})
