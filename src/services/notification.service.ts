/**
 * Notification Service
 *
 * Thin orchestrator that owns the Discord bot and the dispatcher.
 * Turns accepted webhook events into Discord messages and records the
 * delivery outcome against the stored event.
 */

import type { DeliveryOutcome } from '@root/types/discord.types.js'
import type { NotificationEvent } from '@root/types/notification.types.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger, FastifyInstance } from 'fastify'
import {
  type BotStatus,
  DiscordBotService,
} from './notifications/discord-bot/bot.service.js'
import { NotificationDispatcher } from './notifications/dispatcher.js'
import { formatNotification } from './notifications/templates/seerr-embeds.js'

/**
 * Notification Service
 *
 * Single decoration point: fastify.notifications
 */
export class NotificationService {
  private readonly log: FastifyBaseLogger
  private readonly _discordBot: DiscordBotService
  private readonly dispatcher: NotificationDispatcher

  constructor(
    readonly baseLog: FastifyBaseLogger,
    private readonly fastify: FastifyInstance,
  ) {
    this.log = createServiceLogger(baseLog, 'NOTIFICATIONS')
    this.log.debug('Initializing notification service')

    this._discordBot = new DiscordBotService(this.log, this.fastify)
    this.dispatcher = new NotificationDispatcher({
      links: this.fastify.db,
      messenger: this._discordBot,
      channelId: this.fastify.config.notificationChannelId,
      log: this.log,
      maxRetries: this.fastify.config.dmRateLimitRetries,
    })
  }

  /**
   * Discord bot accessor for bot lifecycle and status.
   */
  get discordBot(): DiscordBotService {
    return this._discordBot
  }

  getBotStatus(): BotStatus {
    return this._discordBot.getBotStatus()
  }

  async initialize(): Promise<void> {
    const started = await this._discordBot.startBot()
    if (!started) {
      this.log.error(
        'Discord bot did not start; notifications cannot be delivered',
      )
    }
  }

  async shutdown(): Promise<void> {
    await this._discordBot.stopBot()
  }

  /**
   * Renders and delivers one stored webhook event, then marks it processed.
   */
  async process(
    event: NotificationEvent,
    eventId: number,
  ): Promise<DeliveryOutcome> {
    const rendered = formatNotification(event, {
      seerrUrl: this.fastify.config.seerrUrl,
    })

    const outcome = await this.dispatcher.dispatch(event, rendered)
    await this.fastify.db.markWebhookEventProcessed(eventId, outcome)

    this.log.debug(
      { eventId, type: event.type, ...outcome },
      'Webhook event processed',
    )
    return outcome
  }
}
