/**
 * Discord Bot Service
 *
 * Manages the Discord bot lifecycle (start, stop, status).
 * Coordinates command registry and event routing.
 * Handles DM and channel sending (requires bot client).
 */

import type {
  DiscordMessenger,
  RenderedMessage,
} from '@root/types/discord.types.js'
import { createServiceLogger } from '@utils/logger.js'
import { ActivityType, Client, GatewayIntentBits } from 'discord.js'
import type { FastifyBaseLogger, FastifyInstance } from 'fastify'
import {
  type DiscordSendDeps,
  sendChannelMessage,
  sendDirectMessage,
} from '../channels/discord-dm.js'
import {
  type Command,
  type CommandRegistrationDeps,
  clearCommandsWithDiscord,
  createCommandRegistry,
  registerCommandsWithDiscord,
} from './command-registry.js'
import type {
  BotInfo,
  BotStatus,
  CommandContext,
  CommandSyncResult,
} from './commands/types.js'
import { setupBotEventHandlers } from './event-router.js'

export type { BotStatus }

/**
 * Discord Bot Service
 *
 * Owns the gateway client. Implements the messenger used by the
 * notification dispatcher and the bot view used by admin commands.
 */
export class DiscordBotService implements DiscordMessenger, BotInfo {
  private readonly log: FastifyBaseLogger
  private botClient: Client | null = null
  private botStatus: BotStatus = 'stopped'
  private applicationId: string | null = null
  private readonly commands: Map<string, Command>

  constructor(
    readonly baseLog: FastifyBaseLogger,
    private readonly fastify: FastifyInstance,
  ) {
    this.log = createServiceLogger(baseLog, 'DISCORD')
    this.log.debug('Initializing Discord bot service')

    this.commands = createCommandRegistry(() => this.commandContext())
  }

  private get config() {
    return this.fastify.config
  }

  private commandContext(): CommandContext {
    return {
      db: this.fastify.db,
      seerr: this.fastify.seerr,
      config: this.config,
      log: this.log,
      bot: this,
      commandTable: {
        sync: () => this.syncCommands(),
        reset: () => this.resetCommands(),
      },
    }
  }

  private get sendDeps(): DiscordSendDeps {
    return {
      log: this.log,
      botClient: this.botClient,
      botStatus: this.botStatus,
    }
  }

  private registrationDeps(): CommandRegistrationDeps {
    if (!this.botClient || !this.applicationId) {
      throw new Error(
        `Discord bot is not ready (status: ${this.botStatus})`,
      )
    }

    return {
      log: this.log,
      rest: this.botClient.rest,
      applicationId: this.applicationId,
      guildId: this.config.discordGuildId,
    }
  }

  /**
   * Starts the Discord bot. Commands are registered once the gateway
   * reports ready, since the application ID comes from the login.
   */
  async startBot(): Promise<boolean> {
    if (this.botStatus !== 'stopped') {
      this.log.warn(`Cannot start bot: current status is ${this.botStatus}`)
      return false
    }

    try {
      this.botStatus = 'starting'
      this.log.debug('Initializing Discord bot client')

      this.botClient = new Client({
        intents: [GatewayIntentBits.Guilds],
        // Rate limits on sends surface as errors so the dispatcher can back off
        rest: { rejectOnRateLimit: ['/channels', '/users'] },
      })

      setupBotEventHandlers(this.botClient, {
        log: this.log,
        commands: this.commands,
        onBotReady: (readyClient) => this.onBotReady(readyClient),
      })

      await this.botClient.login(this.config.discordToken)
      this.log.info('Discord bot logged in')
      return true
    } catch (error) {
      this.log.error({ error }, 'Failed to start Discord bot')
      this.botStatus = 'stopped'
      this.botClient = null
      return false
    }
  }

  private async onBotReady(readyClient: Client<true>): Promise<void> {
    this.botStatus = 'running'
    this.applicationId = readyClient.application.id

    readyClient.user.setPresence({
      activities: [{ name: 'Seerr requests', type: ActivityType.Watching }],
      status: 'online',
    })

    try {
      await this.syncCommands()
    } catch (error) {
      this.log.error(
        { error },
        'Slash commands could not be registered; an admin can retry with /sync',
      )
    }

    const seerrOk = await this.fastify.seerr.testConnection()
    if (seerrOk) {
      this.log.info('Seerr API connection verified')
    } else {
      this.log.warn(
        'Seerr API is unreachable; linking and admin checks will fail',
      )
    }
  }

  /**
   * Stops the Discord bot.
   */
  async stopBot(): Promise<boolean> {
    if (this.botStatus !== 'running' && this.botStatus !== 'starting') {
      this.log.debug(`Bot not running (status: ${this.botStatus})`)
      return false
    }

    try {
      this.log.info('Stopping Discord bot')
      this.botStatus = 'stopping'

      if (this.botClient) {
        await this.botClient.destroy()
      }

      this.log.info('Discord bot stopped successfully')
      return true
    } catch (error) {
      this.log.error({ error }, 'Error stopping Discord bot')
      return false
    } finally {
      this.botStatus = 'stopped'
      this.botClient = null
      this.applicationId = null
    }
  }

  getBotStatus(): BotStatus {
    return this.botStatus
  }

  getLatencyMs(): number | null {
    const ping = this.botClient?.ws.ping
    return ping === undefined || ping < 0 ? null : ping
  }

  getUptimeMs(): number | null {
    return this.botClient?.uptime ?? null
  }

  async canReachChannel(channelId: string): Promise<boolean> {
    if (!this.botClient || this.botStatus !== 'running') return false
    const channel = await this.botClient.channels.fetch(channelId)
    return channel !== null && channel.isSendable()
  }

  /** Slash command names the bot answers */
  get commandNames(): string[] {
    return Array.from(this.commands.keys())
  }

  async syncCommands(): Promise<CommandSyncResult> {
    return registerCommandsWithDiscord(this.commands, this.registrationDeps())
  }

  /**
   * Clears the scope's command table before registering again, which drops
   * commands left behind by older versions.
   */
  async resetCommands(): Promise<CommandSyncResult> {
    const deps = this.registrationDeps()
    await clearCommandsWithDiscord(deps)
    return registerCommandsWithDiscord(this.commands, deps)
  }

  async sendDirectMessage(
    discordId: string,
    message: RenderedMessage,
  ): Promise<void> {
    await sendDirectMessage(discordId, message, this.sendDeps)
  }

  async sendChannelMessage(
    channelId: string,
    message: RenderedMessage,
  ): Promise<void> {
    await sendChannelMessage(channelId, message, this.sendDeps)
  }
}
