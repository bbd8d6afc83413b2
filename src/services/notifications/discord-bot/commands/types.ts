/**
 * Slash Command Types
 *
 * Commands are split into a Discord-facing half (builder data and option
 * parsing) and a `run` handler that only sees plain values, so handlers can
 * be exercised without a gateway connection.
 */

import type { Config } from '@root/types/config.types.js'
import type { DiscordEmbed } from '@root/types/discord.types.js'
import type { DatabaseService } from '@services/database.service.js'
import type { SeerrApiService } from '@services/seerr.service.js'
import type {
  ChatInputCommandInteraction,
  RESTPostAPIChatInputApplicationCommandsJSONBody,
} from 'discord.js'
import type { FastifyBaseLogger } from 'fastify'

export type BotStatus = 'stopped' | 'starting' | 'running' | 'stopping'

export type CommandScope = 'guild' | 'global'

export interface CommandSyncResult {
  scope: CommandScope
  count: number
  attempts: number
}

/** Read-only view of the bot used by diagnostic commands */
export interface BotInfo {
  getBotStatus(): BotStatus
  /** Websocket heartbeat in milliseconds, null before the first heartbeat */
  getLatencyMs(): number | null
  getUptimeMs(): number | null
  canReachChannel(channelId: string): Promise<boolean>
}

export interface CommandTableControls {
  sync(): Promise<CommandSyncResult>
  reset(): Promise<CommandSyncResult>
}

export interface CommandContext {
  db: DatabaseService
  seerr: SeerrApiService
  config: Config
  log: FastifyBaseLogger
  bot: BotInfo
  commandTable: CommandTableControls
}

export interface CommandInvocation<TOptions> {
  userId: string
  username: string
  options: TOptions
}

export interface CommandReply {
  embeds: DiscordEmbed[]
}

export interface CommandDefinition {
  readonly name: string
  toJSON(): RESTPostAPIChatInputApplicationCommandsJSONBody
}

export type NoOptions = Record<string, never>

export interface SlashCommand<TOptions> {
  data: CommandDefinition
  /** Requires a linked Seerr administrator */
  adminOnly: boolean
  readOptions(interaction: ChatInputCommandInteraction): TOptions
  run(
    ctx: CommandContext,
    invocation: CommandInvocation<TOptions>,
  ): Promise<CommandReply>
}
