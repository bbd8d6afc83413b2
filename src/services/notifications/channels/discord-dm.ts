/**
 * Discord Direct Message Channel
 *
 * Sends rendered notifications as direct messages or channel posts through
 * the bot client. Failures are thrown, leaving fallback decisions to the
 * dispatcher.
 */

import type { RenderedMessage } from '@root/types/discord.types.js'
import type { Client } from 'discord.js'
import type { FastifyBaseLogger } from 'fastify'
import type { BotStatus } from '../discord-bot/commands/types.js'
import { buildMessagePayload } from './message-payload.js'

export interface DiscordSendDeps {
  log: FastifyBaseLogger
  botClient: Client | null
  botStatus: BotStatus
}

function requireClient(deps: DiscordSendDeps): Client {
  if (!deps.botClient || deps.botStatus !== 'running') {
    throw new Error(`Discord bot is not running (status: ${deps.botStatus})`)
  }
  return deps.botClient
}

/**
 * Sends a direct message to a Discord user.
 *
 * @throws when the bot is not running, the user cannot be fetched, or
 * Discord refuses the message (e.g. the user blocks DMs from server members)
 */
export async function sendDirectMessage(
  discordId: string,
  message: RenderedMessage,
  deps: DiscordSendDeps,
): Promise<void> {
  const client = requireClient(deps)
  const user = await client.users.fetch(discordId)

  await user.send(buildMessagePayload(message))

  deps.log.debug(
    { discordId, username: user.username },
    `Direct message sent for "${message.title}"`,
  )
}

/**
 * Posts a message to a guild text channel.
 *
 * @throws when the channel is missing or the bot cannot send there
 */
export async function sendChannelMessage(
  channelId: string,
  message: RenderedMessage,
  deps: DiscordSendDeps,
): Promise<void> {
  const client = requireClient(deps)
  const channel = await client.channels.fetch(channelId)

  if (!channel || !channel.isSendable()) {
    throw new Error(`Channel ${channelId} not found or not a text channel`)
  }

  await channel.send(buildMessagePayload(message))
}
