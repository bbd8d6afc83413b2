/**
 * Discord Event Router
 *
 * Routes gateway events to the bot service and slash commands to their
 * handlers.
 */

import {
  type ChatInputCommandInteraction,
  type Client,
  Events,
  type Interaction,
  type InteractionReplyOptions,
  MessageFlags,
} from 'discord.js'
import type { FastifyBaseLogger } from 'fastify'
import type { Command } from './command-registry.js'

export interface EventRouterDeps {
  log: FastifyBaseLogger
  commands: Map<string, Command>
  onBotReady: (readyClient: Client<true>) => Promise<void>
}

/**
 * Sets up all event handlers on the Discord bot client.
 */
export function setupBotEventHandlers(
  client: Client,
  deps: EventRouterDeps,
): void {
  const { log, commands, onBotReady } = deps

  client.once(Events.ClientReady, (readyClient) => {
    log.info({ botUsername: readyClient.user.username }, 'Discord bot is ready')
    onBotReady(readyClient).catch((error: unknown) => {
      log.error({ error }, 'Error while finishing bot startup')
    })
  })

  client.on(Events.Error, (error) => {
    log.error({ error }, 'Discord bot error occurred')
  })

  client.on(Events.InteractionCreate, async (interaction) => {
    await handleInteraction(interaction, { log, commands })
  })
}

/**
 * Routes an interaction to the appropriate handler.
 */
export async function handleInteraction(
  interaction: Interaction,
  deps: { log: FastifyBaseLogger; commands: Map<string, Command> },
): Promise<void> {
  const { log, commands } = deps

  if (!interaction.isChatInputCommand()) return

  try {
    log.debug(
      {
        interactionId: interaction.id,
        userId: interaction.user.id,
        command: interaction.commandName,
      },
      'Handling interaction',
    )
    await handleSlashCommand(interaction, commands, log)
  } catch (error) {
    log.error(
      { error, command: interaction.commandName },
      'Error handling interaction',
    )
    await sendErrorReply(interaction, log)
  }
}

async function handleSlashCommand(
  interaction: ChatInputCommandInteraction,
  commands: Map<string, Command>,
  log: FastifyBaseLogger,
): Promise<void> {
  const command = commands.get(interaction.commandName)
  if (!command) {
    log.warn({ command: interaction.commandName }, 'Unknown command received')
    await interaction.reply({
      content: 'Unknown command. An admin may need to run /sync.',
      flags: MessageFlags.Ephemeral,
    })
    return
  }

  await command.execute(interaction)
}

async function sendErrorReply(
  interaction: ChatInputCommandInteraction,
  log: FastifyBaseLogger,
): Promise<void> {
  const errorMessage: InteractionReplyOptions = {
    content: 'An error occurred while processing your request.',
    flags: MessageFlags.Ephemeral,
  }

  try {
    if (interaction.replied || interaction.deferred) {
      await interaction.followUp(errorMessage)
    } else {
      await interaction.reply(errorMessage)
    }
  } catch (replyError) {
    log.error({ error: replyError }, 'Error sending error reply')
  }
}
