/**
 * Discord Command Registry
 *
 * Manages slash command registration and storage.
 * Commands are registered to the configured guild when one is set, which
 * makes them appear immediately, and globally otherwise.
 */

import {
  type ChatInputCommandInteraction,
  MessageFlags,
  type REST,
  Routes,
} from 'discord.js'
import type { FastifyBaseLogger } from 'fastify'
import { linkAccountCommand } from './commands/account/link-account.js'
import { statusCommand } from './commands/account/status.js'
import { unlinkAccountCommand } from './commands/account/unlink-account.js'
import { checkDiscordIdCommand } from './commands/admin/check-discord-id.js'
import { forceLinkMemberCommand } from './commands/admin/force-link-member.js'
import { forceLinkCommand } from './commands/admin/force-link.js'
import { healthCommand } from './commands/admin/health.js'
import { resetCommandsCommand } from './commands/admin/reset-commands.js'
import { syncCommand } from './commands/admin/sync.js'
import { unlinkMemberCommand } from './commands/admin/unlink-member.js'
import { unlinkUserCommand } from './commands/admin/unlink-user.js'
import { usersCommand } from './commands/admin/users.js'
import { verifySeerrAdmin } from './commands/admin-guard.js'
import { errorReply } from './commands/replies.js'
import type {
  CommandContext,
  CommandDefinition,
  CommandInvocation,
  CommandReply,
  CommandSyncResult,
  SlashCommand,
} from './commands/types.js'

type CommandHandler = (
  interaction: ChatInputCommandInteraction,
) => Promise<void>

export interface Command {
  data: CommandDefinition
  execute: CommandHandler
}

export interface CommandRegistrationDeps {
  log: FastifyBaseLogger
  rest: Pick<REST, 'put'>
  applicationId: string
  /** Empty string registers globally */
  guildId: string
  attempts?: number
  retryDelayMs?: number
  sleep?: (ms: number) => Promise<void>
}

const DEFAULT_ATTEMPTS = 3
const DEFAULT_RETRY_DELAY_MS = 5000

const defaultSleep = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms))

/**
 * Runs a command with the admin guard applied. Failures are turned into an
 * error reply for the invoker.
 */
export async function runSlashCommand<TOptions>(
  command: SlashCommand<TOptions>,
  ctx: CommandContext,
  invocation: CommandInvocation<TOptions>,
): Promise<CommandReply> {
  try {
    if (command.adminOnly) {
      const check = await verifySeerrAdmin(ctx, invocation.userId)
      if (!check.ok) return check.reply
    }

    return await command.run(ctx, invocation)
  } catch (error) {
    ctx.log.error(
      { error, command: command.data.name, userId: invocation.userId },
      'Command failed',
    )
    return errorReply(
      'Command Failed',
      'Something went wrong while running this command. Please try again later.',
    )
  }
}

function toCommand<TOptions>(
  command: SlashCommand<TOptions>,
  getContext: () => CommandContext,
): Command {
  return {
    data: command.data,
    execute: async (interaction) => {
      await interaction.deferReply({ flags: MessageFlags.Ephemeral })

      const ctx = getContext()
      ctx.log.debug(
        { userId: interaction.user.id, command: command.data.name },
        'Executing command',
      )

      const result = await runSlashCommand(command, ctx, {
        userId: interaction.user.id,
        username: interaction.user.username,
        options: command.readOptions(interaction),
      })

      await interaction.editReply(result)
    },
  }
}

/**
 * Creates the registry with every command the bot answers.
 */
export function createCommandRegistry(
  getContext: () => CommandContext,
): Map<string, Command> {
  const commands = new Map<string, Command>()
  const add = <TOptions>(command: SlashCommand<TOptions>) => {
    commands.set(command.data.name, toCommand(command, getContext))
  }

  add(linkAccountCommand)
  add(unlinkAccountCommand)
  add(statusCommand)
  add(healthCommand)
  add(usersCommand)
  add(forceLinkMemberCommand)
  add(unlinkMemberCommand)
  add(forceLinkCommand)
  add(unlinkUserCommand)
  add(syncCommand)
  add(checkDiscordIdCommand)
  add(resetCommandsCommand)

  return commands
}

function commandRoute(deps: CommandRegistrationDeps) {
  return deps.guildId
    ? Routes.applicationGuildCommands(deps.applicationId, deps.guildId)
    : Routes.applicationCommands(deps.applicationId)
}

/**
 * Replaces the application's command table with the registry contents,
 * retrying a fixed number of times before giving up.
 *
 * @throws the last Discord error once every attempt has failed
 */
export async function registerCommandsWithDiscord(
  commands: Map<string, Command>,
  deps: CommandRegistrationDeps,
): Promise<CommandSyncResult> {
  const { log } = deps
  const attempts = deps.attempts ?? DEFAULT_ATTEMPTS
  const retryDelayMs = deps.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS
  const sleep = deps.sleep ?? defaultSleep
  const scope = deps.guildId ? 'guild' : 'global'

  const body = Array.from(commands.values()).map((cmd) => cmd.data.toJSON())

  for (let attempt = 1; ; attempt++) {
    try {
      await deps.rest.put(commandRoute(deps), { body })
      log.info(
        { scope, count: body.length, attempt },
        'Registered application commands',
      )
      return { scope, count: body.length, attempts: attempt }
    } catch (error) {
      if (attempt >= attempts) {
        log.error({ error, scope, attempt }, 'Failed to register commands')
        throw error
      }
      log.warn(
        { error, scope, attempt },
        `Command registration failed, retrying in ${retryDelayMs}ms`,
      )
      await sleep(retryDelayMs)
    }
  }
}

/**
 * Removes every command in the registration scope.
 */
export async function clearCommandsWithDiscord(
  deps: CommandRegistrationDeps,
): Promise<void> {
  await deps.rest.put(commandRoute(deps), { body: [] })
  deps.log.info(
    { scope: deps.guildId ? 'guild' : 'global' },
    'Cleared application commands',
  )
}
