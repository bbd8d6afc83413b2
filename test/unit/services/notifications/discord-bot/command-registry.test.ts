import {
  type CommandRegistrationDeps,
  clearCommandsWithDiscord,
  createCommandRegistry,
  registerCommandsWithDiscord,
} from '@services/notifications/discord-bot/command-registry.js'
import { REPLY_COLORS } from '@services/notifications/discord-bot/commands/replies.js'
import type { CommandContext } from '@services/notifications/discord-bot/commands/types.js'
import { type ChatInputCommandInteraction, MessageFlags } from 'discord.js'
import { describe, expect, it, vi } from 'vitest'
import { createMockLogger } from '../../../../mocks/logger.js'

const APP_ID = '300000000000000001'
const GUILD_ID = '400000000000000001'

const unusedContext = (): CommandContext => {
  throw new Error('Context should not be needed')
}

function registrationDeps(overrides: Partial<CommandRegistrationDeps> = {}) {
  const put = vi.fn(async (_route: string, _options?: unknown) => [])
  const sleep = vi.fn(async (_ms: number) => {})
  const log = createMockLogger()
  const deps: CommandRegistrationDeps = {
    log,
    rest: { put },
    applicationId: APP_ID,
    guildId: GUILD_ID,
    sleep,
    ...overrides,
  }
  return { deps, put, sleep, log }
}

describe('command-registry', () => {
  describe('createCommandRegistry', () => {
    it('should register every slash command under its name', () => {
      const commands = createCommandRegistry(unusedContext)

      expect([...commands.keys()].sort()).toEqual([
        'check-discord-id',
        'force-link',
        'force-link-member',
        'health',
        'link-account',
        'reset-commands',
        'status',
        'sync',
        'unlink-account',
        'unlink-member',
        'unlink-user',
        'users',
      ])
    })

    it('should answer interactions with an ephemeral deferred reply', async () => {
      const removeLink = vi.fn(async (_discordId: string) => false)
      const context = {
        db: { removeLink },
        log: createMockLogger(),
      } as unknown as CommandContext
      const commands = createCommandRegistry(() => context)
      const deferReply = vi.fn(async () => {})
      const editReply = vi.fn(async () => {})
      const interaction = {
        user: { id: '100000000000000002', username: 'alice' },
        deferReply,
        editReply,
      } as unknown as ChatInputCommandInteraction

      await commands.get('unlink-account')?.execute(interaction)

      expect(deferReply).toHaveBeenCalledWith({ flags: MessageFlags.Ephemeral })
      expect(removeLink).toHaveBeenCalledWith('100000000000000002')
      expect(editReply).toHaveBeenCalledWith({
        embeds: [
          {
            title: 'No Linked Account',
            description: 'Your Discord account is not linked to Seerr.',
            color: REPLY_COLORS.info,
          },
        ],
      })
    })
  })

  describe('registerCommandsWithDiscord', () => {
    it('should replace the guild command table', async () => {
      const commands = createCommandRegistry(unusedContext)
      const { deps, put } = registrationDeps()

      const result = await registerCommandsWithDiscord(commands, deps)

      expect(result).toEqual({ scope: 'guild', count: 12, attempts: 1 })
      expect(put).toHaveBeenCalledWith(
        `/applications/${APP_ID}/guilds/${GUILD_ID}/commands`,
        { body: expect.any(Array) },
      )
      const [, options] = put.mock.calls[0] ?? []
      expect(options).toMatchObject({
        body: expect.arrayContaining([
          expect.objectContaining({ name: 'link-account' }),
        ]),
      })
    })

    it('should register globally without a guild', async () => {
      const commands = createCommandRegistry(unusedContext)
      const { deps, put } = registrationDeps({ guildId: '' })

      const result = await registerCommandsWithDiscord(commands, deps)

      expect(result.scope).toBe('global')
      expect(put.mock.calls[0]?.[0]).toBe(`/applications/${APP_ID}/commands`)
    })

    it('should retry failed registrations', async () => {
      const commands = createCommandRegistry(unusedContext)
      const { deps, put, sleep, log } = registrationDeps({ retryDelayMs: 250 })
      put.mockRejectedValueOnce(new Error('Service Unavailable'))

      const result = await registerCommandsWithDiscord(commands, deps)

      expect(result.attempts).toBe(2)
      expect(sleep).toHaveBeenCalledWith(250)
      expect(log.warn).toHaveBeenCalledWith(
        expect.objectContaining({ scope: 'guild', attempt: 1 }),
        'Command registration failed, retrying in 250ms',
      )
    })

    it('should give up after the last attempt', async () => {
      const commands = createCommandRegistry(unusedContext)
      const { deps, put, sleep, log } = registrationDeps({ attempts: 3 })
      put.mockRejectedValue(new Error('Missing Access'))

      await expect(registerCommandsWithDiscord(commands, deps)).rejects.toThrow(
        'Missing Access',
      )
      expect(put).toHaveBeenCalledTimes(3)
      expect(sleep).toHaveBeenCalledTimes(2)
      expect(log.error).toHaveBeenCalledWith(
        expect.objectContaining({ attempt: 3 }),
        'Failed to register commands',
      )
    })
  })

  describe('clearCommandsWithDiscord', () => {
    it('should put an empty command table', async () => {
      const { deps, put } = registrationDeps()

      await clearCommandsWithDiscord(deps)

      expect(put).toHaveBeenCalledWith(
        `/applications/${APP_ID}/guilds/${GUILD_ID}/commands`,
        { body: [] },
      )
    })
  })
})
