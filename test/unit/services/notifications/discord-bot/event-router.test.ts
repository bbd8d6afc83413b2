import type { Command } from '@services/notifications/discord-bot/command-registry.js'
import { handleInteraction } from '@services/notifications/discord-bot/event-router.js'
import { type Interaction, MessageFlags, SlashCommandBuilder } from 'discord.js'
import { describe, expect, it, vi } from 'vitest'
import { createMockLogger } from '../../../../mocks/logger.js'

function fakeInteraction(commandName: string, chatInput = true) {
  const reply = vi.fn(async () => {})
  const followUp = vi.fn(async () => {})
  const interaction = {
    id: '500000000000000001',
    commandName,
    user: { id: '100000000000000002' },
    replied: false,
    deferred: false,
    isChatInputCommand: () => chatInput,
    reply,
    followUp,
  }
  return {
    interaction: interaction as unknown as Interaction,
    state: interaction,
    reply,
    followUp,
  }
}

function commandMap(execute: Command['execute']): Map<string, Command> {
  const data = new SlashCommandBuilder()
    .setName('status')
    .setDescription('Show status')
  return new Map([['status', { data, execute }]])
}

describe('handleInteraction', () => {
  it('should run the matching command', async () => {
    const execute = vi.fn(async () => {})
    const { interaction } = fakeInteraction('status')

    await handleInteraction(interaction, {
      log: createMockLogger(),
      commands: commandMap(execute),
    })

    expect(execute).toHaveBeenCalledWith(interaction)
  })

  it('should ignore anything but slash commands', async () => {
    const execute = vi.fn(async () => {})
    const { interaction, reply } = fakeInteraction('status', false)

    await handleInteraction(interaction, {
      log: createMockLogger(),
      commands: commandMap(execute),
    })

    expect(execute).not.toHaveBeenCalled()
    expect(reply).not.toHaveBeenCalled()
  })

  it('should tell the user about unknown commands', async () => {
    const { interaction, reply } = fakeInteraction('link')

    await handleInteraction(interaction, {
      log: createMockLogger(),
      commands: commandMap(async () => {}),
    })

    expect(reply).toHaveBeenCalledWith({
      content: 'Unknown command. An admin may need to run /sync.',
      flags: MessageFlags.Ephemeral,
    })
  })

  it('should follow up with an error once the reply was deferred', async () => {
    const log = createMockLogger()
    const { interaction, state, followUp } = fakeInteraction('status')
    const execute = vi.fn(async () => {
      state.deferred = true
      throw new Error('Unknown interaction')
    })

    await handleInteraction(interaction, { log, commands: commandMap(execute) })

    expect(followUp).toHaveBeenCalledWith({
      content: 'An error occurred while processing your request.',
      flags: MessageFlags.Ephemeral,
    })
    expect(log.error).toHaveBeenCalledWith(
      expect.objectContaining({ command: 'status' }),
      'Error handling interaction',
    )
  })
})
