import { SlashCommandBuilder } from 'discord.js'
import { errorReply, successReply } from '../replies.js'
import type { NoOptions, SlashCommand } from '../types.js'
import { describeSync } from './sync.js'

export const resetCommandsCommand: SlashCommand<NoOptions> = {
  data: new SlashCommandBuilder()
    .setName('reset-commands')
    .setDescription(
      'Clear and re-register all slash commands (Seerr admins only)',
    ),

  adminOnly: true,

  readOptions: () => ({}),

  async run(ctx, { userId }) {
    try {
      const result = await ctx.commandTable.reset()
      ctx.log.info({ adminId: userId, ...result }, 'Commands reset on request')
      return successReply(
        'Commands Reset',
        `Cleared the command table. ${describeSync(result)}`,
      )
    } catch (error) {
      ctx.log.error({ error, adminId: userId }, 'Command reset failed')
      return errorReply(
        'Reset Failed',
        'Discord rejected the command update. Check the logs and try again.',
      )
    }
  },
}
