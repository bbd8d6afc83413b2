import { SlashCommandBuilder } from 'discord.js'
import { errorReply, successReply } from '../replies.js'
import type { CommandSyncResult, NoOptions, SlashCommand } from '../types.js'

export function describeSync(result: CommandSyncResult): string {
  const target = result.scope === 'guild' ? 'to this server' : 'globally'
  const note =
    result.scope === 'global'
      ? '\nGlobal commands can take up to an hour to appear.'
      : ''
  return `Registered ${result.count} commands ${target}.${note}`
}

export const syncCommand: SlashCommand<NoOptions> = {
  data: new SlashCommandBuilder()
    .setName('sync')
    .setDescription(
      'Re-register slash commands with Discord (Seerr admins only)',
    ),

  adminOnly: true,

  readOptions: () => ({}),

  async run(ctx, { userId }) {
    try {
      const result = await ctx.commandTable.sync()
      ctx.log.info({ adminId: userId, ...result }, 'Commands synced on request')
      return successReply('Commands Synced', describeSync(result))
    } catch (error) {
      ctx.log.error({ error, adminId: userId }, 'Command sync failed')
      return errorReply(
        'Sync Failed',
        'Discord rejected the command update. Check the logs and try again.',
      )
    }
  },
}
