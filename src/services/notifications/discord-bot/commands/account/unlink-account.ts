import { SlashCommandBuilder } from 'discord.js'
import { infoReply, successReply } from '../replies.js'
import type { NoOptions, SlashCommand } from '../types.js'

export const unlinkAccountCommand: SlashCommand<NoOptions> = {
  data: new SlashCommandBuilder()
    .setName('unlink-account')
    .setDescription('Unlink your Discord account from Seerr'),

  adminOnly: false,

  readOptions: () => ({}),

  async run(ctx, { userId }) {
    const removed = await ctx.db.removeLink(userId)
    if (!removed) {
      return infoReply(
        'No Linked Account',
        'Your Discord account is not linked to Seerr.',
      )
    }

    ctx.log.info({ userId }, 'Account unlinked by its owner')
    return successReply(
      'Account Unlinked',
      'You will no longer receive Seerr updates by direct message.',
    )
  },
}
