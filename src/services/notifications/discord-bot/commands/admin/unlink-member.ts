import {
  InteractionContextType,
  SlashCommandBuilder,
  userMention,
} from 'discord.js'
import { infoReply, successReply } from '../replies.js'
import type { SlashCommand } from '../types.js'

export interface UnlinkMemberOptions {
  memberId: string
}

export const unlinkMemberCommand: SlashCommand<UnlinkMemberOptions> = {
  data: new SlashCommandBuilder()
    .setName('unlink-member')
    .setDescription("Remove a server member's link (Seerr admins only)")
    .setContexts(InteractionContextType.Guild)
    .addUserOption((option) =>
      option
        .setName('member')
        .setDescription('Server member')
        .setRequired(true),
    ),

  adminOnly: true,

  readOptions: (interaction) => ({
    memberId: interaction.options.getUser('member', true).id,
  }),

  async run(ctx, { userId, options: { memberId } }) {
    const removed = await ctx.db.removeLink(memberId)
    if (!removed) {
      return infoReply(
        'Not Linked',
        `${userMention(memberId)} has no linked Seerr account.`,
      )
    }

    ctx.log.info(
      { adminId: userId, discordId: memberId },
      'Member unlinked by admin',
    )
    return successReply(
      'Member Unlinked',
      `${userMention(memberId)} is no longer linked to Seerr.`,
    )
  },
}
