import { SlashCommandBuilder } from 'discord.js'
import {
  infoReply,
  invalidDiscordIdReply,
  isDiscordId,
  successReply,
} from '../replies.js'
import type { SlashCommand } from '../types.js'

export interface UnlinkUserOptions {
  discordId: string
}

export const unlinkUserCommand: SlashCommand<UnlinkUserOptions> = {
  data: new SlashCommandBuilder()
    .setName('unlink-user')
    .setDescription('Remove the link for a Discord ID (Seerr admins only)')
    .addStringOption((option) =>
      option
        .setName('discord_id')
        .setDescription('Discord user ID')
        .setRequired(true),
    ),

  adminOnly: true,

  readOptions: (interaction) => ({
    discordId: interaction.options.getString('discord_id', true).trim(),
  }),

  async run(ctx, { userId, options: { discordId } }) {
    if (!isDiscordId(discordId)) {
      return invalidDiscordIdReply(discordId)
    }

    const removed = await ctx.db.removeLink(discordId)
    if (!removed) {
      return infoReply(
        'Not Linked',
        `Discord ID \`${discordId}\` has no linked Seerr account.`,
      )
    }

    ctx.log.info({ adminId: userId, discordId }, 'Discord ID unlinked by admin')
    return successReply(
      'Account Unlinked',
      `Discord ID \`${discordId}\` is no longer linked to Seerr.`,
    )
  },
}
