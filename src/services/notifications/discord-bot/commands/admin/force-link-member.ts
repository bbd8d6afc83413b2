/**
 * /force-link-member
 *
 * Links a guild member to a Seerr user ID, replacing any link either side
 * already holds.
 */

import type { SeerrUser } from '@root/schemas/seerr/seerr.schema.js'
import {
  InteractionContextType,
  SlashCommandBuilder,
  userMention,
} from 'discord.js'
import { describeDisplaced } from '../displaced.js'
import {
  SEERR_UNAVAILABLE,
  errorReply,
  field,
  successReply,
} from '../replies.js'
import type { SlashCommand } from '../types.js'

export interface ForceLinkMemberOptions {
  memberId: string
  seerrUserId: number
}

export const forceLinkMemberCommand: SlashCommand<ForceLinkMemberOptions> = {
  data: new SlashCommandBuilder()
    .setName('force-link-member')
    .setDescription('Link a server member to a Seerr user (Seerr admins only)')
    .setContexts(InteractionContextType.Guild)
    .addUserOption((option) =>
      option
        .setName('member')
        .setDescription('Server member')
        .setRequired(true),
    )
    .addIntegerOption((option) =>
      option
        .setName('seerr_user_id')
        .setDescription('Seerr user ID')
        .setRequired(true)
        .setMinValue(1),
    ),

  adminOnly: true,

  readOptions: (interaction) => ({
    memberId: interaction.options.getUser('member', true).id,
    seerrUserId: interaction.options.getInteger('seerr_user_id', true),
  }),

  async run(ctx, { userId, options }) {
    const { memberId, seerrUserId } = options

    if (!Number.isInteger(seerrUserId) || seerrUserId <= 0) {
      return errorReply(
        'Invalid Seerr User ID',
        'The Seerr user ID must be a positive number.',
      )
    }

    let seerrUser: SeerrUser | null
    try {
      seerrUser = await ctx.seerr.getUser(seerrUserId)
    } catch (error) {
      ctx.log.warn(
        { error, seerrUserId },
        'Seerr lookup failed during /force-link-member',
      )
      return SEERR_UNAVAILABLE
    }

    if (!seerrUser) {
      return errorReply(
        'Seerr User Not Found',
        `No Seerr user has ID ${seerrUserId}.`,
      )
    }

    const seerrUsername = ctx.seerr.displayName(seerrUser)
    const { displaced } = await ctx.db.forceLink(
      memberId,
      seerrUsername,
      seerrUser.id,
    )

    ctx.log.info(
      {
        adminId: userId,
        discordId: memberId,
        seerrUsername,
        displaced: displaced.length,
      },
      'Member force-linked',
    )

    const fields = [
      field('Member', userMention(memberId), true),
      field('Seerr User', `${seerrUsername} (ID ${seerrUser.id})`, true),
    ]
    if (displaced.length > 0) {
      fields.push(field('Replaced Links', describeDisplaced(displaced)))
    }

    return successReply(
      'Member Linked',
      `${userMention(memberId)} now receives updates for **${seerrUsername}**.`,
      fields,
    )
  },
}
