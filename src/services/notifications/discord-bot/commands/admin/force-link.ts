/**
 * /force-link
 *
 * Links a raw Discord ID to a Seerr user found by name, for users who are
 * not members of the server.
 */

import type { SeerrUser } from '@root/schemas/seerr/seerr.schema.js'
import { SlashCommandBuilder } from 'discord.js'
import { describeDisplaced } from '../displaced.js'
import {
  SEERR_UNAVAILABLE,
  errorReply,
  field,
  invalidDiscordIdReply,
  isDiscordId,
  successReply,
} from '../replies.js'
import type { SlashCommand } from '../types.js'

export interface ForceLinkOptions {
  seerrUsername: string
  discordId: string
}

export const forceLinkCommand: SlashCommand<ForceLinkOptions> = {
  data: new SlashCommandBuilder()
    .setName('force-link')
    .setDescription('Link a Discord ID to a Seerr username (Seerr admins only)')
    .addStringOption((option) =>
      option
        .setName('seerr_username')
        .setDescription('Seerr username, display name or email')
        .setRequired(true),
    )
    .addStringOption((option) =>
      option
        .setName('discord_id')
        .setDescription('Discord user ID')
        .setRequired(true),
    ),

  adminOnly: true,

  readOptions: (interaction) => ({
    seerrUsername: interaction.options.getString('seerr_username', true).trim(),
    discordId: interaction.options.getString('discord_id', true).trim(),
  }),

  async run(ctx, { userId, options }) {
    const { seerrUsername, discordId } = options

    if (!isDiscordId(discordId)) {
      return invalidDiscordIdReply(discordId)
    }

    let seerrUser: SeerrUser | null
    try {
      seerrUser = await ctx.seerr.findUserByUsername(seerrUsername)
    } catch (error) {
      ctx.log.warn(
        { error, seerrUsername },
        'Seerr lookup failed during /force-link',
      )
      return SEERR_UNAVAILABLE
    }

    if (!seerrUser) {
      return errorReply(
        'Seerr User Not Found',
        `No Seerr user matches **${seerrUsername}**.`,
      )
    }

    const linkedName = ctx.seerr.displayName(seerrUser)
    const { displaced } = await ctx.db.forceLink(
      discordId,
      linkedName,
      seerrUser.id,
    )

    ctx.log.info(
      {
        adminId: userId,
        discordId,
        seerrUsername: linkedName,
        displaced: displaced.length,
      },
      'Discord ID force-linked',
    )

    const fields = [
      field('Discord ID', discordId, true),
      field('Seerr User', `${linkedName} (ID ${seerrUser.id})`, true),
    ]
    if (displaced.length > 0) {
      fields.push(field('Replaced Links', describeDisplaced(displaced)))
    }

    return successReply(
      'Account Linked',
      `Discord ID \`${discordId}\` now receives updates for **${linkedName}**.`,
      fields,
    )
  },
}
