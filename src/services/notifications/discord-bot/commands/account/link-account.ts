/**
 * /link-account
 *
 * Self-service linking: finds the Seerr user whose notification settings
 * carry the invoker's Discord ID and links the two.
 */

import type { SeerrUser } from '@root/schemas/seerr/seerr.schema.js'
import { LinkConflictError } from '@root/types/errors.js'
import { SlashCommandBuilder } from 'discord.js'
import {
  SEERR_UNAVAILABLE,
  errorReply,
  field,
  infoReply,
  successReply,
} from '../replies.js'
import type { NoOptions, SlashCommand } from '../types.js'

export const linkAccountCommand: SlashCommand<NoOptions> = {
  data: new SlashCommandBuilder()
    .setName('link-account')
    .setDescription('Link your Discord account to your Seerr account'),

  adminOnly: false,

  readOptions: () => ({}),

  async run(ctx, { userId }) {
    const existing = await ctx.db.findByDiscordId(userId)
    if (existing) {
      return infoReply(
        'Already Linked',
        `Your Discord account is already linked to Seerr user **${existing.seerrUsername}**.`,
        [],
        'Use /unlink-account to link a different Seerr account.',
      )
    }

    let seerrUser: SeerrUser | null
    try {
      seerrUser = await ctx.seerr.findUserByDiscordId(userId)
    } catch (error) {
      ctx.log.warn(
        { error, userId },
        'Seerr lookup failed during /link-account',
      )
      return SEERR_UNAVAILABLE
    }

    if (!seerrUser) {
      return errorReply(
        'No Seerr Account Found',
        `No Seerr account has the Discord ID \`${userId}\` saved.\nAdd it in Seerr under Settings > Notifications > Discord User ID, then run /link-account again.`,
      )
    }

    const seerrUsername = ctx.seerr.displayName(seerrUser)

    try {
      await ctx.db.upsertLink(userId, seerrUsername, 'self', seerrUser.id)
    } catch (error) {
      if (error instanceof LinkConflictError) {
        return errorReply(
          'Link Conflict',
          `${error.message}. Ask a Seerr admin to resolve it.`,
        )
      }
      throw error
    }

    ctx.log.info({ userId, seerrUsername }, 'Account linked')

    const fields = [
      field('Seerr User', seerrUsername, true),
      field('Seerr User ID', String(seerrUser.id), true),
    ]
    if (ctx.seerr.isAdmin(seerrUser)) {
      fields.push(
        field(
          'Admin Access',
          'Your Seerr account is an administrator. Admin commands are available.',
        ),
      )
    }

    return successReply(
      'Account Linked',
      `Your Discord account is now linked to Seerr user **${seerrUsername}**. Request updates will arrive by direct message.`,
      fields,
    )
  },
}
