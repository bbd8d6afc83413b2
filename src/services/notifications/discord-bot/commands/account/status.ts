/**
 * /status
 *
 * Shows the invoker's link and, when Seerr answers, their request counts.
 */

import type { EmbedField } from '@root/types/discord.types.js'
import { SlashCommandBuilder, TimestampStyles, time } from 'discord.js'
import { field, infoReply, successReply } from '../replies.js'
import type { NoOptions, SlashCommand } from '../types.js'

export const statusCommand: SlashCommand<NoOptions> = {
  data: new SlashCommandBuilder()
    .setName('status')
    .setDescription('Show your Seerr link and request summary'),

  adminOnly: false,

  readOptions: () => ({}),

  async run(ctx, { userId }) {
    const link = await ctx.db.findByDiscordId(userId)
    if (!link) {
      return infoReply(
        'No Linked Account',
        'Your Discord account is not linked to Seerr. Run /link-account to link it.',
      )
    }

    const fields: EmbedField[] = [
      field('Seerr User', link.seerrUsername, true),
      field(
        'Linked',
        time(new Date(link.linkedAt), TimestampStyles.RelativeTime),
        true,
      ),
      field(
        'Linked By',
        link.linkedBy === 'admin' ? 'Admin' : 'Self-service',
        true,
      ),
    ]

    if (link.seerrUserId !== null) {
      try {
        const stats = await ctx.seerr.getUserRequestStats(link.seerrUserId)
        fields.push(
          field('Total Requests', String(stats.total), true),
          field('Pending', String(stats.pending), true),
          field('Approved', String(stats.approved), true),
          field('Available', String(stats.completed), true),
          field('Declined', String(stats.declined), true),
          field('Failed', String(stats.failed), true),
        )
      } catch (error) {
        ctx.log.warn({ error, userId }, 'Could not load request statistics')
        fields.push(field('Requests', 'Seerr is unavailable right now.'))
      }
    }

    return successReply(
      'Account Status',
      'Request updates for this Seerr account are sent to you by direct message.',
      fields,
    )
  },
}
