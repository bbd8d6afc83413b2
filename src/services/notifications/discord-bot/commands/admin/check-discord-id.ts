/**
 * /check-discord-id
 *
 * Looks up the link for a Discord ID (the invoker's by default) and lists
 * every link row sharing a Discord ID or Seerr username with another.
 */

import type { EmbedField } from '@root/types/discord.types.js'
import type { LinkConflict } from '@root/types/link.types.js'
import { SlashCommandBuilder, TimestampStyles, time } from 'discord.js'
import {
  field,
  infoReply,
  invalidDiscordIdReply,
  isDiscordId,
  reply,
} from '../replies.js'
import type { SlashCommand } from '../types.js'

export interface CheckDiscordIdOptions {
  discordId: string | null
}

const REASON_LABELS: Record<LinkConflict['reason'], string> = {
  duplicate_discord_id: 'shared Discord ID',
  duplicate_seerr_username: 'shared Seerr username',
}

export function describeConflicts(conflicts: LinkConflict[]): string {
  if (conflicts.length === 0) return 'No conflicts found.'
  return conflicts
    .map((conflict) => {
      const reason = REASON_LABELS[conflict.reason]
      return `${conflict.discordId} ↔ ${conflict.seerrUsername} (${reason})`
    })
    .join('\n')
}

export const checkDiscordIdCommand: SlashCommand<CheckDiscordIdOptions> = {
  data: new SlashCommandBuilder()
    .setName('check-discord-id')
    .setDescription(
      'Check the link for a Discord ID and look for conflicts (Seerr admins only)',
    )
    .addStringOption((option) =>
      option
        .setName('discord_id')
        .setDescription('Discord user ID (defaults to yours)')
        .setRequired(false),
    ),

  adminOnly: true,

  readOptions: (interaction) => ({
    discordId: interaction.options.getString('discord_id')?.trim() || null,
  }),

  async run(ctx, { userId, options }) {
    const target = options.discordId ?? userId
    if (!isDiscordId(target)) {
      return invalidDiscordIdReply(target)
    }

    const [link, conflicts] = await Promise.all([
      ctx.db.findByDiscordId(target),
      ctx.db.findConflicts(),
    ])

    const fields: EmbedField[] = [field('Discord ID', target, true)]

    if (link) {
      fields.push(
        field(
          'Linked Seerr User',
          link.seerrUserId === null
            ? link.seerrUsername
            : `${link.seerrUsername} (ID ${link.seerrUserId})`,
          true,
        ),
        field(
          'Linked',
          time(new Date(link.linkedAt), TimestampStyles.RelativeTime),
          true,
        ),
      )

      if (link.seerrUserId !== null) {
        try {
          const saved = await ctx.seerr.getUserDiscordId(link.seerrUserId)
          fields.push(
            field(
              'Discord ID in Seerr',
              saved === null
                ? 'Not set'
                : saved === target
                  ? `${saved} (matches)`
                  : `${saved} (differs)`,
              true,
            ),
          )
        } catch (error) {
          ctx.log.warn(
            { error, discordId: target },
            'Could not read Discord ID from Seerr',
          )
          fields.push(field('Discord ID in Seerr', 'Seerr unavailable', true))
        }
      }
    } else {
      fields.push(field('Linked Seerr User', 'Not linked', true))
    }

    fields.push(field('Conflicts', describeConflicts(conflicts)))

    if (conflicts.length === 0) {
      return infoReply('Discord ID Check', 'Link store is consistent.', fields)
    }

    return reply(
      'warning',
      'Discord ID Check',
      `Found ${conflicts.length} conflicting link rows. Use /force-link or /unlink-user to resolve them.`,
      fields,
    )
  },
}
