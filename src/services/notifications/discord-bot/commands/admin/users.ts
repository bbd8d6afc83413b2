import {
  SlashCommandBuilder,
  TimestampStyles,
  time,
  userMention,
} from 'discord.js'
import { field, infoReply } from '../replies.js'
import type { NoOptions, SlashCommand } from '../types.js'

const PAGE_SIZE = 10

export const usersCommand: SlashCommand<NoOptions> = {
  data: new SlashCommandBuilder()
    .setName('users')
    .setDescription('List linked accounts (Seerr admins only)'),

  adminOnly: true,

  readOptions: () => ({}),

  async run(ctx) {
    const [links, total] = await Promise.all([
      ctx.db.listLinks(PAGE_SIZE),
      ctx.db.countLinks(),
    ])

    if (links.length === 0) {
      return infoReply('Linked Users', 'No accounts are linked yet.')
    }

    const fields = links.map((link) => {
      const linkedAt = time(
        new Date(link.linkedAt),
        TimestampStyles.RelativeTime,
      )
      return field(
        link.seerrUsername,
        `${userMention(link.discordId)}\nLinked ${linkedAt} (${link.linkedBy})`,
      )
    })

    return infoReply(
      `Linked Users (${total})`,
      'Most recent links first.',
      fields,
      total > links.length ? `Showing ${links.length} of ${total}` : undefined,
    )
  },
}
