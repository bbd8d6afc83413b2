/**
 * /health
 *
 * Admin diagnostics: Seerr reachability, database, gateway latency,
 * notification channel access, link and webhook counts.
 */

import type { EmbedField } from '@root/types/discord.types.js'
import {
  SlashCommandBuilder,
  TimestampStyles,
  channelMention,
  time,
} from 'discord.js'
import { field, reply } from '../replies.js'
import type { NoOptions, SlashCommand } from '../types.js'

const OK = '✅'
const FAIL = '❌'

export function formatUptime(ms: number): string {
  const totalMinutes = Math.floor(ms / 60_000)
  const days = Math.floor(totalMinutes / 1440)
  const hours = Math.floor((totalMinutes % 1440) / 60)
  const minutes = totalMinutes % 60
  if (days > 0) return `${days}d ${hours}h ${minutes}m`
  if (hours > 0) return `${hours}h ${minutes}m`
  return `${minutes}m`
}

export const healthCommand: SlashCommand<NoOptions> = {
  data: new SlashCommandBuilder()
    .setName('health')
    .setDescription('Show relay health (Seerr admins only)'),

  adminOnly: true,

  readOptions: () => ({}),

  async run(ctx) {
    const { db, seerr, bot, config, log } = ctx
    const channelId = config.notificationChannelId

    const seerrOk = await seerr.testConnection()

    let databaseOk = true
    try {
      await db.ping()
    } catch (error) {
      log.error({ error }, 'Database ping failed during /health')
      databaseOk = false
    }

    let channelOk = false
    try {
      channelOk = await bot.canReachChannel(channelId)
    } catch (error) {
      log.warn({ error }, 'Notification channel check failed')
    }

    const fields: EmbedField[] = [
      field(
        'Seerr API',
        seerrOk ? `${OK} Connected` : `${FAIL} Unreachable`,
        true,
      ),
      field('Database', databaseOk ? `${OK} OK` : `${FAIL} Error`, true),
      field(
        'Discord Latency',
        bot.getLatencyMs() === null ? 'Unknown' : `${bot.getLatencyMs()} ms`,
        true,
      ),
      field(
        'Notification Channel',
        `${channelOk ? OK : FAIL} ${channelMention(channelId)}`,
        true,
      ),
    ]

    if (databaseOk) {
      const [links, webhooks, [latest]] = await Promise.all([
        db.countLinks(),
        db.countWebhookEvents(),
        db.getRecentWebhookEvents(1),
      ])
      fields.push(
        field('Linked Users', String(links), true),
        field(
          'Webhooks',
          [
            `${webhooks.total} received`,
            `${webhooks.sentDm} sent by DM`,
            `${webhooks.sentChannel} posted to channel`,
          ].join('\n'),
          true,
        ),
      )
      if (latest) {
        const receivedAt = time(
          new Date(latest.createdAt),
          TimestampStyles.RelativeTime,
        )
        fields.push(
          field('Last Webhook', `${latest.rawType} ${receivedAt}`, true),
        )
      }
    }

    const uptime = bot.getUptimeMs()
    if (uptime !== null) {
      fields.push(field('Uptime', formatUptime(uptime), true))
    }

    const healthy = seerrOk && databaseOk && channelOk
    return reply(
      healthy ? 'success' : 'warning',
      'System Health',
      healthy ? 'All systems operational.' : 'Some checks failed.',
      fields,
    )
  },
}
