/**
 * Notification Service Plugin
 *
 * Registers the notification service and ties the Discord bot to the
 * server lifecycle.
 */

import { NotificationService } from '@services/notification.service.js'
import type { FastifyInstance, FastifyPluginOptions } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    notifications: NotificationService
  }
}

export interface NotificationPluginOptions extends FastifyPluginOptions {
  /** Set to false to keep the bot offline, e.g. under test */
  discordAutostart?: boolean
}

export default fp(
  async (fastify: FastifyInstance, opts: NotificationPluginOptions) => {
    const notifications = new NotificationService(fastify.log, fastify)
    fastify.decorate('notifications', notifications)

    if (opts.discordAutostart === false) {
      fastify.log.info('Discord bot autostart disabled')
    } else {
      fastify.addHook('onReady', async () => {
        await notifications.initialize()
      })
    }

    fastify.addHook('onClose', async () => {
      await notifications.shutdown()
    })
  },
  {
    name: 'notification-service',
    dependencies: ['config', 'database', 'seerr'],
  },
)
