import closeWithGrace from 'close-with-grace'
import Fastify from 'fastify'
import fp from 'fastify-plugin'
import { createLoggerConfig } from '@utils/logger.js'
import serviceApp from './app.js'

/**
 * Starts the webhook server and the Discord bot, with graceful shutdown.
 */
async function init() {
  const app = Fastify({
    logger: createLoggerConfig(),
    pluginTimeout: 60000,
  })

  await app.register(fp(serviceApp))
  await app.ready()

  closeWithGrace(
    {
      delay: app.config.closeGraceDelay,
    },
    async ({ err }) => {
      if (err != null) {
        app.log.error(err)
      }
      await app.close()
    },
  )

  try {
    await app.listen({
      port: app.config.webhookPort,
      host: app.config.webhookHost,
    })
  } catch (err) {
    app.log.error(err)
    process.exit(1)
  }
}

void init()
