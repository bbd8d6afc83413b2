import env from '@fastify/env'
import type { Config, RawConfig } from '@root/types/config.types.js'
import { validLogLevels } from '@utils/logger.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    env: RawConfig
    config: Config
  }
}

const required = { type: 'string', minLength: 1 } as const

export const schema = {
  type: 'object',
  required: [
    'DISCORD_TOKEN',
    'SEERR_URL',
    'SEERR_API_KEY',
    'NOTIFICATION_CHANNEL_ID',
  ],
  properties: {
    DISCORD_TOKEN: required,
    SEERR_URL: required,
    SEERR_API_KEY: required,
    NOTIFICATION_CHANNEL_ID: required,
    WEBHOOK_HOST: {
      type: 'string',
      default: '0.0.0.0',
    },
    WEBHOOK_PORT: {
      type: 'number',
      default: 5000,
    },
    WEBHOOK_AUTH_HEADER: {
      type: 'string',
      default: '',
    },
    DEBUG_MODE: {
      type: 'boolean',
      default: false,
    },
    DISCORD_GUILD_ID: {
      type: 'string',
      default: '',
    },
    DATABASE_PATH: {
      type: 'string',
      default: 'data/database/seerr-relay.db',
    },
    LOG_LEVEL: {
      type: 'string',
      enum: validLogLevels,
      default: 'info',
    },
    RATE_LIMIT_MAX: {
      type: 'number',
      default: 500,
    },
    CLOSE_GRACE_DELAY: {
      type: 'number',
      default: 10000,
    },
    DM_RATE_LIMIT_RETRIES: {
      type: 'number',
      default: 3,
    },
    SEERR_TIMEOUT_MS: {
      type: 'number',
      default: 10000,
    },
  },
}

/**
 * Maps the validated environment onto the application's config shape.
 * DEBUG_MODE wins over LOG_LEVEL.
 */
export function buildConfig(raw: RawConfig): Config {
  return {
    discordToken: raw.DISCORD_TOKEN.trim(),
    discordGuildId: raw.DISCORD_GUILD_ID.trim(),
    seerrUrl: raw.SEERR_URL.trim().replace(/\/+$/, ''),
    seerrApiKey: raw.SEERR_API_KEY.trim(),
    notificationChannelId: raw.NOTIFICATION_CHANNEL_ID.trim(),
    webhookHost: raw.WEBHOOK_HOST,
    webhookPort: raw.WEBHOOK_PORT,
    webhookAuthHeader: raw.WEBHOOK_AUTH_HEADER,
    debugMode: raw.DEBUG_MODE,
    databasePath: raw.DATABASE_PATH,
    logLevel: raw.DEBUG_MODE ? 'debug' : raw.LOG_LEVEL,
    rateLimitMax: raw.RATE_LIMIT_MAX,
    closeGraceDelay: raw.CLOSE_GRACE_DELAY,
    dmRateLimitRetries: raw.DM_RATE_LIMIT_RETRIES,
    seerrTimeoutMs: raw.SEERR_TIMEOUT_MS,
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    await fastify.register(env, {
      confKey: 'env',
      schema,
      dotenv: {
        path: './.env',
        debug: process.env.NODE_ENV === 'development',
      },
      data: process.env,
    })

    const config = buildConfig(fastify.env)

    // Service loggers are children created later and copy the level then
    fastify.log.level = config.logLevel

    if (!config.webhookAuthHeader) {
      fastify.log.warn(
        'WEBHOOK_AUTH_HEADER is not set; the webhook endpoint accepts unauthenticated requests',
      )
    }

    fastify.decorate('config', config)
  },
  {
    name: 'config',
  },
)
