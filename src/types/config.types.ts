export type LogLevel =
  | 'fatal'
  | 'error'
  | 'warn'
  | 'info'
  | 'debug'
  | 'trace'
  | 'silent'

/**
 * Environment record as validated by @fastify/env, keyed by variable name.
 */
export interface RawConfig {
  DISCORD_TOKEN: string
  SEERR_URL: string
  SEERR_API_KEY: string
  NOTIFICATION_CHANNEL_ID: string
  WEBHOOK_HOST: string
  WEBHOOK_PORT: number
  WEBHOOK_AUTH_HEADER: string
  DEBUG_MODE: boolean
  DISCORD_GUILD_ID: string
  DATABASE_PATH: string
  LOG_LEVEL: LogLevel
  RATE_LIMIT_MAX: number
  CLOSE_GRACE_DELAY: number
  DM_RATE_LIMIT_RETRIES: number
  SEERR_TIMEOUT_MS: number
}

export interface Config {
  discordToken: string
  /** Empty when commands are registered globally */
  discordGuildId: string
  /** Seerr base URL without a trailing slash */
  seerrUrl: string
  seerrApiKey: string
  notificationChannelId: string
  webhookHost: string
  webhookPort: number
  /** Empty disables webhook authentication */
  webhookAuthHeader: string
  debugMode: boolean
  databasePath: string
  logLevel: LogLevel
  rateLimitMax: number
  closeGraceDelay: number
  dmRateLimitRetries: number
  seerrTimeoutMs: number
}
