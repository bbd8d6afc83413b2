import { setTimeout as delay } from 'node:timers/promises'
import { DiscordAPIError, HTTPError, RateLimitError } from 'discord.js'
import type { FastifyBaseLogger } from 'fastify'

export interface RateLimitBackoffOptions {
  /** Retries after the first attempt; 0 disables retrying */
  maxRetries: number
  baseDelayMs?: number
  maxDelayMs?: number
  log?: FastifyBaseLogger
  /** Used in log lines, e.g. "DM to 1234" */
  label?: string
  sleep?: (ms: number) => Promise<void>
}

/**
 * True for Discord's 429 in any of the shapes discord.js surfaces it: a
 * RateLimitError when the REST manager is told to reject instead of queue,
 * or an API/HTTP error carrying the status.
 */
export function isRateLimitError(error: unknown): boolean {
  if (error instanceof RateLimitError) return true
  return (
    (error instanceof DiscordAPIError || error instanceof HTTPError) &&
    error.status === 429
  )
}

/**
 * Delay before the next attempt: Discord's retry-after when known, else
 * exponential backoff. Either way ±10% jitter, clamped to maxDelayMs.
 */
export function backoffDelayMs(
  error: unknown,
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
): number {
  const advertised =
    error instanceof RateLimitError ? error.retryAfter : undefined
  const delayMs = advertised ?? baseDelayMs * 2 ** attempt

  const jitter = delayMs * 0.1
  const jittered = delayMs + Math.random() * jitter * 2 - jitter
  return Math.round(Math.min(Math.max(jittered, 0), maxDelayMs))
}

/**
 * Runs a Discord send, waiting and retrying only while Discord reports a rate
 * limit. Any other failure, or a rate limit outlasting maxRetries, is
 * rethrown for the caller to handle.
 */
export async function withRateLimitBackoff<T>(
  operation: () => Promise<T>,
  options: RateLimitBackoffOptions,
): Promise<T> {
  const {
    maxRetries,
    baseDelayMs = 1000,
    maxDelayMs = 30000,
    log,
    label = 'Discord request',
    sleep = (ms: number) => delay(ms),
  } = options

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation()
    } catch (error) {
      if (!isRateLimitError(error) || attempt >= maxRetries) {
        throw error
      }

      const waitMs = backoffDelayMs(error, attempt, baseDelayMs, maxDelayMs)
      log?.warn(
        { attempt: attempt + 1, maxRetries, waitMs },
        `${label} rate limited by Discord, retrying`,
      )
      await sleep(waitMs)
    }
  }
}
