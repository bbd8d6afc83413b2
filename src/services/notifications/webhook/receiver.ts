import { createHash, timingSafeEqual } from 'node:crypto'
import { WebhookAuthError, WebhookParseError } from '@root/types/errors.js'
import type { NotificationEvent } from '@root/types/notification.types.js'
import { isPlainObject, normalizeWebhookPayload } from './normalize.js'

export type WebhookHeaders = Record<string, string | string[] | undefined>

export interface ReceiveWebhookOptions {
  /** Expected Authorization header value; empty disables the check */
  authHeader: string
  now?: () => Date
}

export type ReceiveWebhookResult =
  | {
      ok: true
      event: NotificationEvent
      payload: Record<string, unknown>
    }
  | {
      ok: false
      error: WebhookAuthError | WebhookParseError
    }

/**
 * Constant-time string comparison. Both sides are hashed first so that
 * inputs of different lengths compare in the same time too.
 */
export function secretsMatch(provided: string, expected: string): boolean {
  const a = createHash('sha256').update(provided).digest()
  const b = createHash('sha256').update(expected).digest()
  return timingSafeEqual(a, b)
}

function headerValue(
  headers: WebhookHeaders,
  name: string,
): string | undefined {
  const value = headers[name.toLowerCase()]
  return Array.isArray(value) ? value[0] : value
}

/**
 * Authenticates and decodes one inbound Seerr webhook.
 *
 * Authentication happens before the body is looked at, so an unauthenticated
 * caller never learns whether its payload would have parsed.
 */
export function receiveWebhook(
  headers: WebhookHeaders,
  rawBody: string | Buffer | undefined,
  options: ReceiveWebhookOptions,
): ReceiveWebhookResult {
  if (options.authHeader) {
    const provided = headerValue(headers, 'authorization')
    if (provided === undefined) {
      return {
        ok: false,
        error: new WebhookAuthError('Missing authorization header'),
      }
    }
    if (!secretsMatch(provided, options.authHeader)) {
      return {
        ok: false,
        error: new WebhookAuthError('Invalid authorization header'),
      }
    }
  }

  const text = rawBody === undefined ? '' : rawBody.toString()
  if (text.trim() === '') {
    return { ok: false, error: new WebhookParseError('Request body is empty') }
  }

  let decoded: unknown
  try {
    decoded = JSON.parse(text)
  } catch (error) {
    return {
      ok: false,
      error: new WebhookParseError('Request body is not valid JSON', {
        cause: error,
      }),
    }
  }

  if (!isPlainObject(decoded)) {
    return {
      ok: false,
      error: new WebhookParseError('Request body must be a JSON object'),
    }
  }

  const receivedAt = options.now ? options.now() : new Date()
  return {
    ok: true,
    event: normalizeWebhookPayload(decoded, receivedAt),
    payload: decoded,
  }
}
