import type { Link } from '@root/types/link.types.js'

/**
 * Base for errors that map onto an HTTP status in the global error handler.
 */
export class RelayError extends Error {
  readonly statusCode: number
  readonly code: string

  constructor(
    message: string,
    statusCode: number,
    code: string,
    options?: ErrorOptions,
  ) {
    super(message, options)
    this.name = new.target.name
    this.statusCode = statusCode
    this.code = code

    // Fix prototype chain after down-emit
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

/** Missing or mismatched webhook shared secret */
export class WebhookAuthError extends RelayError {
  constructor(message = 'Invalid or missing authorization header') {
    super(message, 401, 'WEBHOOK_UNAUTHORIZED')
  }
}

/** Webhook body that is not a JSON object */
export class WebhookParseError extends RelayError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 400, 'WEBHOOK_INVALID_PAYLOAD', options)
  }
}

/**
 * A link write that would give a Discord ID or a Seerr username a second
 * active link.
 */
export class LinkConflictError extends RelayError {
  constructor(
    readonly side: 'discord_id' | 'seerr_username',
    readonly existing: Link,
  ) {
    super(
      side === 'discord_id'
        ? `Discord ID ${existing.discordId} is already linked to Seerr user ${existing.seerrUsername}`
        : `Seerr user ${existing.seerrUsername} is already linked to Discord ID ${existing.discordId}`,
      409,
      'LINK_CONFLICT',
    )
  }
}

/** Non-2xx response or transport failure talking to Seerr */
export class SeerrApiError extends RelayError {
  constructor(
    message: string,
    readonly status: number | null,
    options?: ErrorOptions,
  ) {
    super(message, 502, 'SEERR_API_ERROR', options)
  }
}

/** A direct message that could not be delivered */
export class DeliveryError extends RelayError {
  constructor(
    readonly discordId: string,
    options?: ErrorOptions,
  ) {
    super(
      `Direct message to ${discordId} failed`,
      502,
      'DELIVERY_FAILED',
      options,
    )
  }
}
