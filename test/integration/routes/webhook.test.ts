import type { ErrorResponse } from '@root/schemas/common/error.schema.js'
import type { WebhookAcceptedResponse } from '@root/schemas/webhook/seerr-webhook.schema.js'
import type { DeliveryOutcome } from '@root/types/discord.types.js'
import { describe, expect, it, vi } from 'vitest'
import { build } from '../../helpers/app.js'

const AUTH_HEADER = 'Bearer test-secret'

const availablePayload = {
  notification_type: 'MEDIA_AVAILABLE',
  event: 'Movie Request Now Available',
  subject: 'Dune (2021)',
  notifyuser_username: 'alice',
  notifyuser_settings_discordId: '100000000000000002',
}

const delivered: DeliveryOutcome = {
  dmSent: true,
  channelFallbackUsed: false,
  channelSent: false,
  recipient: '100000000000000002',
}

describe('Webhook Routes', () => {
  describe('POST /webhook', () => {
    it('should store the event and hand it to the dispatcher', async (ctx) => {
      const app = await build(ctx)
      const processSpy = vi
        .spyOn(app.notifications, 'process')
        .mockResolvedValue(delivered)

      const res = await app.inject({
        method: 'POST',
        url: '/webhook',
        payload: availablePayload,
      })

      expect(res.statusCode).toBe(200)
      const body = res.json<WebhookAcceptedResponse>()
      expect(body.status).toBe('success')

      const [stored] = await app.db.getRecentWebhookEvents(1)
      expect(stored).toMatchObject({
        id: body.eventId,
        eventType: 'request-available',
        rawType: 'MEDIA_AVAILABLE',
        seerrUsername: 'alice',
        processed: false,
      })

      await vi.waitFor(() => {
        expect(processSpy).toHaveBeenCalledWith(
          expect.objectContaining({
            type: 'request-available',
            subject: 'Dune (2021)',
          }),
          body.eventId,
        )
      })
    })

    it('should record the delivery outcome once processing finishes', async (ctx) => {
      const app = await build(ctx)

      const res = await app.inject({
        method: 'POST',
        url: '/webhook',
        payload: { notification_type: 'TEST_NOTIFICATION' },
      })
      expect(res.statusCode).toBe(200)

      // The bot is offline under test, so the channel post fails
      await vi.waitFor(async () => {
        const [stored] = await app.db.getRecentWebhookEvents(1)
        expect(stored).toMatchObject({
          processed: true,
          sentDm: false,
          sentChannel: false,
          recipient: null,
        })
      })
    })

    it('should accept Seerr’s nested default template', async (ctx) => {
      const app = await build(ctx)
      vi.spyOn(app.notifications, 'process').mockResolvedValue(delivered)

      const res = await app.inject({
        method: 'POST',
        url: '/webhook',
        headers: { 'content-type': 'text/plain' },
        payload: JSON.stringify({
          notification_type: 'ISSUE_CREATED',
          issue: { issue_id: '7', reportedBy_username: 'carol' },
        }),
      })

      expect(res.statusCode).toBe(200)
      const [stored] = await app.db.getRecentWebhookEvents(1)
      expect(stored).toMatchObject({
        eventType: 'issue-reported',
        seerrUsername: 'carol',
      })
    })

    it('should reject malformed JSON with 400', async (ctx) => {
      const app = await build(ctx)

      const res = await app.inject({
        method: 'POST',
        url: '/webhook',
        headers: { 'content-type': 'application/json' },
        payload: '{"notification_type": ',
      })

      expect(res.statusCode).toBe(400)
      expect(res.json<ErrorResponse>()).toEqual({
        statusCode: 400,
        code: 'WEBHOOK_INVALID_PAYLOAD',
        error: 'Bad Request',
        message: 'Request body is not valid JSON',
      })
      expect(await app.db.countWebhookEvents()).toMatchObject({ total: 0 })
    })

    it('should reject a JSON array with 400', async (ctx) => {
      const app = await build(ctx)

      const res = await app.inject({
        method: 'POST',
        url: '/webhook',
        payload: [availablePayload],
      })

      expect(res.statusCode).toBe(400)
      expect(res.json<ErrorResponse>().message).toBe(
        'Request body must be a JSON object',
      )
    })

    it('should require the configured authorization header', async (ctx) => {
      const app = await build(ctx, {
        env: { WEBHOOK_AUTH_HEADER: AUTH_HEADER },
      })

      const missing = await app.inject({
        method: 'POST',
        url: '/webhook',
        payload: availablePayload,
      })
      const wrong = await app.inject({
        method: 'POST',
        url: '/webhook',
        headers: { authorization: 'Bearer wrong' },
        payload: availablePayload,
      })

      expect(missing.statusCode).toBe(401)
      expect(missing.json<ErrorResponse>()).toEqual({
        statusCode: 401,
        code: 'WEBHOOK_UNAUTHORIZED',
        error: 'Unauthorized',
        message: 'Missing authorization header',
      })
      expect(wrong.statusCode).toBe(401)
      expect(wrong.json<ErrorResponse>().message).toBe(
        'Invalid authorization header',
      )
      expect(await app.db.countWebhookEvents()).toMatchObject({ total: 0 })
    })

    it('should check the secret before parsing the body', async (ctx) => {
      const app = await build(ctx, {
        env: { WEBHOOK_AUTH_HEADER: AUTH_HEADER },
      })

      const res = await app.inject({
        method: 'POST',
        url: '/webhook',
        headers: { 'content-type': 'application/json' },
        payload: 'not json',
      })

      expect(res.statusCode).toBe(401)
    })

    it('should accept requests carrying the secret', async (ctx) => {
      const app = await build(ctx, {
        env: { WEBHOOK_AUTH_HEADER: AUTH_HEADER },
      })
      vi.spyOn(app.notifications, 'process').mockResolvedValue(delivered)

      const res = await app.inject({
        method: 'POST',
        url: '/webhook',
        headers: { authorization: AUTH_HEADER },
        payload: availablePayload,
      })

      expect(res.statusCode).toBe(200)
    })

    it('should return 500 when the event cannot be stored', async (ctx) => {
      const app = await build(ctx)
      vi.spyOn(app.db, 'logWebhookEvent').mockRejectedValue(
        new Error('SQLITE_FULL: database or disk is full'),
      )
      const processSpy = vi.spyOn(app.notifications, 'process')

      const res = await app.inject({
        method: 'POST',
        url: '/webhook',
        payload: availablePayload,
      })

      expect(res.statusCode).toBe(500)
      expect(res.json<ErrorResponse>()).toEqual({
        statusCode: 500,
        code: 'WEBHOOK_STORE_FAILED',
        error: 'Internal Server Error',
        message: 'Failed to record webhook event',
      })
      expect(processSpy).not.toHaveBeenCalled()
    })
  })

  describe('unknown routes', () => {
    it('should answer 404 with the route', async (ctx) => {
      const app = await build(ctx)

      const res = await app.inject({ method: 'GET', url: '/webhook' })

      expect(res.statusCode).toBe(404)
      expect(res.json<ErrorResponse>()).toEqual({
        statusCode: 404,
        code: 'NOT_FOUND',
        error: 'Not Found',
        message: 'Route GET /webhook not found',
      })
    })
  })
})
