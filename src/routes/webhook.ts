import {
  type ErrorResponse,
  ErrorSchema,
} from '@root/schemas/common/error.schema.js'
import {
  type WebhookAcceptedResponse,
  WebhookAcceptedResponseSchema,
} from '@root/schemas/webhook/seerr-webhook.schema.js'
import type { NotificationEvent } from '@root/types/notification.types.js'
import { receiveWebhook } from '@services/notifications/webhook/receiver.js'
import { logRouteError } from '@utils/route-errors.js'
import type { FastifyPluginAsync } from 'fastify'

function seerrUsernameOf(event: NotificationEvent): string | null {
  return (
    event.notifyUser.username ??
    event.request.requestedBy.username ??
    event.issue.reportedBy.username ??
    null
  )
}

const plugin: FastifyPluginAsync = async (fastify) => {
  // The body stays a raw string so the shared secret is checked before any
  // parsing happens. Scoped to this plugin only.
  fastify.removeAllContentTypeParsers()
  fastify.addContentTypeParser(
    '*',
    { parseAs: 'string' },
    (_request, body, done) => {
      done(null, body)
    },
  )

  fastify.post<{
    Body: string | undefined
    Reply: WebhookAcceptedResponse | ErrorResponse
  }>(
    '/webhook',
    {
      schema: {
        response: {
          200: WebhookAcceptedResponseSchema,
          400: ErrorSchema,
          401: ErrorSchema,
          500: ErrorSchema,
        },
      },
    },
    async (request, reply) => {
      const result = receiveWebhook(request.headers, request.body, {
        authHeader: fastify.config.webhookAuthHeader,
      })

      if (!result.ok) {
        throw result.error
      }

      const { event, payload } = result
      let eventId: number

      try {
        eventId = await fastify.db.logWebhookEvent({
          eventType: event.type,
          rawType: event.rawType,
          seerrUsername: seerrUsernameOf(event),
          payload,
        })
      } catch (error) {
        logRouteError(fastify.log, request, error, {
          message: 'Failed to record webhook event',
          type: event.type,
        })
        reply.code(500)
        return {
          statusCode: 500,
          code: 'WEBHOOK_STORE_FAILED',
          error: 'Internal Server Error',
          message: 'Failed to record webhook event',
        }
      }

      request.log.info(
        { eventId, type: event.type, rawType: event.rawType },
        'Webhook accepted',
      )

      setImmediate(() => {
        fastify.notifications
          .process(event, eventId)
          .catch((error: unknown) => {
            fastify.log.error(
              { error, eventId, type: event.type },
              'Failed to deliver webhook event',
            )
          })
      })

      return { status: 'success', eventId }
    },
  )
}

export default plugin
