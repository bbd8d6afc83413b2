import { SeerrApiService } from '@services/seerr.service.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    seerr: SeerrApiService
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    const { seerrUrl, seerrApiKey, seerrTimeoutMs } = fastify.config
    fastify.decorate(
      'seerr',
      new SeerrApiService(fastify.log, {
        baseUrl: seerrUrl,
        apiKey: seerrApiKey,
        timeoutMs: seerrTimeoutMs,
      }),
    )
  },
  {
    name: 'seerr',
    dependencies: ['config'],
  },
)
