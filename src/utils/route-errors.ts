import type { FastifyBaseLogger, FastifyRequest } from 'fastify'

export interface LogRouteErrorOptions {
  message?: string
  level?: 'error' | 'warn' | 'info'
  context?: Record<string, unknown>
  [field: string]: unknown
}

/**
 * Logs a route failure with the route signature attached, so every route
 * reports errors in the same shape.
 */
export function logRouteError(
  log: FastifyBaseLogger,
  request: FastifyRequest,
  error: unknown,
  options: LogRouteErrorOptions = {},
): void {
  const { message, level = 'error', context, ...fields } = options
  const route = `${request.method} ${request.routeOptions?.url ?? request.url}`

  log[level](
    { error, route, ...context, ...fields },
    message ?? `Error in route ${route}`,
  )
}
