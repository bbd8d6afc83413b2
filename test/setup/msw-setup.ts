import { setupServer } from 'msw/node'
import { afterAll, afterEach, beforeAll } from 'vitest'
import { seerrApiHandlers } from '../mocks/seerr-api-handlers.js'

/**
 * MSW (Mock Service Worker) setup for Vitest
 *
 * Importing this file starts an in-process Seerr API for the test file.
 * Individual tests can override handlers with server.use().
 *
 * @see https://mswjs.io/docs/integrations/node
 */
export const server = setupServer(...seerrApiHandlers)

beforeAll(() => {
  server.listen({ onUnhandledRequest: 'error' })
})

// Restore the default handlers so overrides never leak between tests
afterEach(() => {
  server.resetHandlers(...seerrApiHandlers)
})

afterAll(() => {
  server.close()
})
