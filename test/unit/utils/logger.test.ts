import { SeerrApiError, WebhookAuthError } from '@root/types/errors.js'
import type { FastifyRequest } from 'fastify'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { createMockLogger } from '../../mocks/logger.js'

// Mock dependencies before importing the module
vi.mock('dotenv', () => ({
  config: vi.fn(),
}))

vi.mock('rotating-file-stream', () => ({
  createStream: vi.fn(() => ({
    write: vi.fn(),
    end: vi.fn(),
  })),
}))

// Type for testing internal serializers
type LoggerConfigWithSerializers = {
  serializers?: {
    error?: (err: unknown) => Record<string, unknown>
    req?: (req: FastifyRequest) => Record<string, unknown>
  }
}

const { createLoggerConfig, createServiceLogger, filename, redactUrl } =
  await import('@utils/logger.js')

function serializers() {
  const config = createLoggerConfig() as LoggerConfigWithSerializers
  const error = config.serializers?.error
  const req = config.serializers?.req
  if (!error || !req) throw new Error('Logger config has no serializers')
  return { error, req }
}

describe('logger', () => {
  beforeEach(() => {
    process.env.enableConsoleOutput = 'false'
  })

  afterEach(() => {
    delete process.env.enableConsoleOutput
  })

  describe('createServiceLogger', () => {
    it('should create a child logger with an uppercased prefix', () => {
      const parent = createMockLogger()

      createServiceLogger(parent, 'discord')

      expect(parent.child).toHaveBeenCalledWith(
        {},
        { msgPrefix: '[DISCORD] ' },
      )
    })
  })

  describe('createLoggerConfig', () => {
    it('should log to the file stream only when console output is off', () => {
      const config = createLoggerConfig()

      expect(config).toHaveProperty('level', 'info')
      expect(config).toHaveProperty('stream')
      expect(config).not.toHaveProperty('transport')
    })
  })

  describe('filename', () => {
    it('should name the active file and rotated files', () => {
      expect(filename(0)).toBe('seerr-relay-current.log')
      expect(filename(new Date(2026, 0, 5))).toBe('seerr-relay-2026-01-05.log')
      expect(filename(new Date(2026, 10, 20), 2)).toBe(
        'seerr-relay-2026-11-20-2.log',
      )
    })
  })

  describe('redactUrl', () => {
    it('should hide credentials in query strings', () => {
      expect(redactUrl('/health?apiKey=test-secret&verbose=1')).toBe(
        '/health?apiKey=[REDACTED]&verbose=1',
      )
      expect(redactUrl('/webhook?token=test-secret')).toBe(
        '/webhook?token=[REDACTED]',
      )
      expect(redactUrl('/webhook')).toBe('/webhook')
    })
  })

  describe('error serializer', () => {
    it('should wrap primitive values', () => {
      const { error } = serializers()

      expect(error('boom')).toEqual({ message: 'boom', type: 'StringError' })
      expect(error(42)).toEqual({ message: '42', type: 'NumberError' })
    })

    it('should drop the stack of client errors', () => {
      const { error } = serializers()

      const result = error(new WebhookAuthError())

      expect(result).toEqual({
        message: 'Invalid or missing authorization header',
        name: 'WebhookAuthError',
        statusCode: 401,
        type: 'Error',
        code: 'WEBHOOK_UNAUTHORIZED',
      })
    })

    it('should keep the stack and cause of server errors', () => {
      const { error } = serializers()
      const cause = new TypeError('fetch failed')

      const result = error(
        new SeerrApiError('Seerr request to status failed', null, { cause }),
      )

      expect(result).toMatchObject({
        message: 'Seerr request to status failed',
        name: 'SeerrApiError',
        status: null,
        statusCode: 502,
        code: 'SEERR_API_ERROR',
        cause: { message: 'fetch failed', type: 'TypeError' },
      })
      expect(result.stack).toEqual(expect.any(String))
    })

    it('should name plain error-like objects by their name', () => {
      const { error } = serializers()

      expect(error({ name: 'AbortError', message: 'aborted' })).toEqual({
        name: 'AbortError',
        message: 'aborted',
        type: 'AbortError',
      })
    })
  })

  describe('request serializer', () => {
    it('should serialize the request with credentials redacted', () => {
      const { req } = serializers()
      const request = {
        method: 'POST',
        url: '/webhook?api_key=test-secret',
        headers: { host: 'relay.test:5000' },
        ip: '127.0.0.1',
        socket: { remotePort: 54321 },
      } as unknown as FastifyRequest

      expect(req(request)).toEqual({
        method: 'POST',
        url: '/webhook?api_key=[REDACTED]',
        host: 'relay.test:5000',
        remoteAddress: '127.0.0.1',
        remotePort: 54321,
      })
    })
  })
})
