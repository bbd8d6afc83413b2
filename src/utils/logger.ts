import fs from 'node:fs'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import { config } from 'dotenv'
import type { FastifyBaseLogger, FastifyRequest } from 'fastify'
import type { Level, LevelWithSilent, LoggerOptions } from 'pino'
import pino from 'pino'
import * as rfs from 'rotating-file-stream'

export const validLogLevels: LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
]

interface FileLoggerOptions extends LoggerOptions {
  stream: rfs.RotatingFileStream | NodeJS.WriteStream
}

interface MultiStreamLoggerOptions extends LoggerOptions {
  stream: pino.MultiStreamRes
}

type RelayLoggerOptions =
  | LoggerOptions
  | FileLoggerOptions
  | MultiStreamLoggerOptions

type SerializableError =
  | Error
  | Record<string, unknown>
  | string
  | number
  | boolean

const __filename = fileURLToPath(import.meta.url)
const __dirname = dirname(__filename)
const projectRoot = resolve(__dirname, '..', '..')

// Load .env file early for logger configuration
config({ path: resolve(projectRoot, '.env') })

/**
 * Creates a child logger whose messages carry an upper-cased service prefix,
 * e.g. `[DISCORD] Bot is ready`.
 */
export function createServiceLogger(
  parent: FastifyBaseLogger,
  service: string,
): FastifyBaseLogger {
  return parent.child({}, { msgPrefix: `[${service.toUpperCase()}] ` })
}

/**
 * Serializes standard errors and the domain errors carrying `statusCode`.
 * Stack traces are kept for 5xx and status-less errors only.
 */
function createErrorSerializer() {
  const serialize = (err: SerializableError): unknown => {
    if (err == null) {
      return err
    }

    if (typeof err !== 'object') {
      const primitiveType =
        typeof err === 'string'
          ? 'StringError'
          : typeof err === 'number'
            ? 'NumberError'
            : 'BooleanError'
      return { message: String(err), type: primitiveType }
    }

    const serialized: Record<string, unknown> = {}

    if ('message' in err && err.message) serialized.message = err.message
    if ('name' in err && err.name) serialized.name = err.name
    if ('status' in err && err.status !== undefined)
      serialized.status = err.status
    if ('statusCode' in err && err.statusCode !== undefined)
      serialized.statusCode = err.statusCode

    if (err instanceof TypeError) {
      serialized.type = 'TypeError'
    } else if (err instanceof SyntaxError) {
      serialized.type = 'SyntaxError'
    } else if (err instanceof RangeError) {
      serialized.type = 'RangeError'
    } else if (err instanceof Error) {
      serialized.type = 'Error'
    } else if ('name' in err && typeof err.name === 'string' && err.name) {
      serialized.type = err.name
    } else {
      serialized.type = 'UnknownError'
    }

    // Client errors are noise with a stack attached
    const statusCode =
      'statusCode' in err && typeof err.statusCode === 'number'
        ? err.statusCode
        : 'status' in err && typeof err.status === 'number'
          ? err.status
          : undefined
    const shouldIncludeStack = !statusCode || statusCode >= 500
    if ('stack' in err && err.stack && shouldIncludeStack) {
      serialized.stack = err.stack
    }

    if ('cause' in err && isSerializable(err.cause)) {
      serialized.cause = serialize(err.cause)
    }

    for (const [key, value] of Object.entries(err)) {
      if (
        !['message', 'stack', 'name', 'status', 'statusCode', 'type'].includes(
          key,
        )
      ) {
        serialized[key] = value
      }
    }

    return serialized
  }

  return serialize
}

function isSerializable(value: unknown): value is SerializableError {
  if (value == null) return false
  return (
    typeof value === 'object' ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  )
}

/**
 * Redacts credentials that may appear in request query strings.
 */
export function redactUrl(url: string): string {
  return url
    .replace(/([?&])apiKey=([^&]+)/gi, '$1apiKey=[REDACTED]')
    .replace(/([?&])api_key=([^&]+)/gi, '$1api_key=[REDACTED]')
    .replace(/([?&])token=([^&]+)/gi, '$1token=[REDACTED]')
}

function createRequestSerializer() {
  return (req: FastifyRequest) => ({
    method: req.method,
    url: redactUrl(req.url),
    host: req.headers.host,
    remoteAddress: req.ip,
    remotePort: req.socket.remotePort,
  })
}

/**
 * Generates rotated log names: `seerr-relay-current.log` for the active file,
 * `seerr-relay-YYYY-MM-DD[-index].log` once rotated.
 */
export function filename(time: number | Date, index?: number): string {
  if (!time) return 'seerr-relay-current.log'
  const date = typeof time === 'number' ? new Date(time) : time
  const year = date.getFullYear()
  const month = String(date.getMonth() + 1).padStart(2, '0')
  const day = String(date.getDate()).padStart(2, '0')
  const indexStr = index ? `-${index}` : ''
  return `seerr-relay-${year}-${month}-${day}${indexStr}.log`
}

/**
 * Opens the rotating log file under `data/logs`, falling back to stdout when
 * the directory cannot be created.
 */
function getFileStream(): rfs.RotatingFileStream | NodeJS.WriteStream {
  const logDirectory = resolve(projectRoot, 'data', 'logs')
  try {
    if (!fs.existsSync(logDirectory)) {
      fs.mkdirSync(logDirectory, { recursive: true })
    }
    return rfs.createStream(filename, {
      size: '10M',
      path: logDirectory,
      compress: 'gzip',
      maxFiles: 7,
    })
  } catch (err) {
    console.error('Failed to setup log directory:', err)
    return process.stdout
  }
}

const prettyOptions = {
  translateTime: 'HH:MM:ss Z',
  ignore: 'pid,hostname',
  colorize: true,
}

function getTerminalOptions(): LoggerOptions {
  return {
    level: 'info',
    transport: {
      target: 'pino-pretty',
      options: prettyOptions,
    },
    serializers: {
      req: createRequestSerializer(),
      error: createErrorSerializer(),
    },
  }
}

/**
 * Builds the Fastify logger options.
 *
 * Logs always go to the rotating file. Console output is on unless
 * `enableConsoleOutput=false`.
 */
export function createLoggerConfig(): RelayLoggerOptions {
  const enableConsoleOutput = process.env.enableConsoleOutput !== 'false'
  const fileStream = getFileStream()

  if (!enableConsoleOutput) {
    return {
      level: 'info',
      stream: fileStream,
      serializers: {
        req: createRequestSerializer(),
        error: createErrorSerializer(),
      },
    }
  }

  // Avoid double-logging if the file stream fell back to stdout
  if (fileStream === process.stdout) {
    return getTerminalOptions()
  }

  const prettyStream = pino.transport({
    target: 'pino-pretty',
    options: prettyOptions,
  })

  // Stream levels stay open; the logger level decides what is written
  const multistream = pino.multistream<Level>([
    { level: 'trace', stream: prettyStream },
    { level: 'trace', stream: fileStream },
  ])

  return {
    level: 'info',
    stream: multistream,
    serializers: {
      req: createRequestSerializer(),
      error: createErrorSerializer(),
    },
  }
}
