import fs from 'node:fs'
import { config } from 'dotenv'
import type { FastifyBaseLogger, FastifyRequest } from 'fastify'
import type { LevelWithSilent, LoggerOptions } from 'pino'
import pino from 'pino'
import * as rfs from 'rotating-file-stream'
import { resolveEnvPath, resolveLogPath } from '@utils/data-dir.js'

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

type PhotoMirrorLoggerOptions =
  | LoggerOptions
  | FileLoggerOptions
  | MultiStreamLoggerOptions

type Serializable = Error | Record<string, unknown> | string | number | boolean

// Load .env file early for logger configuration
config({ path: resolveEnvPath() })

function isSerializable(value: unknown): value is Serializable {
  return (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    (typeof value === 'object' && value !== null)
  )
}

/**
 * Creates a custom error serializer that handles standard errors as well as
 * the API errors thrown by the Google Photos and OAuth clients.
 *
 * @returns A function that serializes error objects with message, stack, name, and custom properties.
 */
export function createErrorSerializer() {
  const serialize = (
    err: Serializable | null | undefined,
  ): Record<string, unknown> | null | undefined => {
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

    if (err instanceof TypeError) {
      serialized.type = 'TypeError'
    } else if (err instanceof RangeError) {
      serialized.type = 'RangeError'
    } else if (err instanceof AggregateError) {
      serialized.type = 'AggregateError'
    } else if (err instanceof Error) {
      serialized.type = 'Error'
    } else if ('name' in err && typeof err.name === 'string' && err.name) {
      serialized.type = err.name
    } else {
      serialized.type = 'UnknownError'
    }

    // Stack traces for 4xx responses are noise
    const status =
      'status' in err && typeof err.status === 'number' ? err.status : undefined
    const shouldIncludeStack = !status || status >= 500
    if ('stack' in err && err.stack && shouldIncludeStack) {
      serialized.stack = err.stack
    }

    // cause is often non-enumerable on Error
    if ('cause' in err && isSerializable(err.cause)) {
      serialized.cause = serialize(err.cause)
    }

    for (const [key, value] of Object.entries(err)) {
      if (!['message', 'stack', 'name', 'status', 'type'].includes(key)) {
        serialized[key] = value
      }
    }

    return serialized
  }

  return serialize
}

/**
 * Returns a serializer for Fastify requests that redacts OAuth tokens from
 * the URL.
 */
function createRequestSerializer() {
  return (req: FastifyRequest) => {
    const serialized = {
      method: req.method,
      url: req.url,
      host: req.headers.host,
      remoteAddress: req.ip,
      remotePort: req.socket.remotePort,
    }

    if (serialized.url) {
      serialized.url = serialized.url
        .replace(/([?&])access_token=([^&]+)/gi, '$1access_token=[REDACTED]')
        .replace(/([?&])refresh_token=([^&]+)/gi, '$1refresh_token=[REDACTED]')
        .replace(/([?&])token=([^&]+)/gi, '$1token=[REDACTED]')
    }

    return serialized
  }
}

/**
 * Generates a log filename using the given date and optional index.
 *
 * If no date or timestamp is provided, returns 'photo-mirror-current.log'.
 * Otherwise formats the filename as 'photo-mirror-YYYY-MM-DD[-index].log'.
 */
export function filename(time: number | Date, index?: number): string {
  if (!time) return 'photo-mirror-current.log'
  const date = typeof time === 'number' ? new Date(time) : time
  const year = date.getFullYear()
  const month = String(date.getMonth() + 1).padStart(2, '0')
  const day = String(date.getDate()).padStart(2, '0')
  const indexStr = index ? `-${index}` : ''
  return `photo-mirror-${year}-${month}-${day}${indexStr}.log`
}

/**
 * Creates a rotating file stream for logging, ensuring the log directory
 * exists. Falls back to standard output if the directory cannot be created.
 */
function getFileStream(): rfs.RotatingFileStream | NodeJS.WriteStream {
  const logDirectory = resolveLogPath()
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

function getFileOptions(): FileLoggerOptions {
  return {
    level: 'info',
    stream: getFileStream(),
    serializers: {
      req: createRequestSerializer(),
      error: createErrorSerializer(),
    },
  }
}

/**
 * Generates logger configuration options based on environment variables.
 *
 * Always logs to file. Console output is controlled by
 * `enableConsoleOutput` (default: true).
 */
export function createLoggerConfig(): PhotoMirrorLoggerOptions {
  const enableConsoleOutput = process.env.enableConsoleOutput !== 'false'

  if (enableConsoleOutput) {
    console.log(
      `Setting up logger - Console: ${enableConsoleOutput}, File: always`,
    )
  }

  const fileStream = getFileStream()

  if (!enableConsoleOutput) {
    return getFileOptions()
  }

  // Avoid double-logging if file stream fell back to stdout
  if (fileStream === process.stdout) {
    return getTerminalOptions()
  }

  const prettyStream = pino.transport({
    target: 'pino-pretty',
    options: prettyOptions,
  })

  const multistream = pino.multistream([
    { stream: prettyStream },
    { stream: fileStream },
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

/**
 * Creates a child logger whose messages are prefixed with the service tag,
 * e.g. `[PHOTO_SYNC] Starting run`.
 */
export function createServiceLogger(
  baseLog: FastifyBaseLogger,
  service: string,
): FastifyBaseLogger {
  return baseLog.child({}, { msgPrefix: `[${service.toUpperCase()}] ` })
}
