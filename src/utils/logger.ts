import fs from 'node:fs'
import type { Level, LevelWithSilent, Logger, LoggerOptions } from 'pino'
import pino from 'pino'
import * as rfs from 'rotating-file-stream'
import { resolveLogPath } from '@utils/data-dir.js'

export const validLogLevels = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
] as const satisfies readonly LevelWithSilent[]

export interface LoggerSettings {
  dataDir: string
  logLevel: LevelWithSilent
  enableConsoleOutput: boolean
}

type SerializableError = Error | Record<string, unknown> | string | number | boolean

/**
 * Creates an error serializer that keeps message, name, code, stack and the cause chain.
 *
 * @returns A function that serializes thrown values into plain objects
 */
export function createErrorSerializer() {
  const serialize = (err: SerializableError): unknown => {
    if (err == null) {
      return err
    }

    if (typeof err !== 'object') {
      return { message: String(err), type: `${typeof err}Error` }
    }

    const serialized: Record<string, unknown> = {}

    if ('message' in err && err.message) serialized.message = err.message
    if ('name' in err && err.name) serialized.name = err.name
    if ('code' in err && err.code !== undefined) serialized.code = err.code
    serialized.type = err instanceof Error ? err.constructor.name : 'UnknownError'

    if ('stack' in err && err.stack) {
      serialized.stack = err.stack
    }

    // cause is non-enumerable on Error
    if ('cause' in err && err.cause) {
      const cause = err.cause
      serialized.cause =
        cause instanceof Error ||
        typeof cause === 'string' ||
        typeof cause === 'number' ||
        typeof cause === 'boolean'
          ? serialize(cause)
          : String(cause)
    }

    for (const [key, value] of Object.entries(err)) {
      if (!['message', 'stack', 'name', 'code', 'type'].includes(key)) {
        serialized[key] = value
      }
    }

    return serialized
  }

  return serialize
}

/**
 * Generates a log filename using the given date and optional index.
 *
 * If no date is provided, returns 'sticker-sync-current.log'. Otherwise formats
 * the filename as 'sticker-sync-YYYY-MM-DD[-index].log'.
 */
export function filename(time: number | Date, index?: number): string {
  if (!time) return 'sticker-sync-current.log'
  const date = typeof time === 'number' ? new Date(time) : time
  const year = date.getFullYear()
  const month = String(date.getMonth() + 1).padStart(2, '0')
  const day = String(date.getDate()).padStart(2, '0')
  const indexStr = index ? `-${index}` : ''
  return `sticker-sync-${year}-${month}-${day}${indexStr}.log`
}

/**
 * Creates a rotating file stream under {dataDir}/logs.
 *
 * @returns The stream, or null when the log directory cannot be created
 */
function getFileStream(dataDir: string): rfs.RotatingFileStream | null {
  const logDirectory = resolveLogPath(dataDir)
  try {
    fs.mkdirSync(logDirectory, { recursive: true })
    return rfs.createStream(filename, {
      size: '10M',
      path: logDirectory,
      compress: 'gzip',
      maxFiles: 7,
    })
  } catch (err) {
    console.error('Failed to setup log directory:', err)
    return null
  }
}

const prettyOptions = {
  translateTime: 'HH:MM:ss',
  ignore: 'pid,hostname,service',
  messageFormat: '{if service}[{service}] {end}{msg}',
  colorize: true,
}

/**
 * Creates the application logger.
 *
 * Logs always go to the rotating file; the terminal gets a pretty-printed
 * copy unless console output is disabled.
 */
export function createLogger(settings: LoggerSettings): Logger {
  const options: LoggerOptions = {
    level: settings.logLevel,
    serializers: {
      error: createErrorSerializer(),
      err: createErrorSerializer(),
    },
  }

  if (settings.logLevel === 'silent') {
    return pino(options)
  }

  const fileStream = getFileStream(settings.dataDir)
  const streams: pino.StreamEntry[] = []
  const level: Level = settings.logLevel

  if (settings.enableConsoleOutput || !fileStream) {
    streams.push({
      level,
      stream: pino.transport({ target: 'pino-pretty', options: prettyOptions }),
    })
  }
  if (fileStream) {
    streams.push({ level, stream: fileStream })
  }

  return pino(options, pino.multistream(streams))
}

/**
 * Child logger tagged with the service it belongs to
 */
export function createServiceLogger(base: Logger, service: string): Logger {
  return base.child({ service })
}
