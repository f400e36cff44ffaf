/**
 * Structured logger for the bootstrap run, built on Pino
 * Keeps the (message, data) call style used across the provisioning steps
 */
import pino from 'pino'
import { createStream, type RotatingFileStream } from 'rotating-file-stream'
import * as path from 'path'
import { parseLevel } from './logLevel'

const logLevel = parseLevel(process.env.LOG_LEVEL)

// process.pkg is defined when code runs inside a pkg-bundled executable
const isPkgBundle = 'pkg' in process
const isProduction = process.env.NODE_ENV === 'production'

const logFilePath = process.env.LOG_FILE

// pino-pretty runs in a worker thread, which pkg bundles cannot load
const usePrettyPrint = !isPkgBundle && !isProduction && process.env.LOG_FORMAT !== 'json' && !logFilePath

function timestamp(): string {
  const now = new Date()
  const hours = now.getHours().toString().padStart(2, '0')
  const minutes = now.getMinutes().toString().padStart(2, '0')
  const seconds = now.getSeconds().toString().padStart(2, '0')
  const ms = now.getMilliseconds().toString().padStart(3, '0')
  return `,"time":"${hours}:${minutes}:${seconds}.${ms}"`
}

/**
 * Create rotating file stream when LOG_FILE is set
 */
function createRotatingFileStream(): RotatingFileStream | undefined {
  if (!logFilePath) {
    return undefined
  }

  try {
    const stream = createStream(path.basename(logFilePath), {
      path: path.dirname(logFilePath),
      size: '10M',
      interval: '1d',
      maxFiles: 10,
      compress: 'gzip',
    })

    console.log(`[Logger] File logging enabled: ${logFilePath}`)
    return stream
  } catch (error: unknown) {
    console.warn(`[Logger] Failed to create rotating file stream: ${error instanceof Error ? error.message : String(error)}`)
    return undefined
  }
}

function createLogger(): pino.Logger {
  const baseConfig: pino.LoggerOptions = {
    level: logLevel,
    base: {
      pid: process.pid,
      hostname: process.env.HOSTNAME || 'unknown',
    },
    timestamp,
  }

  const fileStream = createRotatingFileStream()

  try {
    if (fileStream) {
      return pino(baseConfig, fileStream)
    }

    if (usePrettyPrint) {
      return pino({
        ...baseConfig,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss.l',
            ignore: 'pid,hostname',
            singleLine: false,
          },
        },
      })
    }

    // Info/debug/warn → stdout, error/fatal → stderr
    return pino(baseConfig, pino.multistream([
      { level: 'trace', stream: process.stdout },
      { level: 'error', stream: process.stderr },
    ]))
  } catch (error: unknown) {
    console.warn('[Logger] Failed to initialize with transport, falling back to JSON output:', error instanceof Error ? error.message : String(error))
    return pino(baseConfig)
  }
}

const pinoLogger = createLogger()

/**
 * Flush buffered logs before the process exits
 */
export function flushLogs(): void {
  try {
    pinoLogger.flush()
  } catch (error: unknown) {
    console.warn('[Logger] Flush failed:', error instanceof Error ? error.message : String(error))
  }
}

export function setLogLevel(level: string): void {
  pinoLogger.level = parseLevel(level)
}

type LogMethod = 'debug' | 'info' | 'warn' | 'error'

function write(method: LogMethod, messageOrData: string | object, dataOrMessage?: object | string): void {
  if (typeof messageOrData === 'string') {
    pinoLogger[method](typeof dataOrMessage === 'object' ? dataOrMessage : {}, messageOrData)
  } else {
    pinoLogger[method](messageOrData, typeof dataOrMessage === 'string' ? dataOrMessage : undefined)
  }
}

/**
 * Supports both logger.info('message', { data }) and logger.info({ data }, 'message')
 */
export const logger = {
  debug(messageOrData: string | object, dataOrMessage?: object | string) {
    write('debug', messageOrData, dataOrMessage)
  },

  info(messageOrData: string | object, dataOrMessage?: object | string) {
    write('info', messageOrData, dataOrMessage)
  },

  warn(messageOrData: string | object, dataOrMessage?: object | string) {
    write('warn', messageOrData, dataOrMessage)
  },

  error(messageOrData: string | object, dataOrMessage?: object | string) {
    write('error', messageOrData, dataOrMessage)
  },
}

export default logger
