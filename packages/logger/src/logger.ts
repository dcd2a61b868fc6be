import pino from 'pino'

/**
 * Log levels:
 * - fatal (60): Application crash
 * - error (50): Error messages
 * - warn (40): Warning messages
 * - info (30): General informational messages (default)
 * - debug (20): Debug messages
 * - trace (10): Very detailed trace messages
 */
type LogLevel = pino.LevelWithSilent

type LogFn = (message: string, details?: unknown) => void

type Logger = {
  fatal: LogFn
  error: LogFn
  warn: LogFn
  info: LogFn
  debug: LogFn
  trace: LogFn
  child: (bindings: Record<string, unknown>) => Logger
}

const LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

function resolveLevel(value: string | undefined): LogLevel {
  const match = LEVELS.find(level => level === value?.toLowerCase())
  return match ?? 'info'
}

// LOG_FORMAT=json skips the pretty transport (and its worker thread)
const usePretty = process.env.LOG_FORMAT !== 'json'

const baseLogger = pino({
  level: resolveLevel(process.env.LOG_LEVEL),
  redact: ['apiToken', 'headers["x-cloud-api-token"]'],
  ...(usePretty
    ? {
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:HH:MM:ss',
            ignore: 'pid,hostname',
            messageFormat: '[{context}] {msg}',
            customColors: 'fatal:bgRed,error:red,warn:yellow,info:cyan,debug:green,trace:gray'
          }
        }
      }
    : {})
})

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Adapts pino's (mergingObject, message) order to (message, details).
 * Errors land under `err` so pino serializes their stack.
 */
const wrap = (logger: pino.Logger): Logger => {
  const bind = (level: Exclude<LogLevel, 'silent'>): LogFn => {
    return (message, details) => {
      if (details === undefined) {
        logger[level](message)
      } else if (details instanceof Error) {
        logger[level]({ err: details }, message)
      } else if (isRecord(details)) {
        logger[level](details, message)
      } else {
        logger[level](`${message} ${String(details)}`)
      }
    }
  }

  return {
    fatal: bind('fatal'),
    error: bind('error'),
    warn: bind('warn'),
    info: bind('info'),
    debug: bind('debug'),
    trace: bind('trace'),
    child: bindings => wrap(logger.child(bindings))
  }
}

/**
 * Root logger.
 *
 * ```typescript
 * import { log } from '@workspace/logger'
 *
 * log.info('Pool warmed up', { ready: 4 })
 * log.error('Provisioning failed', error)
 * ```
 *
 * ```bash
 * LOG_LEVEL=debug npm run cli -- fetch --config=./cloud-browser.json --urls=https://example.com
 * ```
 */
export const log = wrap(baseLogger)

/**
 * Child logger tagged with a `context` binding.
 *
 * @example
 * ```typescript
 * const poolLog = createLogger('browser-pool')
 * poolLog.debug('Slot refilled', { slotIndex: 2 })
 * ```
 */
export function createLogger(context: string): Logger {
  return wrap(baseLogger.child({ context }))
}

export function setLogLevel(level: LogLevel) {
  baseLogger.level = level
}

export type { Logger, LogFn, LogLevel }
