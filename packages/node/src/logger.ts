/**
 * @watchpane/node - Logger
 *
 * JSON-lines file logger. The terminal belongs to the viewer while it
 * runs, so nothing is logged to the console: without a log file the
 * logger is silent.
 */

import winston from 'winston'

// =============================================================================
// Types
// =============================================================================

export type Logger = winston.Logger

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

/**
 * Logger configuration options.
 */
export interface LoggerOptions {
  /** File to append log lines to (default: none, logger is silent) */
  file?: string | null

  /** Minimum level written (default: 'info') */
  level?: LogLevel
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value)
}

// =============================================================================
// Format
// =============================================================================

/** One JSON object per line, metadata flattened next to the message */
const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const entry: Record<string, unknown> = {
      timestamp,
      level,
      pid: process.pid,
      message
    }
    for (const [key, value] of Object.entries(meta)) {
      entry[key] = value
    }
    return JSON.stringify(entry)
  })
)

// =============================================================================
// Factory
// =============================================================================

/**
 * Create the viewer's logger.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ file: '/tmp/watchpane.log', level: 'debug' })
 * logger.info('reloaded', { offset: 12, lineCount: 240 })
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const file = options.file ?? null

  if (file === null) {
    return winston.createLogger({
      level: options.level ?? 'info',
      silent: true,
      transports: [new winston.transports.Console()]
    })
  }

  return winston.createLogger({
    level: options.level ?? 'info',
    format: logFormat,
    transports: [new winston.transports.File({ filename: file })],
    exitOnError: false
  })
}

/**
 * Flush pending writes and close the logger's transports.
 */
export function closeLogger(logger: Logger): Promise<void> {
  return new Promise<void>((resolve) => {
    logger.on('finish', () => resolve())
    logger.end()
  })
}
