import pino, { type Logger, type LoggerOptions } from 'pino'

export interface CreateLoggerOptions {
  name: string
  level?: string
}

/**
 * Create a JSON logger. Evaluation contexts carry user identifiers, so they
 * are redacted wherever a caller logs a whole request.
 */
export function createLogger(options: CreateLoggerOptions): Logger {
  const { name, level = process.env.LOG_LEVEL ?? 'info' } = options

  const loggerOptions: LoggerOptions = {
    name,
    level,
    redact: {
      paths: ['userId', '*.userId', 'groups', '*.groups'],
      censor: '[REDACTED]',
    },
    formatters: {
      level: label => ({ level: label }),
    },
    base: null,
    serializers: {
      err: pino.stdSerializers.err,
    },
  }

  return pino(loggerOptions)
}

/** Logger that discards everything, for embedding and tests. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' })
}

export type { Logger }
