/**
 * Structured logging for zsk-roller, built on pino.
 */

import pino from 'pino'
import type { DestinationStream, Logger } from 'pino'

/** Options for {@link createLogger}. */
export interface CreateLoggerOptions {
  /** Log at `debug` instead of `info`. */
  verbose?: boolean | undefined
  /** Where log lines are written. Defaults to stderr. */
  destination?: DestinationStream | undefined
}

/**
 * Create the logger used by the command line. Credentials are redacted
 * wherever they appear in a logged object.
 * @public
 */
export function createLogger(options?: CreateLoggerOptions): Logger {
  return pino(
    {
      name: 'zsk-roller',
      level: options?.verbose === true ? 'debug' : 'info',
      redact: {
        paths: ['credentials.password', '*.password', 'password', 'authorization'],
        censor: '[REDACTED]',
      },
    },
    options?.destination ?? pino.destination(2),
  )
}

/**
 * A logger that discards everything. Used when the library is embedded
 * without a logger.
 * @public
 */
export function silentLogger(): Logger {
  return pino({ level: 'silent' })
}
