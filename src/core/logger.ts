import { pino, destination, type Logger } from 'pino'
import type { LogLevel } from './config.js'

export type { Logger }

/**
 * Root logger. Writes JSON lines to stderr so that stdout carries only
 * the tables the CLI prints.
 */
export function createLogger(level: LogLevel = 'warn'): Logger {
  return pino(
    {
      name: 'market-data-scraper',
      level,
    },
    destination(2),
  )
}

/** Logger for tests and library callers that do not care about diagnostics. */
export const silentLogger: Logger = pino({ level: 'silent' })

/** Remove the FRED api_key query parameter before a URL reaches a log line. */
export function redactUrl(url: string): string {
  return url.replace(/([?&]api_key=)[^&]*/i, '$1[redacted]')
}
