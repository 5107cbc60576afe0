import pino, { type Logger } from 'pino'

/**
 * Diagnostics go to stderr; stdout is reserved for command output such as
 * block payloads.
 */
export function createLogger(config: { logLevel?: string | undefined }): Logger {
  return pino(
    {
      level: config.logLevel ?? 'error',
    },
    pino.destination(2)
  )
}
