import { CommanderError } from 'commander'
import { isCarError } from '../core/errors.js'
import { EXIT_CODES, type ExitCode } from './constants.js'

/**
 * Bad command-line input (as opposed to bad archive data)
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}

/**
 * Map a failure to the exit code the CLI reports
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof CommanderError) {
    return error.exitCode === 0 ? EXIT_CODES.success : EXIT_CODES.usage
  }
  if (error instanceof UsageError) {
    return EXIT_CODES.usage
  }
  if (isCarError(error)) {
    switch (error.code) {
      case 'ERR_NOT_FOUND':
        return EXIT_CODES.notFound
      case 'ERR_ARCHIVE_CLOSED':
        return EXIT_CODES.failure
      default:
        return EXIT_CODES.dataError
    }
  }
  return EXIT_CODES.failure
}

/**
 * One-line diagnostic for stderr
 */
export function describeError(error: unknown): string {
  if (isCarError(error)) {
    const where = error.offset === undefined ? '' : ` (offset ${error.offset})`
    return `${error.code}: ${error.message}${where}`
  }
  return error instanceof Error ? error.message : String(error)
}
