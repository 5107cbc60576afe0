/**
 * Logging utilities for consistent output across TTY and non-TTY environments
 *
 * Provides a unified interface for command output that:
 * - Uses Clack's formatted output in TTY mode
 * - Falls back to plain console.log in non-TTY mode (pipes, scripts, tests)
 */

import { log as clackLog } from '@clack/prompts'
import pc from 'picocolors'

/**
 * Check if we're in TTY mode
 */
function isTTY(): boolean {
  return process.stdout.isTTY ?? false
}

/**
 * Buffer for collecting log lines to output together
 */
let lineBuffer: string[] = []

export { isTTY }

export const log = {
  /**
   * Add a line to the buffer (for batched output in TTY mode)
   */
  line(message: string): void {
    if (isTTY()) {
      lineBuffer.push(message)
    } else {
      console.log(message)
    }
  },

  /**
   * Flush any buffered lines
   */
  flush(): void {
    if (isTTY() && lineBuffer.length > 0) {
      clackLog.message(lineBuffer.join('\n'))
      lineBuffer = []
    }
  },

  success(message: string): void {
    if (isTTY()) {
      clackLog.success(message)
    } else {
      console.log(message)
    }
  },

  /**
   * Warnings go to stderr outside a TTY so they never mix with piped output
   */
  warn(message: string): void {
    if (isTTY()) {
      clackLog.warn(message)
    } else {
      console.error(message)
    }
  },

  /**
   * Log a section with title and content
   */
  section(title: string, content: string | string[]): void {
    const lines = Array.isArray(content) ? content : [content]

    if (isTTY()) {
      const output = [pc.bold(title), ...lines.map((line) => `  ${line}`)].join('\n')
      clackLog.message(output)
    } else {
      console.log(title)
      for (const line of lines) {
        console.log(`  ${line}`)
      }
    }
  },
}
