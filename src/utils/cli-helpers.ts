/**
 * Shared CLI helper utilities for consistent command-line experience
 */

import { intro as clackIntro, outro as clackOutro, spinner as clackSpinner } from '@clack/prompts'
import { isTTY, log } from './cli-logger.js'

/**
 * Spinner interface for progress indication
 * Works in both TTY and non-TTY environments
 */
export type Spinner = {
  start: (msg: string) => void
  message: (msg: string) => void
  stop: (msg?: string) => void
}

/**
 * Creates a spinner that works in both TTY and non-TTY environments
 *
 * In TTY mode: Uses @clack/prompts spinner for nice visual feedback
 * In non-TTY mode: Prints only the completion message
 */
export function createSpinner(): Spinner {
  if (isTTY()) {
    return clackSpinner()
  }
  return {
    start(_msg: string) {
      // Don't print start messages in non-TTY
    },
    message(_msg: string) {
      // Don't print progress messages in non-TTY
    },
    stop(msg?: string) {
      if (msg) {
        log.line(msg)
      }
    },
  }
}

/**
 * Show intro message with proper TTY handling
 */
export function intro(message: string): void {
  if (isTTY()) {
    clackIntro(message)
  } else {
    log.line(message)
  }
}

/**
 * Display a success/completion message
 */
export function outro(message: string): void {
  if (isTTY()) {
    clackOutro(message)
  } else {
    console.log(message)
  }
}

/**
 * Format file size for human-readable display
 */
export function formatFileSize(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB', 'TB']
  let size = bytes
  let unitIndex = 0

  while (size >= 1024 && unitIndex < units.length - 1) {
    size /= 1024
    unitIndex++
  }

  return `${size.toFixed(1)} ${units[unitIndex]}`
}

/**
 * Printable preview of a payload: decoded as UTF-8, quoted and escaped,
 * truncated to `maxBytes`
 */
export function formatPayload(bytes: Uint8Array, maxBytes: number = Number.POSITIVE_INFINITY): string {
  const shown = bytes.length > maxBytes ? bytes.subarray(0, maxBytes) : bytes
  const text = JSON.stringify(new TextDecoder().decode(shown))
  return bytes.length > maxBytes ? `${text}…` : text
}
