/**
 * Process exit codes, distinct per failure class so scripts can branch on them
 */
export const EXIT_CODES = {
  success: 0,
  failure: 1,
  usage: 2,
  dataError: 3,
  notFound: 4,
} as const

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES]

/**
 * Bytes of payload shown per block by `read` before truncating
 */
export const PREVIEW_LENGTH = 64
