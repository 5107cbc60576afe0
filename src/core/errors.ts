/**
 * Error taxonomy shared by every CAR component.
 *
 * Each failure carries a stable `code` so callers (and the CLI exit-code
 * mapping) can branch on the kind without parsing messages.
 */

import type { CID } from 'multiformats/cid'

export type CarErrorCode =
  | 'ERR_MALFORMED_FRAMING'
  | 'ERR_TRUNCATED_INPUT'
  | 'ERR_MALFORMED_HEADER'
  | 'ERR_UNSUPPORTED_VERSION'
  | 'ERR_MALFORMED_IDENTIFIER'
  | 'ERR_MALFORMED_BLOCK_FRAMING'
  | 'ERR_INTEGRITY_VIOLATION'
  | 'ERR_IDENTIFIER_MISMATCH'
  | 'ERR_ARCHIVE_CLOSED'
  | 'ERR_NOT_FOUND'
  | 'ERR_INDEX_ARCHIVE_MISMATCH'
  | 'ERR_UNSUPPORTED_HASH'
  | 'ERR_MALFORMED_INDEX'
  | 'ERR_MALFORMED_ROW'

export interface CarErrorOptions {
  /** Byte offset in the archive (or index) where the failure was detected */
  offset?: number | undefined
  /** Identifier of the record involved, when known */
  cid?: CID | undefined
  cause?: unknown
}

export class CarError extends Error {
  readonly code: CarErrorCode
  readonly offset: number | undefined
  readonly cid: CID | undefined

  constructor(code: CarErrorCode, message: string, options: CarErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause })
    this.name = 'CarError'
    this.code = code
    this.offset = options.offset
    this.cid = options.cid
  }
}

export function isCarError(value: unknown, code?: CarErrorCode): value is CarError {
  return value instanceof CarError && (code === undefined || value.code === code)
}

/**
 * Record-level kinds: the cursor has already moved past the bad record, so a
 * scan may continue with the next one.
 */
export const RECORD_ERROR_CODES: ReadonlySet<CarErrorCode> = new Set([
  'ERR_MALFORMED_IDENTIFIER',
  'ERR_MALFORMED_BLOCK_FRAMING',
  'ERR_INTEGRITY_VIOLATION',
])

export function isRecordError(value: unknown): value is CarError {
  return value instanceof CarError && RECORD_ERROR_CODES.has(value.code)
}
