import type { Logger } from 'pino'
import type { RecordSpan } from '../core/seek/seek.js'

export interface SeekOptions {
  carPath: string
  /** Index file to look `cid` up in; not used with `span` */
  indexPath?: string | undefined
  /** Query CID in string form */
  cid?: string | undefined
  /** Read the record at this offset and length instead of going through an index */
  span?: RecordSpan | undefined
  verify?: boolean | undefined
  /** Print the block as a decoded `{ key, data }` row instead of raw bytes */
  rows?: boolean | undefined
  /** Where raw payloads go (default: process.stdout) */
  output?: NodeJS.WritableStream | undefined
  logger?: Logger | undefined
}

export interface SeekResult {
  cid: string
  offset: number
  length: number
  bytes: Uint8Array
}
