import type { Logger } from 'pino'

export interface WriteOptions {
  carPath: string
  /** Input lines: `<key> <data>` rows, or `<cid> <data>` blocks in raw mode */
  lines: Iterable<string> | AsyncIterable<string>
  raw?: boolean | undefined
  /** In raw mode, refuse lines whose data does not hash to their CID */
  validate?: boolean | undefined
  /** Also save the index the writer produces, at this path */
  indexPath?: string | undefined
  logger?: Logger | undefined
}

export interface WriteResult {
  carPath: string
  indexPath?: string | undefined
  roots: string[]
  blocks: number
  skipped: number
  size: number
}
