import type { Logger } from 'pino'

export interface IndexOptions {
  carPath: string
  /** Where to write the index (default: `<carPath>.idx`) */
  outputPath?: string | undefined
  /** List every entry after building */
  print?: boolean | undefined
  /** With `print`, label row blocks by their key */
  rows?: boolean | undefined
  /** Read and verify every payload instead of skipping over them */
  verify?: boolean | undefined
  chunkSize?: number | undefined
  logger?: Logger | undefined
}

export interface IndexResult {
  carPath: string
  indexPath: string
  entries: number
}
