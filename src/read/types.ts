import type { Logger } from 'pino'

export interface ReadOptions {
  carPath: string
  verify?: boolean | undefined
  /** Decode dag-cbor blocks as `{ key, data }` rows */
  rows?: boolean | undefined
  chunkSize?: number | undefined
  logger?: Logger | undefined
}

export interface ReadResult {
  carPath: string
  version: number
  roots: string[]
  blocks: number
  payloadBytes: number
  verified: number
}
