import type { Logger } from 'pino'
import type { CARReader, IndexEntry } from '../car/car-reader.js'
import { CARIndex } from './car-index.js'

export interface BuildIndexOptions {
  /**
   * Decode and verify every payload on the way. Without it only record
   * prefixes and CIDs are read.
   */
  readPayloads?: boolean
  logger?: Logger
}

/**
 * Index every remaining record of `reader` in one forward pass.
 *
 * The reader should be freshly opened (positioned after its header). Records
 * are collected, then sorted by CID; repeated CIDs keep their first record.
 */
export async function buildIndex(reader: CARReader, options: BuildIndexOptions = {}): Promise<CARIndex> {
  const { readPayloads = false, logger } = options
  const entries: IndexEntry[] = []

  if (readPayloads) {
    for await (const { cid, offset, length } of reader.blocks()) {
      entries.push({ cid, offset, length })
    }
  } else {
    for await (const entry of reader.entries()) {
      entries.push(entry)
    }
  }

  const index = CARIndex.fromEntries(entries, { logger })
  logger?.debug({ records: entries.length, entries: index.size }, 'CAR index built')
  return index
}
