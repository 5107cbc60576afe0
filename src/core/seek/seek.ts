/**
 * Random-access lookup of single blocks through a CAR index.
 *
 * A lookup touches only the bytes of the matched record: one size check and
 * one positioned read, whatever the size of the archive.
 */

import type { CID } from 'multiformats/cid'
import type { Logger } from 'pino'
import { type CARBlock, decodeBlockBody, verifyBlock } from '../car/car-reader.js'
import type { ByteSource } from '../car/car-storage-backend.js'
import { decodeVarint } from '../car/frame.js'
import { DEFAULT_HASHERS, type HasherTable } from '../cid/index.js'
import { CarError } from '../errors.js'
import type { CARIndex } from './car-index.js'

export interface SeekOptions {
  verify?: boolean
  hashers?: HasherTable
  logger?: Logger
}

export interface RecordSpan {
  offset: number
  length: number
}

/**
 * Decode the single record occupying `span` of `source`.
 *
 * The span must lie inside the source and the record's own length prefix must
 * account for exactly `span.length` bytes; anything else means the span came
 * from a different (or since modified) archive.
 */
export async function readBlockAt(source: ByteSource, span: RecordSpan, options: SeekOptions = {}): Promise<CARBlock> {
  const { offset, length } = span
  const size = await source.size()
  if (offset < 0 || length <= 0 || offset + length > size) {
    throw new CarError(
      'ERR_INDEX_ARCHIVE_MISMATCH',
      `Record span ${offset}+${length} falls outside the ${size} byte archive`,
      { offset }
    )
  }

  const record = await source.read(offset, length)
  if (record.length !== length) {
    throw new CarError('ERR_TRUNCATED_INPUT', `Read ${record.length} of ${length} bytes at offset ${offset}`, {
      offset,
    })
  }

  const { cid, bytes } = decodeRecord(record, span)
  const block: CARBlock = { cid, bytes, offset, length }

  if (options.verify === true) {
    await verifyBlock(block, options.hashers ?? DEFAULT_HASHERS)
  }

  options.logger?.debug({ cid: cid.toString(), offset, length }, 'Block read at offset')
  return block
}

/**
 * Decode a record read at `span`. Bytes that do not parse as a record mean the
 * span does not point at one, so framing errors become `IndexArchiveMismatch`.
 */
function decodeRecord(record: Uint8Array, { offset, length }: RecordSpan): { cid: CID; bytes: Uint8Array } {
  try {
    const prefix = decodeVarint(record, 0, offset)
    if (prefix.bytes + prefix.value !== length) {
      throw new CarError(
        'ERR_INDEX_ARCHIVE_MISMATCH',
        `Record at offset ${offset} spans ${prefix.bytes + prefix.value} bytes, index says ${length}`,
        { offset }
      )
    }
    return decodeBlockBody(record.subarray(prefix.bytes), offset)
  } catch (error) {
    if (!(error instanceof CarError) || error.code === 'ERR_INDEX_ARCHIVE_MISMATCH') throw error
    throw new CarError('ERR_INDEX_ARCHIVE_MISMATCH', `No block record at offset ${offset}: ${error.message}`, {
      offset,
      cause: error,
    })
  }
}

/**
 * Look `cid` up in `index` and read its record from `source`.
 * A miss fails with `NotFound`.
 */
export async function seekBlock(
  source: ByteSource,
  index: CARIndex,
  cid: CID,
  options: SeekOptions = {}
): Promise<CARBlock> {
  const entry = index.get(cid)
  const block = await readBlockAt(source, entry, options)
  if (!block.cid.equals(cid)) {
    throw new CarError(
      'ERR_INDEX_ARCHIVE_MISMATCH',
      `Index points ${cid} at offset ${entry.offset}, which holds ${block.cid.toString()}`,
      { offset: entry.offset, cid }
    )
  }
  return block
}
