/**
 * Sorted CID → record-span index over one archive.
 *
 * On disk the index is a stream of frames, one per entry, each holding the
 * canonical CID bytes followed by the record offset and length as big-endian
 * u64s. Entries are sorted strictly ascending by CID bytes, which is what
 * makes `find()` a binary search.
 */

import type { CID } from 'multiformats/cid'
import type { Logger } from 'pino'
import type { IndexEntry } from '../car/car-reader.js'
import { decodeFrame, encodeFrame } from '../car/frame.js'
import { compareBytes, compareCids, decodeCidPrefix } from '../cid/index.js'
import { CarError } from '../errors.js'

/** Bytes after the CID in every index record: offset and length as u64 */
const SPAN_LENGTH = 16

export interface CARIndexOptions {
  logger?: Logger | undefined
}

export class CARIndex {
  private readonly sorted: readonly Readonly<IndexEntry>[]

  private constructor(sorted: Readonly<IndexEntry>[]) {
    this.sorted = Object.freeze(sorted)
  }

  /**
   * Sort entries by CID. When a CID occurs more than once the entry that came
   * first in `entries` (the earliest record in the archive) is kept.
   */
  static fromEntries(entries: Iterable<IndexEntry>, options: CARIndexOptions = {}): CARIndex {
    // Array#sort is stable, so the first occurrence leads each run of equal CIDs
    const all = [...entries].sort((a, b) => compareCids(a.cid, b.cid))
    const unique: Readonly<IndexEntry>[] = []
    let dropped = 0
    for (const entry of all) {
      const last = unique[unique.length - 1]
      if (last !== undefined && compareCids(last.cid, entry.cid) === 0) {
        dropped++
        continue
      }
      unique.push(Object.freeze({ cid: entry.cid, offset: entry.offset, length: entry.length }))
    }

    if (dropped > 0) {
      options.logger?.warn({ dropped }, 'Duplicate CIDs in archive, keeping the first occurrence of each')
    }

    return new CARIndex(unique)
  }

  /**
   * Parse an index file, checking that its entries are strictly ascending
   */
  static decode(bytes: Uint8Array): CARIndex {
    const entries: Readonly<IndexEntry>[] = []
    let offset = 0
    while (offset < bytes.length) {
      const { payload, length } = decodeFrame(bytes, offset)
      const entry = decodeIndexRecord(payload, offset)

      const previous = entries[entries.length - 1]
      if (previous !== undefined && compareCids(previous.cid, entry.cid) >= 0) {
        throw new CarError('ERR_MALFORMED_INDEX', `Index entry at offset ${offset} is out of order or duplicated`, {
          offset,
          cid: entry.cid,
        })
      }

      entries.push(Object.freeze(entry))
      offset += length
    }
    return new CARIndex(entries)
  }

  get size(): number {
    return this.sorted.length
  }

  /**
   * Entries in ascending CID order. Both the list and its entries are frozen.
   */
  get entries(): readonly Readonly<IndexEntry>[] {
    return this.sorted
  }

  /**
   * Binary search for `cid`
   */
  find(cid: CID): Readonly<IndexEntry> | undefined {
    const key = cid.bytes
    let low = 0
    let high = this.sorted.length - 1
    while (low <= high) {
      const middle = (low + high) >>> 1
      const entry = this.sorted[middle]
      if (entry === undefined) break
      const order = compareBytes(entry.cid.bytes, key)
      if (order === 0) return entry
      if (order < 0) {
        low = middle + 1
      } else {
        high = middle - 1
      }
    }
    return undefined
  }

  /**
   * Like `find()`, but a miss is a `NotFound` error
   */
  get(cid: CID): Readonly<IndexEntry> {
    const entry = this.find(cid)
    if (entry === undefined) {
      throw new CarError('ERR_NOT_FOUND', `Block not found: ${cid.toString()}`, { cid })
    }
    return entry
  }

  has(cid: CID): boolean {
    return this.find(cid) !== undefined
  }

  encode(): Uint8Array {
    const records = this.sorted.map((entry) => encodeFrame(entry.cid.bytes, encodeSpan(entry.offset, entry.length)))
    const out = new Uint8Array(records.reduce((sum, record) => sum + record.length, 0))
    let cursor = 0
    for (const record of records) {
      out.set(record, cursor)
      cursor += record.length
    }
    return out
  }
}

function encodeSpan(offset: number, length: number): Uint8Array {
  const span = new Uint8Array(SPAN_LENGTH)
  const view = new DataView(span.buffer)
  view.setBigUint64(0, BigInt(offset))
  view.setBigUint64(8, BigInt(length))
  return span
}

function decodeIndexRecord(payload: Uint8Array, position: number): IndexEntry {
  const [cid, cidLength] = decodeCidPrefix(payload)
  const span = payload.subarray(cidLength)
  if (span.length !== SPAN_LENGTH) {
    throw new CarError(
      'ERR_MALFORMED_INDEX',
      `Index record at offset ${position} has ${span.length} bytes after its CID, expected ${SPAN_LENGTH}`,
      { offset: position, cid }
    )
  }

  const view = new DataView(span.buffer, span.byteOffset, span.byteLength)
  const offset = view.getBigUint64(0)
  const length = view.getBigUint64(8)
  if (offset > BigInt(Number.MAX_SAFE_INTEGER) || length > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new CarError('ERR_MALFORMED_INDEX', `Index record at offset ${position} is out of range`, {
      offset: position,
      cid,
    })
  }

  return { cid, offset: Number(offset), length: Number(length) }
}
