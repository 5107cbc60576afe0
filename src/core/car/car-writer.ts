/**
 * Sequential CAR writer.
 *
 * The header goes out as soon as the writer is created; every `put()` then
 * appends one record in call order. Closing returns the index of everything
 * written, so a freshly built archive needs no second pass to be seekable.
 */

import type { CID } from 'multiformats/cid'
import type { Logger } from 'pino'
import { DEFAULT_HASHERS, type HasherTable, verifyDigest } from '../cid/index.js'
import { CarError } from '../errors.js'
import { CARIndex } from '../seek/car-index.js'
import type { IndexEntry } from './car-reader.js'
import type { ByteSink } from './car-storage-backend.js'
import { encodeFrame } from './frame.js'
import { CAR_VERSION, encodeHeader } from './header.js'

export interface CARWriterOptions {
  roots?: CID[]
  version?: number
  /** Refuse payloads whose digest does not match their CID */
  validate?: boolean
  hashers?: HasherTable
  logger?: Logger
}

/**
 * Statistics about CAR writer operations
 */
export interface CARWriterStats {
  blocksWritten: number
  /** Bytes written to the sink, header included */
  totalSize: number
  startTime: number
  finalized: boolean
}

export interface BlockInput {
  cid: CID
  bytes: Uint8Array
}

export class CARWriter {
  readonly roots: CID[]
  readonly version: number
  private readonly sink: ByteSink
  private readonly validate: boolean
  private readonly hashers: HasherTable
  private readonly logger: Logger | undefined
  private readonly entries: IndexEntry[] = []
  private readonly stats: CARWriterStats
  private currentOffset: number
  private finalized = false
  /** Set once a sink write rejects; the archive on the sink is then incomplete */
  private failure: unknown
  private failed = false

  private constructor(sink: ByteSink, options: CARWriterOptions, headerSize: number) {
    this.sink = sink
    this.roots = [...(options.roots ?? [])]
    this.version = options.version ?? CAR_VERSION
    this.validate = options.validate ?? false
    this.hashers = options.hashers ?? DEFAULT_HASHERS
    this.logger = options.logger
    this.currentOffset = headerSize
    this.stats = {
      blocksWritten: 0,
      totalSize: headerSize,
      startTime: Date.now(),
      finalized: false,
    }
  }

  /**
   * Create a writer and emit the header to `sink`
   */
  static async create(sink: ByteSink, options: CARWriterOptions = {}): Promise<CARWriter> {
    const header = encodeHeader({ version: options.version ?? CAR_VERSION, roots: options.roots ?? [] })
    await sink.write(header)
    options.logger?.debug({ roots: options.roots?.length ?? 0, headerSize: header.length }, 'CAR header written')
    return new CARWriter(sink, options, header.length)
  }

  /**
   * Append a block record. Identical calls produce identical, separate records.
   *
   * @returns where the record landed
   */
  async put(cid: CID, bytes: Uint8Array): Promise<IndexEntry> {
    this.assertOpen()
    this.assertHealthy()

    if (this.validate) {
      const matches = await verifyDigest(cid.multihash, bytes, this.hashers)
      if (!matches) {
        throw new CarError('ERR_IDENTIFIER_MISMATCH', `Payload does not hash to ${cid.toString()}`, { cid })
      }
      // close() or a failed write may have happened while hashing
      this.assertOpen()
      this.assertHealthy()
    }

    const record = encodeFrame(cid.bytes, bytes)
    const entry: IndexEntry = { cid, offset: this.currentOffset, length: record.length }

    // Claim the offset in the same tick as the write so entries follow the sink's order
    this.currentOffset += record.length
    this.entries.push(entry)
    this.stats.blocksWritten++
    this.stats.totalSize += record.length

    try {
      await this.sink.write(record)
    } catch (error) {
      this.failed = true
      this.failure = error
      throw error
    }

    this.logger?.debug({ cid: cid.toString(), offset: entry.offset, length: entry.length }, 'Block record written')
    return entry
  }

  /**
   * Flush and close the sink.
   *
   * @returns an index over the records written (first occurrence wins for repeated CIDs)
   */
  async close(): Promise<CARIndex> {
    this.assertOpen()
    this.assertHealthy()
    this.finalized = true
    this.stats.finalized = true
    await this.sink.close()

    this.logger?.debug({ blocks: this.stats.blocksWritten, totalSize: this.stats.totalSize }, 'CAR finalized')
    return CARIndex.fromEntries(this.entries, { logger: this.logger })
  }

  /**
   * Close the sink without producing an index. This is the only way to release
   * a writer whose sink rejected a write.
   * Safe to call on a finalized writer.
   */
  async abort(): Promise<void> {
    if (this.finalized) return
    this.finalized = true
    await this.sink.close()
  }

  getStats(): CARWriterStats {
    return { ...this.stats }
  }

  private assertOpen(): void {
    if (this.finalized) {
      throw new CarError('ERR_ARCHIVE_CLOSED', 'CAR writer has already been finalized')
    }
  }

  private assertHealthy(): void {
    if (this.failed) {
      throw new CarError('ERR_ARCHIVE_CLOSED', 'CAR writer failed on an earlier write; the archive is incomplete', {
        cause: this.failure,
      })
    }
  }
}

/**
 * Write a complete archive in one call
 */
export async function writeCar(
  sink: ByteSink,
  blocks: Iterable<BlockInput> | AsyncIterable<BlockInput>,
  options: CARWriterOptions = {}
): Promise<CARIndex> {
  const writer = await CARWriter.create(sink, options)
  for await (const { cid, bytes } of blocks) {
    await writer.put(cid, bytes)
  }
  return await writer.close()
}
