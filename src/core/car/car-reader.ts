/**
 * Streaming CAR reader.
 *
 * Decodes the header up front, then yields block records one at a time in
 * archive order. Nothing is buffered beyond the record being decoded.
 */

import type { CID } from 'multiformats/cid'
import type { Logger } from 'pino'
import {
  decodeCidPrefix,
  DEFAULT_HASHERS,
  type HasherTable,
  inspectCidLength,
  MAX_CID_PREFIX_LENGTH,
  MIN_CID_LENGTH,
  verifyDigest,
} from '../cid/index.js'
import { CarError } from '../errors.js'
import { ByteCursor, DEFAULT_CHUNK_SIZE } from './byte-cursor.js'
import { MemoryByteSource } from './car-memory-backend.js'
import type { ByteSource } from './car-storage-backend.js'
import { decodeHeaderPayload } from './header.js'

/**
 * Location of one record inside an archive
 */
export interface IndexEntry {
  cid: CID
  /** Offset of the record's length prefix */
  offset: number
  /** Span of the whole record: prefix, CID and payload */
  length: number
}

export interface CARBlock extends IndexEntry {
  bytes: Uint8Array
}

export interface CARReaderOptions {
  /** Check every payload against the digest in its CID */
  verify?: boolean
  hashers?: HasherTable
  /** Read size used against a random-access source */
  chunkSize?: number
  logger?: Logger
}

export interface CARReaderStats {
  blocksRead: number
  payloadBytes: number
  blocksVerified: number
}

/**
 * Split a record body into its leading CID and trailing payload.
 *
 * @param offset - archive offset of the record, for error reporting
 */
export function decodeBlockBody(body: Uint8Array, offset?: number): { cid: CID; bytes: Uint8Array } {
  if (body.length < MIN_CID_LENGTH) {
    throw new CarError(
      'ERR_MALFORMED_BLOCK_FRAMING',
      `Block record of ${body.length} bytes is shorter than the smallest CID (${MIN_CID_LENGTH} bytes)`,
      { offset }
    )
  }

  let decoded: [CID, number]
  try {
    decoded = decodeCidPrefix(body)
  } catch (error) {
    if (error instanceof CarError) {
      throw new CarError(error.code, error.message, { offset, cid: error.cid, cause: error.cause })
    }
    throw error
  }

  const [cid, cidLength] = decoded
  return { cid, bytes: body.subarray(cidLength) }
}

/**
 * Fail with `IntegrityViolation` unless the payload hashes to its CID
 */
export async function verifyBlock(block: CARBlock, hashers: HasherTable = DEFAULT_HASHERS): Promise<void> {
  const matches = await verifyDigest(block.cid.multihash, block.bytes, hashers)
  if (!matches) {
    throw new CarError(
      'ERR_INTEGRITY_VIOLATION',
      `Block ${block.cid.toString()} at offset ${block.offset} does not match its digest`,
      { offset: block.offset, cid: block.cid }
    )
  }
}

export class CARReader implements AsyncIterable<CARBlock> {
  readonly version: number
  readonly roots: CID[]
  /** Size of the header frame, which is also the offset of the first block */
  readonly headerLength: number

  private readonly cursor: ByteCursor
  private readonly ownedSource: ByteSource | undefined
  private readonly verify: boolean
  private readonly hashers: HasherTable
  private readonly logger: Logger | undefined
  private readonly stats: CARReaderStats = { blocksRead: 0, payloadBytes: 0, blocksVerified: 0 }

  private constructor(
    cursor: ByteCursor,
    header: { version: number; roots: CID[]; length: number },
    options: CARReaderOptions,
    ownedSource?: ByteSource
  ) {
    this.cursor = cursor
    this.version = header.version
    this.roots = header.roots
    this.headerLength = header.length
    this.verify = options.verify ?? false
    this.hashers = options.hashers ?? DEFAULT_HASHERS
    this.logger = options.logger
    this.ownedSource = ownedSource
  }

  private static async open(
    cursor: ByteCursor,
    options: CARReaderOptions,
    ownedSource?: ByteSource
  ): Promise<CARReader> {
    const prefix = await cursor.readVarint()
    if (prefix === undefined) {
      throw new CarError('ERR_TRUNCATED_INPUT', 'Empty input: missing CAR header', { offset: 0 })
    }
    const payload = await cursor.readExactly(prefix.value)
    const header = decodeHeaderPayload(payload)
    const length = cursor.position

    options.logger?.debug(
      { version: header.version, roots: header.roots.length, headerLength: length },
      'CAR header decoded'
    )

    return new CARReader(cursor, { ...header, length }, options, ownedSource)
  }

  /**
   * Read an archive through a random-access source, starting at offset 0.
   * The caller keeps ownership of `source`.
   */
  static async fromSource(source: ByteSource, options: CARReaderOptions = {}): Promise<CARReader> {
    return await CARReader.open(ByteCursor.fromSource(source, options.chunkSize ?? DEFAULT_CHUNK_SIZE), options)
  }

  /**
   * Like `fromSource`, but `close()` also closes the source
   */
  static async fromOwnedSource(source: ByteSource, options: CARReaderOptions = {}): Promise<CARReader> {
    try {
      const cursor = ByteCursor.fromSource(source, options.chunkSize ?? DEFAULT_CHUNK_SIZE)
      return await CARReader.open(cursor, options, source)
    } catch (error) {
      await source.close()
      throw error
    }
  }

  /**
   * Read an archive from a stream of chunks (a Node readable, stdin, ...)
   */
  static async fromIterable(stream: AsyncIterable<Uint8Array>, options: CARReaderOptions = {}): Promise<CARReader> {
    return await CARReader.open(ByteCursor.fromIterable(stream), options)
  }

  static async fromBytes(bytes: Uint8Array, options: CARReaderOptions = {}): Promise<CARReader> {
    return await CARReader.fromSource(new MemoryByteSource(bytes), options)
  }

  /**
   * Decode the next block record, or return `undefined` at the end of the
   * archive.
   *
   * A corrupt CID, a record too short for a CID or (in verify mode) a digest
   * mismatch is thrown after the record has been consumed, so calling `next()`
   * again continues with the following record. Framing failures are final.
   */
  async next(): Promise<CARBlock | undefined> {
    const offset = this.cursor.position
    const prefix = await this.cursor.readVarint()
    if (prefix === undefined) return undefined

    const body = await this.cursor.readExactly(prefix.value)
    const { cid, bytes } = decodeBlockBody(body, offset)
    const block: CARBlock = { cid, bytes, offset, length: prefix.bytes + prefix.value }

    this.stats.blocksRead++
    this.stats.payloadBytes += bytes.length

    if (this.verify) {
      await verifyBlock(block, this.hashers)
      this.stats.blocksVerified++
    }

    this.logger?.debug({ cid: cid.toString(), offset, length: block.length }, 'Block record decoded')
    return block
  }

  /**
   * Read the location of the next record without materializing its payload.
   * Over a random-access source the payload bytes are not read at all.
   */
  async nextEntry(): Promise<IndexEntry | undefined> {
    const offset = this.cursor.position
    const prefix = await this.cursor.readVarint()
    if (prefix === undefined) return undefined

    const bodyLength = prefix.value
    const length = prefix.bytes + bodyLength

    if (bodyLength < MIN_CID_LENGTH) {
      await this.cursor.skip(bodyLength)
      throw new CarError(
        'ERR_MALFORMED_BLOCK_FRAMING',
        `Block record of ${bodyLength} bytes is shorter than the smallest CID (${MIN_CID_LENGTH} bytes)`,
        { offset }
      )
    }

    let cid: CID
    try {
      const head = await this.cursor.peek(Math.min(bodyLength, MAX_CID_PREFIX_LENGTH))
      const cidLength = inspectCidLength(head)
      cid = decodeCidPrefix(await this.cursor.peek(Math.min(bodyLength, cidLength)))[0]
    } catch (error) {
      await this.cursor.skip(bodyLength)
      if (error instanceof CarError) {
        throw new CarError(error.code, error.message, { offset, cid: error.cid, cause: error.cause })
      }
      throw error
    }
    await this.cursor.skip(bodyLength)

    this.stats.blocksRead++
    this.stats.payloadBytes += bodyLength - cid.bytes.length
    return { cid, offset, length }
  }

  async *blocks(): AsyncGenerator<CARBlock> {
    while (true) {
      const block = await this.next()
      if (block === undefined) return
      yield block
    }
  }

  async *entries(): AsyncGenerator<IndexEntry> {
    while (true) {
      const entry = await this.nextEntry()
      if (entry === undefined) return
      yield entry
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<CARBlock> {
    return this.blocks()
  }

  getStats(): CARReaderStats {
    return { ...this.stats }
  }

  /**
   * Close the source if this reader was opened with `fromOwnedSource`
   */
  async close(): Promise<void> {
    await this.ownedSource?.close()
  }
}

/**
 * Collect every remaining block of a reader
 */
export async function readAllBlocks(reader: CARReader): Promise<CARBlock[]> {
  const blocks: CARBlock[] = []
  for await (const block of reader.blocks()) {
    blocks.push(block)
  }
  return blocks
}
