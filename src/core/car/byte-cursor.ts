/**
 * Sequential, buffered reader over a byte source or a byte stream.
 * Keeps track of the absolute position so callers can record offsets.
 */

import toBuffer from 'it-to-buffer'
import { CarError } from '../errors.js'
import type { ByteSource } from './car-storage-backend.js'
import { type DecodedVarint, decodeVarint, MAX_VARINT_LENGTH } from './frame.js'

export const DEFAULT_CHUNK_SIZE = 64 * 1024

type Pull = () => Promise<Uint8Array | undefined>

export class ByteCursor {
  private buffer: Uint8Array = new Uint8Array(0)
  private ended = false
  private readonly pull: Pull
  private readonly source: ByteSource | undefined
  /** Absolute offset of `buffer[0]` */
  private base: number

  private constructor(pull: Pull, source: ByteSource | undefined, start: number) {
    this.pull = pull
    this.source = source
    this.base = start
  }

  /**
   * Read `source` in chunks starting at `start`. `skip()` on such a cursor
   * jumps over bytes without reading them.
   */
  static fromSource(source: ByteSource, chunkSize = DEFAULT_CHUNK_SIZE, start = 0): ByteCursor {
    let next = start
    const cursor: ByteCursor = new ByteCursor(
      async () => {
        // Resume from wherever a skip may have moved us
        next = Math.max(next, cursor.position + cursor.buffer.length)
        const chunk = await source.read(next, chunkSize)
        if (chunk.length === 0) return undefined
        next += chunk.length
        return chunk
      },
      source,
      start
    )
    return cursor
  }

  static fromIterable(stream: AsyncIterable<Uint8Array>): ByteCursor {
    const iterator = stream[Symbol.asyncIterator]()
    return new ByteCursor(
      async () => {
        const { done, value } = await iterator.next()
        return done === true ? undefined : value
      },
      undefined,
      0
    )
  }

  static fromBytes(bytes: Uint8Array): ByteCursor {
    const cursor = new ByteCursor(async () => undefined, undefined, 0)
    cursor.buffer = bytes
    cursor.ended = true
    return cursor
  }

  /**
   * Absolute offset of the next unread byte
   */
  get position(): number {
    return this.base
  }

  /**
   * Buffer at least `length` bytes if the input has them.
   *
   * @returns whether `length` bytes are now buffered
   */
  private async fill(length: number): Promise<boolean> {
    if (this.buffer.length >= length) return true
    if (this.ended) return false

    const chunks: Uint8Array[] = [this.buffer]
    let buffered = this.buffer.length
    while (buffered < length) {
      const chunk = await this.pull()
      if (chunk === undefined) {
        this.ended = true
        break
      }
      if (chunk.length === 0) continue
      chunks.push(chunk)
      buffered += chunk.length
    }
    this.buffer = chunks.length === 1 ? this.buffer : toBuffer(chunks)
    return this.buffer.length >= length
  }

  /**
   * Return up to `length` buffered bytes without consuming them
   */
  async peek(length: number): Promise<Uint8Array> {
    await this.fill(length)
    return this.buffer.subarray(0, Math.min(length, this.buffer.length))
  }

  /**
   * True when the input is exhausted at the current position
   */
  async atEnd(): Promise<boolean> {
    return !(await this.fill(1))
  }

  /**
   * Consume a varint, or return `undefined` when the input ends cleanly
   * before its first byte.
   */
  async readVarint(): Promise<DecodedVarint | undefined> {
    await this.fill(MAX_VARINT_LENGTH)
    if (this.buffer.length === 0) return undefined

    const decoded = decodeVarint(this.buffer, 0, this.base)
    this.consume(decoded.bytes)
    return decoded
  }

  /**
   * Consume exactly `length` bytes, failing with `TruncatedInput` otherwise
   */
  async readExactly(length: number): Promise<Uint8Array> {
    if (!(await this.fill(length))) {
      throw new CarError(
        'ERR_TRUNCATED_INPUT',
        `Unexpected end of input: needed ${length} bytes, ${this.buffer.length} available`,
        { offset: this.base }
      )
    }
    const bytes = this.buffer.subarray(0, length)
    this.consume(length)
    return bytes
  }

  /**
   * Move past `length` bytes. Over a random-access source the unbuffered part
   * is not read, only checked against the source size.
   */
  async skip(length: number): Promise<void> {
    if (this.buffer.length >= length || this.source === undefined) {
      await this.readExactly(length)
      return
    }

    const target = this.base + length
    const size = await this.source.size()
    if (target > size) {
      throw new CarError(
        'ERR_TRUNCATED_INPUT',
        `Unexpected end of input: needed ${length} bytes, ${size - this.base} available`,
        { offset: this.base }
      )
    }
    this.buffer = new Uint8Array(0)
    this.base = target
  }

  private consume(length: number): void {
    this.buffer = this.buffer.subarray(length)
    this.base += length
  }
}
