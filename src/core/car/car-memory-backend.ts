/**
 * In-memory storage backends, used for tests and for building small archives
 * without touching the filesystem.
 */

import toBuffer from 'it-to-buffer'
import type { ByteSink, ByteSource } from './car-storage-backend.js'

/**
 * Serves positioned reads out of a byte array
 */
export class MemoryByteSource implements ByteSource {
  private readonly data: Uint8Array

  constructor(data: Uint8Array) {
    this.data = data
  }

  async size(): Promise<number> {
    return this.data.length
  }

  async read(offset: number, length: number): Promise<Uint8Array> {
    if (length <= 0 || offset >= this.data.length) {
      return new Uint8Array(0)
    }
    return this.data.subarray(offset, Math.min(this.data.length, offset + length))
  }

  async close(): Promise<void> {
    // Nothing to release
  }
}

/**
 * Collects written chunks in memory
 */
export class MemoryByteSink implements ByteSink {
  private readonly chunks: Uint8Array[] = []
  private closed = false

  async write(bytes: Uint8Array): Promise<void> {
    if (this.closed) {
      throw new Error('Cannot write to a closed memory sink')
    }
    // Copy so that callers may reuse their buffers
    this.chunks.push(bytes.slice())
  }

  async close(): Promise<void> {
    this.closed = true
  }

  get length(): number {
    return this.chunks.reduce((sum, chunk) => sum + chunk.length, 0)
  }

  /**
   * Get everything written so far as one Uint8Array
   */
  bytes(): Uint8Array {
    return toBuffer(this.chunks)
  }
}
