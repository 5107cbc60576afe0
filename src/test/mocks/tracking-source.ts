import type { ByteSource } from '../../core/car/car-storage-backend.js'

/**
 * Wraps a source and records every call made through it
 */
export class TrackingByteSource implements ByteSource {
  readonly reads: Array<{ offset: number; length: number }> = []
  sizeCalls = 0
  closed = false
  private readonly inner: ByteSource

  constructor(inner: ByteSource) {
    this.inner = inner
  }

  async size(): Promise<number> {
    this.sizeCalls++
    return await this.inner.size()
  }

  async read(offset: number, length: number): Promise<Uint8Array> {
    this.reads.push({ offset, length })
    return await this.inner.read(offset, length)
  }

  async close(): Promise<void> {
    this.closed = true
    await this.inner.close()
  }
}
