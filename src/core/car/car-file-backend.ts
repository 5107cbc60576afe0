/**
 * Node.js filesystem-based storage backends for CAR files.
 * Reads use positioned reads on a file handle, so any number of sources may
 * share one finalized archive.
 */

import { mkdir, open } from 'node:fs/promises'
import type { FileHandle } from 'node:fs/promises'
import { dirname } from 'node:path'
import type { Logger } from 'pino'
import type { ByteSink, ByteSource } from './car-storage-backend.js'

/**
 * Read-only view of a file on disk
 */
export class FileByteSource implements ByteSource {
  readonly path: string
  private readonly handle: FileHandle
  private readonly logger: Logger | undefined
  private closed = false

  private constructor(path: string, handle: FileHandle, logger?: Logger) {
    this.path = path
    this.handle = handle
    this.logger = logger
  }

  static async open(path: string, logger?: Logger): Promise<FileByteSource> {
    const handle = await open(path, 'r')
    return new FileByteSource(path, handle, logger)
  }

  async size(): Promise<number> {
    const stats = await this.handle.stat()
    return stats.size
  }

  async read(offset: number, length: number): Promise<Uint8Array> {
    if (length <= 0) {
      return new Uint8Array(0)
    }

    const buffer = new Uint8Array(length)
    const { bytesRead } = await this.handle.read(buffer, 0, length, offset)
    this.logger?.trace({ path: this.path, offset, length, bytesRead }, 'Positioned read')
    return bytesRead === length ? buffer : buffer.subarray(0, bytesRead)
  }

  async close(): Promise<void> {
    if (this.closed) return
    this.closed = true
    await this.handle.close()
  }
}

/**
 * Writes a file from scratch, creating its directory if needed
 */
export class FileByteSink implements ByteSink {
  readonly path: string
  private readonly handle: FileHandle
  private position = 0
  private closed = false

  private constructor(path: string, handle: FileHandle) {
    this.path = path
    this.handle = handle
  }

  static async create(path: string): Promise<FileByteSink> {
    await mkdir(dirname(path), { recursive: true })
    const handle = await open(path, 'w')
    return new FileByteSink(path, handle)
  }

  async write(bytes: Uint8Array): Promise<void> {
    if (this.closed) {
      throw new Error(`Cannot write to closed file ${this.path}`)
    }
    if (bytes.length === 0) return

    // Claim the range before awaiting so concurrent writes keep call order
    const position = this.position
    this.position += bytes.length

    let written = 0
    while (written < bytes.length) {
      const { bytesWritten } = await this.handle.write(bytes, written, bytes.length - written, position + written)
      written += bytesWritten
    }
  }

  async close(): Promise<void> {
    if (this.closed) return
    this.closed = true
    await this.handle.sync()
    await this.handle.close()
  }
}
