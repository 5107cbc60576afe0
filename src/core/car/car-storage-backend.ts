/**
 * Storage backend interfaces for CAR readers, writers and lookups.
 * Lets the same code run against files, memory buffers or anything else that
 * can serve positioned reads or sequential writes.
 */

/**
 * Random-access readable bytes
 */
export interface ByteSource {
  /**
   * Total number of bytes available
   */
  size(): Promise<number>

  /**
   * Read up to `length` bytes starting at `offset`. Returns fewer bytes only
   * when the end of the data is reached.
   */
  read(offset: number, length: number): Promise<Uint8Array>

  /**
   * Release the underlying resource
   */
  close(): Promise<void>
}

/**
 * Append-only writable bytes
 */
export interface ByteSink {
  /**
   * Append `bytes`. Calls land in the order they are made, even when not
   * awaited one by one.
   */
  write(bytes: Uint8Array): Promise<void>

  /**
   * Flush and release the underlying resource
   */
  close(): Promise<void>
}
