import { describe, expect, it } from 'vitest'
import { ByteCursor } from '../../core/car/byte-cursor.js'
import { MemoryByteSource } from '../../core/car/car-memory-backend.js'
import { isCarError } from '../../core/errors.js'
import { chunked } from '../mocks/blocks.js'
import { TrackingByteSource } from '../mocks/tracking-source.js'

const bytes = Uint8Array.from([0xac, 0x02, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10])

describe('ByteCursor', () => {
  it('should read varints and exact runs across chunk boundaries', async () => {
    const cursor = ByteCursor.fromIterable(chunked(bytes, 1))

    expect(await cursor.readVarint()).toEqual({ value: 300, bytes: 2 })
    expect(cursor.position).toBe(2)
    expect(await cursor.readExactly(3)).toEqual(Uint8Array.from([1, 2, 3]))
    expect(cursor.position).toBe(5)
    expect(await cursor.peek(2)).toEqual(Uint8Array.from([4, 5]))
    expect(cursor.position).toBe(5)
  })

  it('should return undefined for a varint at a clean end', async () => {
    const cursor = ByteCursor.fromBytes(Uint8Array.from([0x01]))
    expect(await cursor.readVarint()).toEqual({ value: 1, bytes: 1 })
    expect(await cursor.atEnd()).toBe(true)
    expect(await cursor.readVarint()).toBeUndefined()
  })

  it('should fail with TruncatedInput when a run is cut short', async () => {
    const cursor = ByteCursor.fromIterable(chunked(bytes, 5))
    await cursor.readExactly(10)
    const error: unknown = await cursor.readExactly(3).catch((err: unknown) => err)
    expect(isCarError(error, 'ERR_TRUNCATED_INPUT')).toBe(true)
    expect(isCarError(error) && error.offset).toBe(10)
  })

  it('should skip unbuffered bytes of a source without reading them', async () => {
    const source = new TrackingByteSource(new MemoryByteSource(bytes))
    const cursor = ByteCursor.fromSource(source, 4)

    expect(await cursor.readVarint()).toEqual({ value: 300, bytes: 2 })
    // Bytes 0..7 are buffered; 8 and 9 are jumped over
    await cursor.skip(8)
    expect(cursor.position).toBe(10)
    expect(await cursor.readExactly(2)).toEqual(Uint8Array.from([9, 10]))

    expect(source.reads).toEqual([
      { offset: 0, length: 4 },
      { offset: 4, length: 4 },
      { offset: 10, length: 4 },
    ])
  })

  it('should refuse to skip past the end of a source', async () => {
    const cursor = ByteCursor.fromSource(new MemoryByteSource(bytes), 4)
    await cursor.readExactly(2)
    const error: unknown = await cursor.skip(20).catch((err: unknown) => err)
    expect(isCarError(error, 'ERR_TRUNCATED_INPUT')).toBe(true)
  })

  it('should start at a given offset', async () => {
    const cursor = ByteCursor.fromSource(new MemoryByteSource(bytes), 64, 2)
    expect(cursor.position).toBe(2)
    expect(await cursor.readExactly(2)).toEqual(Uint8Array.from([1, 2]))
  })
})
