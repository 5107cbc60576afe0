import { describe, expect, it } from 'vitest'
import { MemoryByteSink, MemoryByteSource } from '../../core/car/car-memory-backend.js'
import { CARReader } from '../../core/car/car-reader.js'
import { writeCar } from '../../core/car/car-writer.js'
import { isCarError } from '../../core/errors.js'
import { buildIndex } from '../../core/seek/index-builder.js'
import { rawBlock } from '../mocks/blocks.js'
import { TrackingByteSource } from '../mocks/tracking-source.js'

describe('buildIndex', () => {
  it('should index every record, keeping the first of repeated CIDs', async () => {
    const hello = await rawBlock('hello')
    const world = await rawBlock('world')
    const sink = new MemoryByteSink()
    await writeCar(sink, [hello, world, hello])

    const index = await buildIndex(await CARReader.fromBytes(sink.bytes()))

    expect(index.size).toBe(2)
    expect(index.get(hello.cid)).toEqual({ cid: hello.cid, offset: 18, length: 42 })
    expect(index.get(world.cid).offset).toBe(60)
  })

  it('should match the index returned by the writer', async () => {
    const blocks = await Promise.all(['one', 'two', 'three', 'four'].map(rawBlock))
    const sink = new MemoryByteSink()
    const written = await writeCar(sink, blocks)

    const scanned = await buildIndex(await CARReader.fromBytes(sink.bytes()))
    expect(scanned.encode()).toEqual(written.encode())
  })

  it('should not read the payloads of large records', async () => {
    const big = await rawBlock('x'.repeat(4096))
    const small = await rawBlock('small')
    const sink = new MemoryByteSink()
    await writeCar(sink, [big, small])
    const source = new TrackingByteSource(new MemoryByteSource(sink.bytes()))

    const index = await buildIndex(await CARReader.fromSource(source, { chunkSize: 64 }))

    expect(index.size).toBe(2)
    const bytesRead = source.reads.reduce((sum, { length }) => sum + length, 0)
    expect(bytesRead).toBeLessThan(1024)
  })

  it('should verify payloads when reading them', async () => {
    const hello = await rawBlock('hello')
    const sink = new MemoryByteSink()
    await writeCar(sink, [hello])
    const bytes = sink.bytes().slice()
    bytes[55] = (bytes[55] ?? 0) ^ 0x02

    const reader = await CARReader.fromBytes(bytes, { verify: true })
    const error: unknown = await buildIndex(reader, { readPayloads: true }).catch((err: unknown) => err)
    expect(isCarError(error, 'ERR_INTEGRITY_VIOLATION')).toBe(true)
  })
})
