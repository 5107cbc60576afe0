import * as dagCbor from '@ipld/dag-cbor'
import { CID } from 'multiformats/cid'
import * as raw from 'multiformats/codecs/raw'
import { create as createDigest } from 'multiformats/hashes/digest'
import { identity } from 'multiformats/hashes/identity'
import { sha256 } from 'multiformats/hashes/sha2'
import { describe, expect, it } from 'vitest'
import {
  compareBytes,
  compareCids,
  createCid,
  decodeCidPrefix,
  inspectCidLength,
  parseCid,
  parseCidString,
  verifyDigest,
} from '../../core/cid/index.js'
import { CarError, isCarError } from '../../core/errors.js'

const hello = new TextEncoder().encode('hello')

function catchError(fn: () => unknown): CarError {
  try {
    fn()
  } catch (error) {
    if (error instanceof CarError) return error
    throw error
  }
  throw new Error('expected a CarError')
}

describe('CID', () => {
  it('should create raw sha2-256 CIDv1 by default', async () => {
    const cid = await createCid(hello)
    expect(cid.version).toBe(1)
    expect(cid.code).toBe(raw.code)
    expect(cid.multihash.code).toBe(sha256.code)
    expect(cid.bytes.length).toBe(36)
  })

  it('should create CIDs with another codec and hasher', async () => {
    const cid = await createCid(hello, { codec: dagCbor.code, hasher: identity })
    expect(cid.code).toBe(dagCbor.code)
    expect(cid.multihash.digest).toEqual(hello)
  })

  describe('decodeCidPrefix', () => {
    it('should return the CID and its encoded length, ignoring what follows', async () => {
      const cid = await createCid(hello)
      const bytes = new Uint8Array([...cid.bytes, 0xde, 0xad])
      const [decoded, length] = decodeCidPrefix(bytes)
      expect(decoded.equals(cid)).toBe(true)
      expect(length).toBe(36)
    })

    it('should read the length from the prefix alone', async () => {
      const cid = await createCid(hello)
      expect(inspectCidLength(cid.bytes.subarray(0, 4))).toBe(36)
    })

    it('should reject a truncated CID', async () => {
      const cid = await createCid(hello)
      const error = catchError(() => decodeCidPrefix(cid.bytes.subarray(0, 20)))
      expect(error.code).toBe('ERR_MALFORMED_IDENTIFIER')
    })

    it('should reject an unknown CID version', () => {
      const bytes = Uint8Array.from([0x02, 0x55, 0x12, 0x20, ...new Uint8Array(32)])
      expect(catchError(() => decodeCidPrefix(bytes)).code).toBe('ERR_MALFORMED_IDENTIFIER')
    })

    it('should reject a padded codec varint', async () => {
      const cid = await createCid(hello)
      // 0x55 spelled over two bytes
      const padded = Uint8Array.from([0x01, 0xd5, 0x00, ...cid.bytes.subarray(2)])
      expect(catchError(() => decodeCidPrefix(padded)).code).toBe('ERR_MALFORMED_IDENTIFIER')
    })
  })

  it('should require parseCid to consume every byte', async () => {
    const cid = await createCid(hello)
    expect(parseCid(cid.bytes).equals(cid)).toBe(true)
    expect(catchError(() => parseCid(new Uint8Array([...cid.bytes, 0]))).code).toBe('ERR_MALFORMED_IDENTIFIER')
  })

  it('should parse CID strings and reject garbage', async () => {
    const cid = await createCid(hello)
    expect(parseCidString(` ${cid.toString()}\n`).equals(cid)).toBe(true)
    expect(catchError(() => parseCidString('not-a-cid')).code).toBe('ERR_MALFORMED_IDENTIFIER')
  })

  describe('ordering', () => {
    it('should compare bytes lexicographically with prefixes first', () => {
      expect(compareBytes(Uint8Array.from([1, 2]), Uint8Array.from([1, 3]))).toBeLessThan(0)
      expect(compareBytes(Uint8Array.from([1, 2]), Uint8Array.from([1, 2, 0]))).toBeLessThan(0)
      expect(compareBytes(Uint8Array.from([2]), Uint8Array.from([1, 9, 9]))).toBeGreaterThan(0)
      expect(compareBytes(Uint8Array.from([4, 4]), Uint8Array.from([4, 4]))).toBe(0)
    })

    it('should order CIDs by their binary form', async () => {
      const small = await createCid(hello, { hasher: identity })
      const large = await createCid(hello)
      // identity (0x00) sorts before sha2-256 (0x12)
      expect(compareCids(small, large)).toBeLessThan(0)
      expect(compareCids(large, small)).toBeGreaterThan(0)
      expect(compareCids(large, CID.decode(large.bytes))).toBe(0)
    })
  })

  describe('verifyDigest', () => {
    it('should accept a matching payload', async () => {
      const cid = await createCid(hello)
      await expect(verifyDigest(cid.multihash, hello)).resolves.toBe(true)
    })

    it('should reject a different payload', async () => {
      const cid = await createCid(hello)
      await expect(verifyDigest(cid.multihash, new TextEncoder().encode('jello'))).resolves.toBe(false)
    })

    it('should check identity digests by content', async () => {
      const cid = await createCid(hello, { hasher: identity })
      await expect(verifyDigest(cid.multihash, hello)).resolves.toBe(true)
      await expect(verifyDigest(cid.multihash, hello.subarray(1))).resolves.toBe(false)
    })

    it('should fail on a hash function it does not know', async () => {
      // blake2b-256
      const digest = createDigest(0xb220, new Uint8Array(32))
      const error: unknown = await verifyDigest(digest, hello).catch((err: unknown) => err)
      expect(isCarError(error, 'ERR_UNSUPPORTED_HASH')).toBe(true)
    })
  })
})
