/**
 * Content identifier model: canonical CID bytes, ordering and digest checks.
 *
 * CID and multihash values come from `multiformats`; this module adds the
 * strict parsing, the byte ordering the index relies on, and verification
 * against a table of hashers.
 */

import { equals } from 'multiformats/bytes'
import { CID } from 'multiformats/cid'
import * as raw from 'multiformats/codecs/raw'
import { identity } from 'multiformats/hashes/identity'
import type { MultihashDigest, MultihashHasher } from 'multiformats/hashes/interface'
import { sha256, sha512 } from 'multiformats/hashes/sha2'
import { CarError } from '../errors.js'

/**
 * Smallest possible CID encoding: a CIDv1 with one-byte version, codec, hash
 * code and length, and an empty digest (for example `bafkqaaa`).
 */
export const MIN_CID_LENGTH = 4

/**
 * Upper bound on the varint fields in front of a digest (version, codec, hash
 * code and digest length, up to nine bytes each)
 */
export const MAX_CID_PREFIX_LENGTH = 36

export type HasherTable = ReadonlyMap<number, MultihashHasher>

export const DEFAULT_HASHERS: HasherTable = new Map<number, MultihashHasher>([
  [identity.code, identity],
  [sha256.code, sha256],
  [sha512.code, sha512],
])

/**
 * Total encoded length of the CID starting at `bytes`, read from its varint
 * fields alone (the digest does not need to be present).
 */
export function inspectCidLength(bytes: Uint8Array): number {
  try {
    return CID.inspectBytes(bytes).size
  } catch (error) {
    throw new CarError('ERR_MALFORMED_IDENTIFIER', `Invalid CID prefix: ${messageOf(error)}`, { cause: error })
  }
}

/**
 * Decode the CID at the start of `bytes`.
 *
 * @returns the CID and the number of bytes its encoding occupies
 */
export function decodeCidPrefix(bytes: Uint8Array): [CID, number] {
  const size = inspectCidLength(bytes)
  if (size > bytes.length) {
    throw new CarError(
      'ERR_MALFORMED_IDENTIFIER',
      `Truncated CID: needs ${size} bytes, only ${bytes.length} available`
    )
  }

  let cid: CID
  try {
    cid = CID.decodeFirst(bytes)[0]
  } catch (error) {
    throw new CarError('ERR_MALFORMED_IDENTIFIER', `Invalid CID: ${messageOf(error)}`, { cause: error })
  }

  // multiformats re-encodes what it parsed, so any padded varint shows up here
  if (!equals(cid.bytes, bytes.subarray(0, size))) {
    throw new CarError('ERR_MALFORMED_IDENTIFIER', 'CID is not canonically encoded', { cid })
  }

  return [cid, size]
}

/**
 * Parse a CID whose encoding spans all of `bytes`.
 */
export function parseCid(bytes: Uint8Array): CID {
  const [cid, size] = decodeCidPrefix(bytes)
  if (size !== bytes.length) {
    throw new CarError('ERR_MALFORMED_IDENTIFIER', `Unexpected ${bytes.length - size} bytes after CID`, { cid })
  }
  return cid
}

/**
 * Parse a CID from its string form (as typed on a command line)
 */
export function parseCidString(text: string): CID {
  try {
    return CID.parse(text.trim())
  } catch (error) {
    throw new CarError('ERR_MALFORMED_IDENTIFIER', `Invalid CID "${text}": ${messageOf(error)}`, { cause: error })
  }
}

export function encodeCid(cid: CID): Uint8Array {
  return cid.bytes
}

/**
 * Byte-lexicographic comparison; a proper prefix sorts first.
 */
export function compareBytes(a: Uint8Array, b: Uint8Array): number {
  return Buffer.compare(a, b)
}

/**
 * Total order over CIDs used to sort and search the index.
 */
export function compareCids(a: CID, b: CID): number {
  return compareBytes(a.bytes, b.bytes)
}

/**
 * Recompute the digest of `payload` and compare it with `digest`.
 *
 * A mismatch resolves to `false`. Only a multihash code with no hasher in the
 * table is an error, since nothing can be said about the payload then.
 */
export async function verifyDigest(
  digest: MultihashDigest,
  payload: Uint8Array,
  hashers: HasherTable = DEFAULT_HASHERS
): Promise<boolean> {
  const hasher = hashers.get(digest.code)
  if (hasher == null) {
    throw new CarError('ERR_UNSUPPORTED_HASH', `No hasher registered for multihash code 0x${digest.code.toString(16)}`)
  }

  const actual = await hasher.digest(payload)
  return actual.size === digest.size && equals(actual.digest, digest.digest)
}

export interface CreateCidOptions {
  codec?: number
  hasher?: MultihashHasher
}

/**
 * Compute a CIDv1 for a payload (raw codec and sha2-256 unless told otherwise)
 */
export async function createCid(payload: Uint8Array, options: CreateCidOptions = {}): Promise<CID> {
  const { codec = raw.code, hasher = sha256 } = options
  const digest = await hasher.digest(payload)
  return CID.create(1, codec, digest)
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
