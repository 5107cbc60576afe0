/**
 * CAR header codec: a frame holding the DAG-CBOR map `{ version, roots }`.
 */

import * as dagCbor from '@ipld/dag-cbor'
import { CID } from 'multiformats/cid'
import { CarError } from '../errors.js'
import { decodeFrame, encodeFrame } from './frame.js'

export const CAR_VERSION = 1

export const SUPPORTED_VERSIONS: readonly number[] = [CAR_VERSION]

export interface CARHeader {
  version: number
  roots: CID[]
}

export interface DecodedHeader extends CARHeader {
  /** Bytes occupied by the header frame, i.e. the offset of the first block */
  length: number
}

/**
 * DAG-CBOR hands back integers beyond 2^53 as bigints, which are never a supported version.
 */
export function assertSupportedVersion(version: number | bigint): asserts version is number {
  if (typeof version !== 'number' || !SUPPORTED_VERSIONS.includes(version)) {
    throw new CarError(
      'ERR_UNSUPPORTED_VERSION',
      `Unsupported CAR version ${version}, expected one of: ${SUPPORTED_VERSIONS.join(', ')}`
    )
  }
}

export function encodeHeader(header: CARHeader): Uint8Array {
  assertSupportedVersion(header.version)
  return encodeFrame(dagCbor.encode({ version: header.version, roots: header.roots }))
}

/**
 * Validate the decoded DAG-CBOR value of a header frame.
 */
export function decodeHeaderPayload(payload: Uint8Array): CARHeader {
  let value: unknown
  try {
    value = dagCbor.decode(payload)
  } catch (error) {
    throw new CarError('ERR_MALFORMED_HEADER', 'CAR header is not valid DAG-CBOR', { offset: 0, cause: error })
  }

  if (typeof value !== 'object' || value === null || Array.isArray(value) || CID.asCID(value) != null) {
    throw new CarError('ERR_MALFORMED_HEADER', 'CAR header must be a map', { offset: 0 })
  }

  const version: unknown = Reflect.get(value, 'version')
  if (typeof version !== 'bigint' && (typeof version !== 'number' || !Number.isInteger(version))) {
    throw new CarError('ERR_MALFORMED_HEADER', 'CAR header is missing an integer "version"', { offset: 0 })
  }
  // Checked before the roots so that newer pragmas (which have none) report the version
  assertSupportedVersion(version)

  const roots: unknown = Reflect.get(value, 'roots')
  if (!Array.isArray(roots)) {
    throw new CarError('ERR_MALFORMED_HEADER', 'CAR header is missing a "roots" array', { offset: 0 })
  }

  const cids: CID[] = []
  for (const [i, root] of roots.entries()) {
    const cid = CID.asCID(root)
    if (cid == null) {
      throw new CarError('ERR_MALFORMED_HEADER', `CAR header root ${i} is not a CID`, { offset: 0 })
    }
    cids.push(cid)
  }

  return { version, roots: cids }
}

/**
 * Decode a header from the start of an in-memory archive.
 */
export function decodeHeader(bytes: Uint8Array): DecodedHeader {
  const { payload, length } = decodeFrame(bytes, 0)
  return { ...decodeHeaderPayload(payload), length }
}
