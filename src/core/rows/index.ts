/**
 * Keyed rows stored as DAG-CBOR blocks.
 *
 * Each row `{ key, data }` becomes one dag-cbor block addressed by its
 * sha2-256 CID. An archive of rows lists every row as a root, in input order.
 */

import * as dagCbor from '@ipld/dag-cbor'
import { CID } from 'multiformats/cid'
import { sha256 } from 'multiformats/hashes/sha2'
import type { CARReader } from '../car/car-reader.js'
import type { ByteSink } from '../car/car-storage-backend.js'
import { type CARWriterOptions, writeCar } from '../car/car-writer.js'
import { CarError } from '../errors.js'
import type { CARIndex } from '../seek/car-index.js'

export interface Row {
  key: string
  data: Uint8Array
}

export interface EncodedRow {
  cid: CID
  bytes: Uint8Array
}

export async function encodeRow(row: Row): Promise<EncodedRow> {
  const bytes = dagCbor.encode({ key: row.key, data: row.data })
  const hash = await sha256.digest(bytes)
  return { cid: CID.create(1, dagCbor.code, hash), bytes }
}

export function decodeRow(bytes: Uint8Array): Row {
  let value: unknown
  try {
    value = dagCbor.decode(bytes)
  } catch (error) {
    throw new CarError('ERR_MALFORMED_ROW', 'Row is not valid DAG-CBOR', { cause: error })
  }

  if (typeof value !== 'object' || value === null) {
    throw new CarError('ERR_MALFORMED_ROW', 'Row must be a map')
  }
  const key: unknown = Reflect.get(value, 'key')
  const data: unknown = Reflect.get(value, 'data')
  if (typeof key !== 'string' || !(data instanceof Uint8Array)) {
    throw new CarError('ERR_MALFORMED_ROW', 'Row must have a string "key" and a bytes "data"')
  }
  return { key, data }
}

/**
 * Write `rows` as an archive whose roots are every row, in order
 */
export async function writeRows(
  sink: ByteSink,
  rows: Iterable<Row>,
  options: Omit<CARWriterOptions, 'roots'> = {}
): Promise<CARIndex> {
  const blocks: EncodedRow[] = []
  for (const row of rows) {
    blocks.push(await encodeRow(row))
  }
  return await writeCar(sink, blocks, { ...options, roots: blocks.map(({ cid }) => cid) })
}

/**
 * Decode every dag-cbor block of an archive as a row, in archive order.
 * Blocks of any other codec are skipped.
 */
export async function* readRows(reader: CARReader): AsyncGenerator<Row & { cid: CID }> {
  for await (const block of reader.blocks()) {
    if (block.cid.code !== dagCbor.code) continue
    yield { cid: block.cid, ...decodeRow(block.bytes) }
  }
}
