/**
 * Fetch a single block without scanning the archive, either through an index
 * or straight from a known record span
 */

import { UsageError } from '../common/errors.js'
import { openCarSource } from '../core/car/car-file.js'
import type { CARBlock } from '../core/car/car-reader.js'
import type { ByteSource } from '../core/car/car-storage-backend.js'
import { parseCidString } from '../core/cid/index.js'
import { decodeRow } from '../core/rows/index.js'
import { loadIndexFile } from '../core/seek/index-file.js'
import { readBlockAt, seekBlock } from '../core/seek/seek.js'
import { formatPayload } from '../utils/cli-helpers.js'
import { log } from '../utils/cli-logger.js'
import type { SeekOptions, SeekResult } from './types.js'

type Lookup = (source: ByteSource) => Promise<CARBlock>

function writeTo(output: NodeJS.WritableStream, bytes: Uint8Array): Promise<void> {
  return new Promise((resolve, reject) => {
    output.write(bytes, (error?: Error | null) => {
      if (error != null) {
        reject(error)
      } else {
        resolve()
      }
    })
  })
}

/**
 * Check the arguments and load what the lookup needs before the archive is opened
 */
async function planLookup(options: SeekOptions): Promise<Lookup> {
  const readOptions = { verify: options.verify ?? false, logger: options.logger }
  const { span, indexPath, cid } = options

  if (span !== undefined) {
    if (indexPath !== undefined || cid !== undefined) {
      throw new UsageError('Give either a record span or an index and CID, not both')
    }
    return async (source) => await readBlockAt(source, span, readOptions)
  }

  if (indexPath === undefined || cid === undefined) {
    throw new UsageError('An index file and a CID are required unless a record span is given')
  }
  const query = parseCidString(cid)
  const index = await loadIndexFile(indexPath)
  return async (source) => await seekBlock(source, index, query, readOptions)
}

export async function runSeek(options: SeekOptions): Promise<SeekResult> {
  const lookup = await planLookup(options)

  const source = await openCarSource(options.carPath, options.logger)
  let block: CARBlock
  try {
    block = await lookup(source)
  } finally {
    await source.close()
  }

  if (options.rows === true) {
    const row = decodeRow(block.bytes)
    log.line(`Row Key: ${row.key}`)
    log.line(`Data: ${formatPayload(row.data)}`)
    log.flush()
  } else {
    await writeTo(options.output ?? process.stdout, block.bytes)
  }

  return { cid: block.cid.toString(), offset: block.offset, length: block.length, bytes: block.bytes }
}
