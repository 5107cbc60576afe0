/**
 * Stream every block of an archive to the terminal, optionally verifying
 * each payload against its CID.
 */

import pc from 'picocolors'
import { PREVIEW_LENGTH } from '../common/constants.js'
import { openCarFile } from '../core/car/car-file.js'
import { readRows } from '../core/rows/index.js'
import { formatPayload } from '../utils/cli-helpers.js'
import { log } from '../utils/cli-logger.js'
import type { ReadOptions, ReadResult } from './types.js'

/** Flush batched TTY output every this many lines */
const FLUSH_EVERY = 100

export async function runRead(options: ReadOptions): Promise<ReadResult> {
  const reader = await openCarFile(options.carPath, {
    verify: options.verify ?? false,
    chunkSize: options.chunkSize,
    logger: options.logger,
  })

  try {
    const roots = reader.roots.map((cid) => cid.toString())
    const rootLines = roots.length > 0 ? roots.map((root) => `root ${root}`) : ['no roots']
    log.section(`CARv${reader.version} ${options.carPath}`, rootLines)

    let printed = 0
    if (options.rows === true) {
      for await (const row of readRows(reader)) {
        log.line(`Read row: key = ${JSON.stringify(row.key)}, data = ${formatPayload(row.data)}`)
        if (++printed % FLUSH_EVERY === 0) log.flush()
      }
    } else {
      for await (const block of reader.blocks()) {
        log.line(`${block.cid.toString()}  ${block.bytes.length}  ${formatPayload(block.bytes, PREVIEW_LENGTH)}`)
        if (++printed % FLUSH_EVERY === 0) log.flush()
      }
    }
    log.flush()

    const stats = reader.getStats()
    const verified = options.verify === true ? `, ${stats.blocksVerified} verified` : ''
    log.success(`${pc.green('✓')} ${stats.blocksRead} blocks read${verified}`)

    return {
      carPath: options.carPath,
      version: reader.version,
      roots,
      blocks: stats.blocksRead,
      payloadBytes: stats.payloadBytes,
      verified: stats.blocksVerified,
    }
  } finally {
    await reader.close()
  }
}
