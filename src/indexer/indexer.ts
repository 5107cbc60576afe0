/**
 * Build the side index of an archive and save it next to it
 */

import * as dagCbor from '@ipld/dag-cbor'
import pc from 'picocolors'
import { openCarFile, openCarSource } from '../core/car/car-file.js'
import { isCarError } from '../core/errors.js'
import { decodeRow } from '../core/rows/index.js'
import type { CARIndex } from '../core/seek/car-index.js'
import { buildIndex } from '../core/seek/index-builder.js'
import { defaultIndexPath, saveIndexFile } from '../core/seek/index-file.js'
import { readBlockAt } from '../core/seek/seek.js'
import { createSpinner, intro, outro } from '../utils/cli-helpers.js'
import { log } from '../utils/cli-logger.js'
import type { IndexOptions, IndexResult } from './types.js'

async function scan(options: IndexOptions, verify: boolean): Promise<CARIndex> {
  const reader = await openCarFile(options.carPath, { verify, chunkSize: options.chunkSize, logger: options.logger })
  try {
    return await buildIndex(reader, { readPayloads: verify, logger: options.logger })
  } finally {
    await reader.close()
  }
}

/**
 * Label each entry by its row key when it holds a row, by its CID otherwise
 */
async function printEntries(options: IndexOptions, index: CARIndex): Promise<void> {
  if (options.rows !== true) {
    for (const entry of index.entries) {
      log.line(`${entry.cid.toString()} -> (offset=${entry.offset}, length=${entry.length})`)
    }
    log.flush()
    return
  }

  const source = await openCarSource(options.carPath, options.logger)
  try {
    for (const entry of index.entries) {
      let label = entry.cid.toString()
      if (entry.cid.code === dagCbor.code) {
        const block = await readBlockAt(source, entry, { logger: options.logger })
        try {
          label = decodeRow(block.bytes).key
        } catch (error) {
          if (!isCarError(error, 'ERR_MALFORMED_ROW')) throw error
        }
      }
      log.line(`${label} -> (offset=${entry.offset}, length=${entry.length})`)
    }
  } finally {
    await source.close()
  }
  log.flush()
}

export async function runIndex(options: IndexOptions): Promise<IndexResult> {
  const indexPath = options.outputPath ?? defaultIndexPath(options.carPath)
  intro(pc.bold('CAR Index'))

  const spinner = createSpinner()
  spinner.start(`Indexing ${options.carPath}...`)

  let index: CARIndex
  try {
    index = await scan(options, options.verify ?? false)
    await saveIndexFile(indexPath, index)
  } catch (error) {
    spinner.stop(`${pc.red('✗')} Indexing failed: ${error instanceof Error ? error.message : String(error)}`)
    options.logger?.error({ event: 'index.failed', error }, 'Indexing failed')
    throw error
  }
  spinner.stop(`${pc.green('✓')} Indexed ${index.size} blocks`)

  if (options.print === true) {
    await printEntries(options, index)
  }

  outro(`Index written to ${indexPath}`)
  return { carPath: options.carPath, indexPath, entries: index.size }
}
