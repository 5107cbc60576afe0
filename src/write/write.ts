/**
 * Build an archive from line-oriented input.
 *
 * Each line is `<key> <data>` (stored as a dag-cbor row) or, in raw mode,
 * `<cid> <data>` (stored verbatim under the given CID). Every block becomes a
 * root, in input order.
 */

import { rm } from 'node:fs/promises'
import type { CID } from 'multiformats/cid'
import pc from 'picocolors'
import { UsageError } from '../common/errors.js'
import { createCarFile } from '../core/car/car-file.js'
import { parseCidString } from '../core/cid/index.js'
import { encodeRow } from '../core/rows/index.js'
import { saveIndexFile } from '../core/seek/index-file.js'
import { formatFileSize, outro } from '../utils/cli-helpers.js'
import { log } from '../utils/cli-logger.js'
import type { WriteOptions, WriteResult } from './types.js'

interface ParsedBlock {
  cid: CID
  bytes: Uint8Array
}

/**
 * Split `<first> <rest>` at the first space. Returns undefined for lines
 * without one.
 */
export function splitLine(line: string): [string, string] | undefined {
  const space = line.indexOf(' ')
  if (space <= 0) return undefined
  return [line.slice(0, space), line.slice(space + 1)]
}

async function parseLines(options: WriteOptions): Promise<{ blocks: ParsedBlock[]; skipped: number }> {
  const encoder = new TextEncoder()
  const blocks: ParsedBlock[] = []
  let skipped = 0

  for await (const line of options.lines) {
    if (line.trim() === '') continue

    const parts = splitLine(line)
    if (parts === undefined) {
      const expected = options.raw === true ? '<cid> <data>' : '<key> <data>'
      log.warn(`${pc.yellow('⚠')} Invalid format: ${JSON.stringify(line)}. Expected "${expected}".`)
      skipped++
      continue
    }

    const [first, data] = parts
    const bytes = encoder.encode(data)
    if (options.raw === true) {
      blocks.push({ cid: parseCidString(first), bytes })
    } else {
      blocks.push(await encodeRow({ key: first, data: bytes }))
    }
  }

  return { blocks, skipped }
}

export async function runWrite(options: WriteOptions): Promise<WriteResult> {
  const { blocks, skipped } = await parseLines(options)
  if (blocks.length === 0) {
    throw new UsageError('No valid entries provided')
  }

  const roots = blocks.map(({ cid }) => cid)
  const writer = await createCarFile(options.carPath, {
    roots,
    validate: options.raw === true && options.validate !== false,
    logger: options.logger,
  })

  try {
    for (const { cid, bytes } of blocks) {
      await writer.put(cid, bytes)
    }
  } catch (error) {
    // Leave no half-written archive behind
    await writer.abort()
    await rm(options.carPath, { force: true })
    throw error
  }
  const index = await writer.close()
  const { totalSize } = writer.getStats()

  if (options.indexPath !== undefined) {
    await saveIndexFile(options.indexPath, index)
  }

  const rootStrings = roots.map((cid) => cid.toString())
  log.section('Roots', rootStrings)
  outro(`${pc.green('✓')} Done writing ${options.carPath} (${blocks.length} blocks, ${formatFileSize(totalSize)})`)

  return {
    carPath: options.carPath,
    indexPath: options.indexPath,
    roots: rootStrings,
    blocks: blocks.length,
    skipped,
    size: totalSize,
  }
}
