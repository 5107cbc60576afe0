import { Command, InvalidArgumentError } from 'commander'
import { UsageError } from '../common/errors.js'
import { createConfig } from '../config.js'
import { createLogger } from '../logger.js'
import { runSeek } from '../seek/seek.js'
import {
  addCommonOptions,
  addVerifyOption,
  type CommonCLIOptions,
  type VerifyCLIOptions,
} from '../utils/cli-options.js'

interface SeekCommandOptions extends CommonCLIOptions, VerifyCLIOptions {
  rows?: boolean
  offset?: number
  length?: number
}

function parseByteCount(value: string): number {
  const parsed = Number(value)
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError('Expected a non-negative integer.')
  }
  return parsed
}

export const seekCommand = new Command('seek')
  .description('Print the payload of one block, located through an index or at a known offset and length')
  .argument('<car>', 'Path to the CAR file')
  .argument('[index]', 'Path to its index file')
  .argument('[cid]', 'CID of the block to fetch')
  .option('--offset <bytes>', 'Offset of the block record, instead of an index and CID', parseByteCount)
  .option('--length <bytes>', 'Length of the block record, with --offset', parseByteCount)
  .option('--rows', 'Print the block as a decoded key/data row')
  .action(async (car: string, index: string | undefined, cid: string | undefined, options: SeekCommandOptions) => {
    const config = createConfig()
    const logger = createLogger({ logLevel: options.logLevel ?? config.logLevel })

    const { offset, length } = options
    if ((offset === undefined) !== (length === undefined)) {
      throw new UsageError('--offset and --length must be given together')
    }

    await runSeek({
      carPath: car,
      indexPath: index,
      cid,
      span: offset !== undefined && length !== undefined ? { offset, length } : undefined,
      verify: options.verify ?? config.verify,
      rows: options.rows,
      logger,
    })
  })

addVerifyOption(seekCommand)
addCommonOptions(seekCommand)
