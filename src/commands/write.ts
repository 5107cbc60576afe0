import { createReadStream } from 'node:fs'
import { createInterface } from 'node:readline'
import { Command } from 'commander'
import { createConfig } from '../config.js'
import { defaultIndexPath } from '../core/seek/index-file.js'
import { createLogger } from '../logger.js'
import { addCommonOptions, type CommonCLIOptions } from '../utils/cli-options.js'
import { runWrite } from '../write/write.js'

interface WriteCommandOptions extends CommonCLIOptions {
  raw?: boolean
  input?: string
  validate: boolean
  index?: boolean
}

export const writeCommand = new Command('write')
  .description('Write a CAR file from "<key> <data>" lines (or "<cid> <data>" with --raw)')
  .argument('<car>', 'Path of the CAR file to create')
  .option('--input <file>', 'Read lines from a file instead of stdin')
  .option('--raw', 'Lines carry a CID and the raw payload stored under it')
  .option('--no-validate', 'With --raw, store payloads even if they do not hash to their CID')
  .option('--index', 'Also write the index of the new archive to <car>.idx')
  .action(async (car: string, options: WriteCommandOptions) => {
    const config = createConfig()
    const logger = createLogger({ logLevel: options.logLevel ?? config.logLevel })

    const input = options.input === undefined ? process.stdin : createReadStream(options.input)
    const lines = createInterface({ input, crlfDelay: Number.POSITIVE_INFINITY })

    try {
      await runWrite({
        carPath: car,
        lines,
        raw: options.raw,
        validate: options.validate,
        indexPath: options.index === true ? defaultIndexPath(car) : undefined,
        logger,
      })
    } finally {
      lines.close()
    }
  })

addCommonOptions(writeCommand)
