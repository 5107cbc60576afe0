import { Command } from 'commander'
import { createConfig } from '../config.js'
import { runIndex } from '../indexer/indexer.js'
import { createLogger } from '../logger.js'
import {
  addCommonOptions,
  addVerifyOption,
  type CommonCLIOptions,
  type VerifyCLIOptions,
} from '../utils/cli-options.js'

interface IndexCommandOptions extends CommonCLIOptions, VerifyCLIOptions {
  output?: string
  print?: boolean
  rows?: boolean
}

export const indexCommand = new Command('index')
  .description('Build the sorted CID index of a CAR file')
  .argument('<car>', 'Path to the CAR file')
  .option('-o, --output <file>', 'Index file to write (default: <car>.idx)')
  .option('--print', 'List every index entry')
  .option('--rows', 'With --print, show row keys instead of CIDs')
  .action(async (car: string, options: IndexCommandOptions) => {
    const config = createConfig()
    const logger = createLogger({ logLevel: options.logLevel ?? config.logLevel })

    await runIndex({
      carPath: car,
      outputPath: options.output,
      print: options.print,
      rows: options.rows,
      verify: options.verify ?? config.verify,
      chunkSize: config.chunkSize,
      logger,
    })
  })

addVerifyOption(indexCommand)
addCommonOptions(indexCommand)
