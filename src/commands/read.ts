import { Command } from 'commander'
import { createConfig } from '../config.js'
import { createLogger } from '../logger.js'
import { runRead } from '../read/read.js'
import {
  addCommonOptions,
  addVerifyOption,
  type CommonCLIOptions,
  type VerifyCLIOptions,
} from '../utils/cli-options.js'

interface ReadCommandOptions extends CommonCLIOptions, VerifyCLIOptions {
  rows?: boolean
}

export const readCommand = new Command('read')
  .description('Stream every block of a CAR file')
  .argument('<car>', 'Path to the CAR file')
  .option('--rows', 'Decode dag-cbor blocks as key/data rows')
  .action(async (car: string, options: ReadCommandOptions) => {
    const config = createConfig()
    const logger = createLogger({ logLevel: options.logLevel ?? config.logLevel })

    await runRead({
      carPath: car,
      verify: options.verify ?? config.verify,
      rows: options.rows,
      chunkSize: config.chunkSize,
      logger,
    })
  })

addVerifyOption(readCommand)
addCommonOptions(readCommand)
