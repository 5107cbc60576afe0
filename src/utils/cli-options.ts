/**
 * Shared CLI options for commands
 *
 * Reusable option definitions for Commander.js commands so every subcommand
 * spells them the same way.
 */

import type { Command } from 'commander'

export interface CommonCLIOptions {
  logLevel?: string
}

export interface VerifyCLIOptions {
  verify?: boolean
}

/**
 * Add the diagnostic options every command accepts
 *
 * @example
 * ```typescript
 * const myCommand = new Command('mycommand').action(async (options: CommonCLIOptions) => {
 *   const logger = createLogger({ logLevel: options.logLevel })
 * })
 *
 * addCommonOptions(myCommand)
 * ```
 */
export function addCommonOptions(command: Command): Command {
  return command.option('--log-level <level>', 'pino log level for diagnostics on stderr (can also use LOG_LEVEL env)')
}

/**
 * Add the digest verification switch to commands that decode payloads
 */
export function addVerifyOption(command: Command): Command {
  return command.option('--verify', 'check every payload against its CID digest (can also use CAR_VERIFY env)')
}
