#!/usr/bin/env node

import { readFileSync } from 'node:fs'
import { dirname, join } from 'node:path'
import process from 'node:process'
import { fileURLToPath } from 'node:url'
import { Command, CommanderError } from 'commander'
import { indexCommand } from './commands/index-car.js'
import { readCommand } from './commands/read.js'
import { seekCommand } from './commands/seek.js'
import { writeCommand } from './commands/write.js'
import { describeError, exitCodeFor } from './common/errors.js'

// Get package.json for version info
const filename = fileURLToPath(import.meta.url)
const dirname_ = dirname(filename)
const packageJson = JSON.parse(readFileSync(join(dirname_, '../package.json'), 'utf-8')) as {
  version: string
  name: string
}

const program = new Command()
  .name(packageJson.name)
  .description('Read, write, index and seek CAR (Content Addressable aRchive) files')
  .version(packageJson.version)
  .addCommand(readCommand)
  .addCommand(writeCommand)
  .addCommand(indexCommand)
  .addCommand(seekCommand)

// Throw instead of exiting so every failure goes through the exit-code mapping below
for (const command of [program, ...program.commands]) {
  command.exitOverride()
}

program.parseAsync(process.argv).catch((error: unknown) => {
  // Commander has already printed its own usage message
  if (!(error instanceof CommanderError)) {
    console.error(describeError(error))
  }
  process.exitCode = exitCodeFor(error)
})
