#!/usr/bin/env node
import 'dotenv/config'
import process from 'node:process'
import chalk from 'chalk'
import {Command} from 'commander'
import {NfsnowError} from '@nfsnow/core'
import {registerConfigCommand} from './commands/config.js'
import {registerRunCommand} from './commands/run.js'
import {describeError} from './utils.js'

async function main() {
  const program = new Command()

  program
    .name('nfsnow')
    .description('Run Nextflow projects on Snowpark Container Services')
    .version('0.1.0')
    .option('--config-dir <path>', 'Directory holding .nfsnow.yml', process.env.NFSNOW_CONFIG_DIR ?? '.')
    .option('--json', 'Output structured JSON logs')

  registerRunCommand(program)
  registerConfigCommand(program)

  await program.parseAsync()
}

try {
  await main()
} catch (error: unknown) {
  if (!(error instanceof NfsnowError)) {
    console.error('Fatal error:', error)
    throw error
  }

  const {message, hint} = describeError(error)
  console.error(chalk.red(`✗ ${message}`))
  if (hint) {
    console.error(chalk.gray(`  ${hint}`))
  }

  process.exitCode = 1
}
