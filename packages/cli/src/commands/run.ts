import process from 'node:process'
import {resolve} from 'node:path'
import chalk from 'chalk'
import type {Command} from 'commander'
import {
  CommandTokenSession,
  ConsoleReporter,
  InvalidInputError,
  Orchestrator,
  SnowCliPlatform,
  StaticTokenSession,
  type SessionProvider
} from '@nfsnow/core'
import {CONFIG_FILE, loadConfig, resolveSettings, type NfsnowConfig} from '../config.js'
import {InteractiveReporter} from '../interactive-reporter.js'
import {describeOutcome, getGlobalOptions} from '../utils.js'

function createSession(settings: NfsnowConfig): SessionProvider {
  if (settings.tokenCommand) {
    return new CommandTokenSession(settings.tokenCommand)
  }

  return new StaticTokenSession(settings.token ?? '')
}

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Run a Nextflow project on Snowpark Container Services')
    .argument('<projectDir>', 'Nextflow project directory')
    .option('-p, --profile <name>', 'Nextflow configuration profile')
    .option('--image <image>', 'Container image with Nextflow and the PTY server')
    .option('-c, --connection <name>', 'Snowflake CLI connection')
    .action(async (projectDir: string, options: {profile?: string; image?: string; connection?: string}, cmd: Command) => {
      const {configDir, json} = getGlobalOptions(cmd)
      const settings = resolveSettings(await loadConfig(resolve(configDir)), process.env)

      const image = options.image ?? settings.image
      if (!image) {
        throw new InvalidInputError(`No container image configured: pass --image, set "image" in ${CONFIG_FILE} or NFSNOW_IMAGE`)
      }

      const orchestrator = new Orchestrator({
        platform: new SnowCliPlatform({connection: options.connection ?? settings.connection}),
        session: createSession(settings),
        image,
        reporter: json ? new ConsoleReporter() : new InteractiveReporter(),
        tool: settings.tool,
        jobPrefix: settings.jobPrefix,
        readyTimeoutSec: settings.readyTimeoutSec
      })

      const controller = new AbortController()
      const onSignal = () => {
        controller.abort()
      }

      process.once('SIGINT', onSignal)
      process.once('SIGTERM', onSignal)

      try {
        const outcome = await orchestrator.run({projectDir, profile: options.profile, signal: controller.signal})
        const {exitCode, message} = describeOutcome(outcome)
        if (json) {
          console.log(JSON.stringify({outcome, message}))
        } else if (exitCode === 0) {
          console.error(chalk.bold.green(`\n✓ ${message}\n`))
        } else {
          console.error(chalk.bold.red(`\n✗ ${message}\n`))
        }

        process.exitCode = exitCode
      } finally {
        process.off('SIGINT', onSignal)
        process.off('SIGTERM', onSignal)
      }
    })
}
