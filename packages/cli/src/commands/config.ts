import process from 'node:process'
import {resolve} from 'node:path'
import chalk from 'chalk'
import type {Command} from 'commander'
import {InvalidInputError} from '@nfsnow/core'
import {
  CONFIG_FILE,
  configKeys,
  isConfigKey,
  loadConfig,
  saveConfig,
  setConfigValue
} from '../config.js'
import {getGlobalOptions} from '../utils.js'

export function registerConfigCommand(program: Command): void {
  const config = program
    .command('config')
    .description(`Read or update ${CONFIG_FILE}`)

  config
    .command('get')
    .description('Print a configuration value')
    .argument('<key>', `One of: ${configKeys.join(', ')}`)
    .action(async (key: string, _options: Record<string, unknown>, cmd: Command) => {
      if (!isConfigKey(key)) {
        throw new InvalidInputError(`Unknown config key '${key}'. Expected one of: ${configKeys.join(', ')}`)
      }

      const {configDir, json} = getGlobalOptions(cmd)
      const value = (await loadConfig(resolve(configDir)))[key]

      if (json) {
        console.log(JSON.stringify({key, value: value ?? null}))
        return
      }

      if (value === undefined) {
        console.error(chalk.gray(`${key} is not set`))
        process.exitCode = 1
        return
      }

      console.log(String(value))
    })

  config
    .command('set')
    .description('Set a configuration value')
    .argument('<key>', `One of: ${configKeys.join(', ')}`)
    .argument('<value>', 'New value')
    .action(async (key: string, value: string, _options: Record<string, unknown>, cmd: Command) => {
      const {configDir} = getGlobalOptions(cmd)
      const dir = resolve(configDir)
      await saveConfig(dir, setConfigValue(await loadConfig(dir), key, value))
      console.error(chalk.green(`Set ${key} in ${CONFIG_FILE}`))
    })
}
