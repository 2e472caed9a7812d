import {stat} from 'node:fs/promises'
import {basename, dirname, resolve} from 'node:path'
import {ConfigParseError, InvalidInputError} from './errors.js'
import type {CommandRunner} from './engine/command-runner.js'
import {emptyVolumeConfig, parseStageMounts} from './stage-mounts.js'
import type {ProjectConfiguration} from './types.js'

export const DEFAULT_TOOL = 'nextflow'

const keyMap = {
  'snowflake.computePool': 'computePool',
  'snowflake.workDirStage': 'workDirStage',
  'snowflake.stageMounts': 'stageMounts'
} as const

type RawConfig = Partial<Record<(typeof keyMap)[keyof typeof keyMap], string>>

function isKnownKey(key: string): key is keyof typeof keyMap {
  return Object.hasOwn(keyMap, key)
}

/**
 * Trims a config value and strips one layer of surrounding quotes.
 */
export function unquote(value: string): string {
  const trimmed = value.trim()
  if (trimmed.length >= 2) {
    const first = trimmed[0]
    if ((first === '\'' || first === '"') && trimmed.at(-1) === first) {
      return trimmed.slice(1, -1)
    }
  }

  return trimmed
}

/**
 * Parses one `key = value` line of `nextflow config -flat`.
 * Returns undefined for lines that do not have that shape.
 */
export function parseConfigLine(line: string): {key: string; value: string} | undefined {
  const separator = line.indexOf(' = ')
  if (separator <= 0) {
    return undefined
  }

  return {key: line.slice(0, separator).trim(), value: unquote(line.slice(separator + 3))}
}

/**
 * Resolves the Snowflake settings of a Nextflow project by running
 * `nextflow config <project> -flat` and reading its output.
 */
export class ConfigExtractor {
  constructor(
    private readonly runner: CommandRunner,
    private readonly tool = DEFAULT_TOOL
  ) {}

  async extract(projectDir: string, options?: {profile?: string; signal?: AbortSignal}): Promise<ProjectConfiguration> {
    const projectPath = await resolveProjectDir(projectDir)

    const argv = [this.tool, 'config', basename(projectPath), '-flat']
    if (options?.profile) {
      argv.push('-profile', options.profile)
    }

    const raw: RawConfig = {}
    const stderr: string[] = []

    const exitCode = await this.runner.run(argv, {
      onStdout(line) {
        const entry = parseConfigLine(line)
        if (entry && isKnownKey(entry.key)) {
          raw[keyMap[entry.key]] = entry.value
        }
      },
      onStderr(line) {
        stderr.push(line)
      }
    }, {cwd: dirname(projectPath), signal: options?.signal})

    if (exitCode !== 0) {
      throw new ConfigParseError('Failed to parse nextflow.config', stderr)
    }

    if (!raw.computePool) {
      throw new ConfigParseError('snowflake.computePool is not set in nextflow.config', stderr)
    }

    if (!raw.workDirStage) {
      throw new ConfigParseError('snowflake.workDirStage is not set in nextflow.config', stderr)
    }

    return Object.freeze({
      computePool: raw.computePool,
      workDirStage: raw.workDirStage,
      volumeConfig: raw.stageMounts === undefined ? emptyVolumeConfig : parseStageMounts(raw.stageMounts)
    })
  }
}

/**
 * Resolves a project path and checks that it is an existing directory.
 */
export async function resolveProjectDir(projectDir: string): Promise<string> {
  const projectPath = resolve(projectDir)
  try {
    const stats = await stat(projectPath)
    if (stats.isDirectory()) {
      return projectPath
    }
  } catch (error) {
    throw new InvalidInputError(`Invalid project directory '${projectDir}'`, {cause: error})
  }

  throw new InvalidInputError(`Invalid project directory '${projectDir}'`)
}
