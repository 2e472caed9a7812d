import {readFile, writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import {parse as parseYaml, stringify as stringifyYaml} from 'yaml'
import {z} from 'zod'
import {InvalidInputError} from '@nfsnow/core'

export const CONFIG_FILE = '.nfsnow.yml'

const configSchema = z.object({
  /** Container image bundling Nextflow and the PTY streaming server. */
  image: z.string().min(1).optional(),
  /** Snowflake CLI connection name. */
  connection: z.string().min(1).optional(),
  /** Nextflow executable used to read the project configuration. */
  tool: z.string().min(1).optional(),
  readyTimeoutSec: z.number().int().positive().optional(),
  token: z.string().min(1).optional(),
  /** Command printing a session token on stdout. */
  tokenCommand: z.string().min(1).optional(),
  jobPrefix: z.string().regex(/^[A-Za-z_]\w*$/).optional()
}).strict()

export type NfsnowConfig = z.infer<typeof configSchema>

export type ConfigKey = keyof NfsnowConfig

export const configKeys: readonly ConfigKey[] = [
  'image',
  'connection',
  'tool',
  'readyTimeoutSec',
  'token',
  'tokenCommand',
  'jobPrefix'
]

export function isConfigKey(key: string): key is ConfigKey {
  return configKeys.some(k => k === key)
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message)
    .join('; ')
}

/**
 * Loads the project-level `.nfsnow.yml` configuration from a directory.
 * Returns an empty config when the file does not exist.
 */
export async function loadConfig(dir: string): Promise<NfsnowConfig> {
  let content: string
  try {
    content = await readFile(join(dir, CONFIG_FILE), 'utf8')
  } catch (error: unknown) {
    if (isMissingFile(error)) {
      return {}
    }

    throw error
  }

  const parsed: unknown = parseYaml(content)
  if (parsed === null || parsed === undefined) {
    return {}
  }

  const result = configSchema.safeParse(parsed)
  if (!result.success) {
    throw new InvalidInputError(`Invalid ${CONFIG_FILE}: ${describeIssues(result.error)}`)
  }

  return result.data
}

export async function saveConfig(dir: string, config: NfsnowConfig): Promise<void> {
  await writeFile(join(dir, CONFIG_FILE), stringifyYaml(config), 'utf8')
}

/**
 * Returns a copy of `config` with `key` set from its command-line text.
 */
export function setConfigValue(config: NfsnowConfig, key: string, value: string): NfsnowConfig {
  if (!isConfigKey(key)) {
    throw new InvalidInputError(`Unknown config key '${key}'. Expected one of: ${configKeys.join(', ')}`)
  }

  const candidate: Record<string, unknown> = {...config}
  candidate[key] = key === 'readyTimeoutSec' ? Number(value) : value

  const result = configSchema.safeParse(candidate)
  if (!result.success) {
    throw new InvalidInputError(`Invalid value for ${key}: ${describeIssues(result.error)}`)
  }

  return result.data
}

/**
 * Applies environment fallbacks to the values the file leaves unset.
 */
export function resolveSettings(config: NfsnowConfig, env: Record<string, string | undefined>): NfsnowConfig {
  return {
    ...config,
    image: config.image ?? (env.NFSNOW_IMAGE || undefined),
    token: config.token ?? (env.NFSNOW_TOKEN || undefined),
    connection: config.connection ?? (env.NFSNOW_CONNECTION || undefined)
  }
}
