import process from 'node:process'
import {execa} from 'execa'
import {PlatformCommandError, RunAbortedError, ToolNotFoundError} from '../errors.js'
import {STREAM_ENDPOINT} from '../spec-builder.js'
import type {RunIdentity} from '../types.js'
import {ComputePlatform} from './platform.js'

/**
 * Build a minimal environment for the Snowflake CLI process.
 * Only PATH, HOME, locale, XDG_* and SNOWFLAKE_* are kept so that unrelated
 * host secrets never reach the subprocess.
 */
function snowCliEnv(): Record<string, string> {
  const env: Record<string, string> = {}
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined && (key === 'PATH' || key === 'HOME' || key === 'LANG' || key.startsWith('XDG_') || key.startsWith('SNOWFLAKE_'))) {
      env[key] = value
    }
  }

  return env
}

export function quoteLiteral(value: string): string {
  return `'${value.replaceAll('\'', '\'\'')}'`
}

type Row = Record<string, unknown>

function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Extracts the rows of the last statement from `snow sql --format json`
 * output. A single statement prints an array of rows, several statements
 * print one array per statement.
 */
export function lastResultRows(output: string): Row[] {
  const parsed: unknown = JSON.parse(output)
  if (!Array.isArray(parsed)) {
    return []
  }

  if (parsed.length > 0 && parsed.every(item => Array.isArray(item))) {
    const last: unknown = parsed.at(-1)
    return Array.isArray(last) ? last.filter(item => isRow(item)) : []
  }

  return parsed.filter(item => isRow(item))
}

/**
 * Adds a `wss://` scheme to an ingress host, leaving full URLs untouched.
 */
export function toStreamUrl(ingress: string): string {
  return /^[a-z][a-z\d+.-]*:\/\//i.test(ingress) ? ingress : `wss://${ingress}`
}

const readinessTimeoutPattern = /timed? ?out|did not reach|not ready/i

export type SnowCliPlatformOptions = {
  /** Named connection from the Snowflake CLI configuration. */
  connection?: string;
  /** Snowflake CLI executable (default: "snow"). */
  bin?: string;
}

/**
 * Remote platform backed by the Snowflake CLI. Every call runs
 * `snow sql --format json` with the run's query tag set first.
 */
export class SnowCliPlatform extends ComputePlatform {
  private readonly env = snowCliEnv()
  private readonly bin: string
  private readonly connection: string | undefined

  constructor(options: SnowCliPlatformOptions = {}) {
    super()
    this.bin = options.bin ?? 'snow'
    this.connection = options.connection
  }

  async upload(identity: RunIdentity, localPath: string, location: string, signal?: AbortSignal): Promise<void> {
    await this.query(identity, `PUT ${quoteLiteral(`file://${localPath}`)} @${location} AUTO_COMPRESS = FALSE OVERWRITE = TRUE`, signal)
  }

  async submit(identity: RunIdentity, computePool: string, specification: string): Promise<void> {
    await this.query(identity, [
      `CREATE SERVICE ${identity.jobName}`,
      `IN COMPUTE POOL ${computePool}`,
      'FROM SPECIFICATION $$',
      specification,
      '$$'
    ].join('\n'))
  }

  async waitReady(identity: RunIdentity, timeoutSec: number, signal?: AbortSignal): Promise<boolean> {
    try {
      await this.query(identity, `CALL SYSTEM$WAIT_FOR_SERVICES(${Math.ceil(timeoutSec)}, ${quoteLiteral(identity.jobName)})`, signal)
    } catch (error) {
      if (error instanceof PlatformCommandError && readinessTimeoutPattern.test(error.stderr)) {
        return false
      }

      throw error
    }

    return true
  }

  async queryEndpoint(identity: RunIdentity, signal?: AbortSignal): Promise<string> {
    const rows = await this.query(identity, `SHOW ENDPOINTS IN SERVICE ${identity.jobName}`, signal)
    const row = rows.find(r => r.name === STREAM_ENDPOINT.name) ?? rows[0]
    const ingress = row?.ingress_url
    if (typeof ingress !== 'string' || ingress === '') {
      throw new PlatformCommandError(`Service ${identity.jobName} exposes no ingress URL`)
    }

    return toStreamUrl(ingress)
  }

  async deleteJob(identity: RunIdentity): Promise<void> {
    await this.query(identity, `DROP SERVICE IF EXISTS ${identity.jobName}`)
  }

  private async query(identity: RunIdentity, sql: string, signal?: AbortSignal): Promise<Row[]> {
    const statements = `ALTER SESSION SET QUERY_TAG = ${quoteLiteral(JSON.stringify(identity.tags))};\n${sql}`
    const args = ['sql', '--query', statements, '--format', 'json']
    if (this.connection) {
      args.push('--connection', this.connection)
    }

    const result = await execa(this.bin, args, {env: this.env, extendEnv: false, reject: false, cancelSignal: signal})
    if (result.isCanceled) {
      throw new RunAbortedError(`${this.bin} sql`, {cause: result})
    }

    if (result.exitCode === undefined) {
      throw new ToolNotFoundError(this.bin, {cause: result})
    }

    if (result.exitCode !== 0) {
      throw new PlatformCommandError(`${this.bin} sql exited with code ${result.exitCode}`, result.stderr.trim())
    }

    try {
      return lastResultRows(result.stdout)
    } catch (error) {
      throw new PlatformCommandError(`Unexpected output from ${this.bin} sql`, result.stdout.trim(), {cause: error})
    }
  }
}
