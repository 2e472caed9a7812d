import {mkdtemp} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join} from 'node:path'
import {WebSocketServer, type WebSocket} from 'ws'
import {CommandRunner, type OutputHandlers, type RunCommandOptions} from '../engine/command-runner.js'
import {ComputePlatform} from '../platform/platform.js'
import type {SessionProvider} from '../platform/session.js'
import type {Reporter, RunEvent} from '../reporter.js'
import type {RandomSource, RunIdentity} from '../types.js'

/**
 * Creates a temporary directory for test isolation.
 * Each test should use its own tmpdir to avoid interference.
 */
export async function createTmpDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'nfsnow-test-'))
}

/**
 * Returns a reporter that records emit() calls for assertions.
 */
export function recordingReporter(): {reporter: Reporter; events: RunEvent[]} {
  const events: RunEvent[] = []
  const reporter: Reporter = {
    emit(event: RunEvent) {
      events.push(event)
    }
  }

  return {reporter, events}
}

/**
 * Random source replaying `values` in a loop.
 */
export function sequenceRandom(values: number[]): RandomSource {
  let index = 0
  return max => {
    const value = values[index % values.length] % max
    index++
    return value
  }
}

export const staticSession = (token = 'test-token'): SessionProvider => ({
  async issueToken() {
    return token
  }
})

export const identity: RunIdentity = {
  token: 'abcd1234',
  jobName: 'NXF_MAIN_abcd1234',
  tags: {NEXTFLOW_JOB_TYPE: 'main', NEXTFLOW_RUN_ID: 'abcd1234'}
}

/**
 * Command runner replaying canned output and exit code.
 */
export class FakeCommandRunner extends CommandRunner {
  readonly calls: Array<{argv: string[]; cwd?: string}> = []

  constructor(private readonly output: {stdout?: string[]; stderr?: string[]; exitCode?: number} = {}) {
    super()
  }

  async run(argv: readonly string[], handlers: OutputHandlers, options?: RunCommandOptions): Promise<number> {
    this.calls.push({argv: [...argv], cwd: options?.cwd})
    for (const line of this.output.stdout ?? []) {
      handlers.onStdout(line)
    }

    for (const line of this.output.stderr ?? []) {
      handlers.onStderr(line)
    }

    return this.output.exitCode ?? 0
  }
}

type PlatformCall =
  | {method: 'upload'; jobName: string; localPath: string; location: string}
  | {method: 'submit'; jobName: string; computePool: string; specification: string}
  | {method: 'waitReady'; jobName: string; timeoutSec: number}
  | {method: 'queryEndpoint'; jobName: string}
  | {method: 'deleteJob'; jobName: string}

/**
 * Platform recording every call. Individual operations can be overridden.
 */
export class FakePlatform extends ComputePlatform {
  readonly calls: PlatformCall[] = []

  constructor(private readonly overrides: {
    upload?: (localPath: string, signal?: AbortSignal) => Promise<void>;
    submit?: () => Promise<void>;
    waitReady?: (signal?: AbortSignal) => Promise<boolean>;
    queryEndpoint?: (signal?: AbortSignal) => Promise<string>;
    deleteJob?: () => Promise<void>;
  } = {}) {
    super()
  }

  get methods(): string[] {
    return this.calls.map(c => c.method)
  }

  async upload(identity: RunIdentity, localPath: string, location: string, signal?: AbortSignal): Promise<void> {
    this.calls.push({method: 'upload', jobName: identity.jobName, localPath, location})
    await this.overrides.upload?.(localPath, signal)
  }

  async submit(identity: RunIdentity, computePool: string, specification: string): Promise<void> {
    this.calls.push({method: 'submit', jobName: identity.jobName, computePool, specification})
    await this.overrides.submit?.()
  }

  async waitReady(identity: RunIdentity, timeoutSec: number, signal?: AbortSignal): Promise<boolean> {
    this.calls.push({method: 'waitReady', jobName: identity.jobName, timeoutSec})
    return this.overrides.waitReady ? this.overrides.waitReady(signal) : true
  }

  async queryEndpoint(identity: RunIdentity, signal?: AbortSignal): Promise<string> {
    this.calls.push({method: 'queryEndpoint', jobName: identity.jobName})
    return this.overrides.queryEndpoint ? this.overrides.queryEndpoint(signal) : 'wss://endpoint.example.test'
  }

  async deleteJob(identity: RunIdentity): Promise<void> {
    this.calls.push({method: 'deleteJob', jobName: identity.jobName})
    await this.overrides.deleteJob?.()
  }
}

/**
 * In-process WebSocket server standing in for the PTY server.
 * `onConnection` scripts what each client receives.
 */
export async function startStreamServer(
  onConnection: (socket: WebSocket, authorization: string | undefined) => void,
  options?: {rejectWith?: number}
): Promise<{url: string; close: () => Promise<void>}> {
  const rejectWith = options?.rejectWith
  const server = new WebSocketServer({
    host: '127.0.0.1',
    port: 0,
    verifyClient: rejectWith === undefined
      ? undefined
      : (_info, callback) => {
        callback(false, rejectWith)
      }
  })

  server.on('connection', (socket, request) => {
    onConnection(socket, request.headers.authorization)
  })

  await new Promise<void>(resolve => {
    server.once('listening', () => {
      resolve()
    })
  })

  const address = server.address()
  if (address === null || typeof address === 'string') {
    throw new Error('Stream server is not listening on a TCP port')
  }

  return {
    url: `ws://127.0.0.1:${address.port}`,
    async close() {
      for (const client of server.clients) {
        client.terminate()
      }

      await new Promise<void>(resolve => {
        server.close(() => {
          resolve()
        })
      })
    }
  }
}
