import {ConfigExtractor} from './config-extractor.js'
import {ExecaCommandRunner, type CommandRunner} from './engine/command-runner.js'
import {
  NfsnowError,
  ReadinessTimeoutError,
  RunAbortedError,
  SubmissionError
} from './errors.js'
import {ArtifactPackager} from './packager.js'
import type {ComputePlatform} from './platform/platform.js'
import type {SessionProvider} from './platform/session.js'
import {ConsoleReporter, type Reporter, type RunContext, type StageName} from './reporter.js'
import {createRunIdentity} from './run-identity.js'
import {buildJobSpecification, serializeSpecification} from './spec-builder.js'
import {StreamClient, type Streamer} from './stream/stream-client.js'
import type {RandomSource, RunIdentity, RunOutcome} from './types.js'

export const DEFAULT_READY_TIMEOUT_SEC = 30

export type OrchestratorOptions = {
  platform: ComputePlatform;
  session: SessionProvider;
  /** Container image bundling Nextflow and the PTY streaming server. */
  image: string;
  runner?: CommandRunner;
  reporter?: Reporter;
  streamer?: Streamer;
  random?: RandomSource;
  /** Nextflow executable used to resolve the project configuration. */
  tool?: string;
  jobPrefix?: string;
  readyTimeoutSec?: number;
  /** Parent directory of the temporary archive directory. */
  tmpRoot?: string;
}

export type RunOptions = {
  projectDir: string;
  profile?: string;
  /** Aborts the current stage; while streaming the run ends as cancelled. */
  signal?: AbortSignal;
}

/** Per-run bookkeeping, never shared between runs. */
type RunState = {
  stage?: StageName;
  /** Service creation abandoned by an abort, awaited before cleanup. */
  pending?: Promise<unknown>;
}

/**
 * Runs a Nextflow project on the remote platform:
 * config → package → submit → wait → endpoint → stream, then cleanup.
 *
 * The service is dropped as the last action of every run, whichever stage
 * failed and whatever outcome the stream reported.
 */
export class Orchestrator {
  private readonly platform: ComputePlatform
  private readonly reporter: Reporter
  private readonly extractor: ConfigExtractor
  private readonly packager: ArtifactPackager
  private readonly streamer: Streamer
  private readonly image: string
  private readonly random: RandomSource | undefined
  private readonly jobPrefix: string | undefined
  private readonly readyTimeoutSec: number

  constructor(options: OrchestratorOptions) {
    this.platform = options.platform
    this.reporter = options.reporter ?? new ConsoleReporter()
    this.extractor = new ConfigExtractor(options.runner ?? new ExecaCommandRunner(), options.tool)
    this.packager = new ArtifactPackager(options.platform, options.tmpRoot)
    this.streamer = options.streamer ?? new StreamClient(options.session)
    this.image = options.image
    this.random = options.random
    this.jobPrefix = options.jobPrefix
    this.readyTimeoutSec = options.readyTimeoutSec ?? DEFAULT_READY_TIMEOUT_SEC
  }

  async run(options: RunOptions): Promise<RunOutcome> {
    const identity = createRunIdentity({random: this.random, prefix: this.jobPrefix})
    const job: RunContext = {runId: identity.token, jobName: identity.jobName}
    const state: RunState = {}

    this.reporter.emit({...job, event: 'RUN_START', projectDir: options.projectDir, profile: options.profile})

    let outcome: RunOutcome
    try {
      outcome = await this.execute(identity, job, state, options)
    } catch (error) {
      this.reporter.emit({
        ...job,
        event: 'RUN_FAILED',
        stage: state.stage,
        code: error instanceof NfsnowError ? error.code : 'UNEXPECTED_ERROR',
        message: error instanceof Error ? error.message : String(error)
      })
      throw error
    } finally {
      await this.cleanup(identity, job, state)
    }

    this.reporter.emit({...job, event: 'RUN_FINISHED', outcome})
    return outcome
  }

  private async execute(identity: RunIdentity, job: RunContext, state: RunState, options: RunOptions): Promise<RunOutcome> {
    const {projectDir, profile, signal} = options

    const config = await this.stage(job, state, 'config', signal,
      async () => this.extractor.extract(projectDir, {profile, signal}))

    const artifact = await this.stage(job, state, 'package', signal,
      async () => this.packager.packageAndUpload(projectDir, config.workDirStage, identity, signal))

    const specification = serializeSpecification(buildJobSpecification({config, identity, artifact, image: this.image, profile}))

    await this.stage(job, state, 'submit', signal, async () => {
      try {
        await this.platform.submit(identity, config.computePool, specification)
      } catch (error) {
        throw asSubmissionError(error, `Failed to create service ${identity.jobName}`)
      }
    })

    await this.stage(job, state, 'wait', signal, async () => {
      let ready: boolean
      try {
        ready = await this.platform.waitReady(identity, this.readyTimeoutSec, signal)
      } catch (error) {
        throw asSubmissionError(error, `Failed waiting for service ${identity.jobName}`)
      }

      if (!ready) {
        throw new ReadinessTimeoutError(identity.jobName, this.readyTimeoutSec)
      }
    })

    const url = await this.stage(job, state, 'endpoint', signal, async () => {
      try {
        return await this.platform.queryEndpoint(identity, signal)
      } catch (error) {
        throw asSubmissionError(error, `Failed to find the streaming endpoint of ${identity.jobName}`)
      }
    })

    return this.stage(job, state, 'stream', undefined, async () => this.streamer.stream(url, {
      signal,
      onOutput: data => {
        this.reporter.emit({...job, event: 'STREAM_OUTPUT', data})
      },
      onStatus: (phase, fields) => {
        this.reporter.emit({...job, event: 'STREAM_STATUS', phase, fields})
      }
    }))
  }

  /**
   * Runs one stage, reporting its start and end. With a signal, an abort
   * rejects right away with `RunAbortedError`. Other stages receive the
   * signal and cancel their own work; an abandoned service creation is kept
   * in `state.pending` so that cleanup drops the service only once it exists.
   */
  private async stage<T>(
    job: RunContext,
    state: RunState,
    stage: StageName,
    signal: AbortSignal | undefined,
    operation: () => Promise<T>
  ): Promise<T> {
    if (signal?.aborted) {
      throw new RunAbortedError(stage)
    }

    state.stage = stage
    this.reporter.emit({...job, event: 'STAGE_STARTING', stage})
    const startedAt = Date.now()

    const pending = operation()
    if (stage === 'submit') {
      state.pending = pending
    }

    const result = await raceAbort(pending, signal, stage)
    state.pending = undefined

    this.reporter.emit({...job, event: 'STAGE_FINISHED', stage, durationMs: Date.now() - startedAt})
    return result
  }

  private async cleanup(identity: RunIdentity, job: RunContext, state: RunState): Promise<void> {
    if (state.pending) {
      await state.pending.then(noop, noop)
    }

    this.reporter.emit({...job, event: 'STAGE_STARTING', stage: 'cleanup'})
    const startedAt = Date.now()
    try {
      await this.platform.deleteJob(identity)
    } catch (error) {
      this.reporter.emit({
        ...job,
        event: 'CLEANUP_FAILED',
        message: `Failed to drop service ${identity.jobName}: ${error instanceof Error ? error.message : String(error)}`
      })
      return
    }

    this.reporter.emit({...job, event: 'STAGE_FINISHED', stage: 'cleanup', durationMs: Date.now() - startedAt})
  }
}

function noop(): void {}

function asSubmissionError(error: unknown, message: string): Error {
  if (error instanceof SubmissionError || error instanceof RunAbortedError) {
    return error
  }

  const detail = error instanceof Error ? error.message : String(error)
  return new SubmissionError(`${message}: ${detail}`, {cause: error})
}

async function raceAbort<T>(operation: Promise<T>, signal: AbortSignal | undefined, stage: StageName): Promise<T> {
  if (!signal) {
    return operation
  }

  if (signal.aborted) {
    throw new RunAbortedError(stage)
  }

  let removeListener = noop
  const aborted = new Promise<never>((_resolve, reject) => {
    const onAbort = () => {
      reject(new RunAbortedError(stage))
    }

    signal.addEventListener('abort', onAbort, {once: true})
    removeListener = () => {
      signal.removeEventListener('abort', onAbort)
    }
  })

  try {
    return await Promise.race([operation, aborted])
  } finally {
    removeListener()
  }
}
