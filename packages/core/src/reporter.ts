import pino from 'pino'
import type {StatusPhase} from './stream/protocol.js'
import type {RunOutcome} from './types.js'

export type StageName =
  | 'config'
  | 'package'
  | 'submit'
  | 'wait'
  | 'endpoint'
  | 'stream'
  | 'cleanup'

/** Common fields identifying a run. */
export type RunContext = {
  runId: string;
  jobName: string;
}

/**
 * Discriminated union of run events.
 *
 * Lifecycle:
 * 1. RUN_START - A run token has been generated
 * 2. For each stage (config, package, submit, wait, endpoint, stream):
 *    a. STAGE_STARTING
 *    b. STAGE_FINISHED, unless the stage failed
 *    c. STREAM_OUTPUT / STREAM_STATUS - Live frames while streaming
 * 3. STAGE_STARTING / STAGE_FINISHED for cleanup, always
 *    OR CLEANUP_FAILED - The service could not be dropped
 * 4. RUN_FINISHED - An outcome was observed
 *    OR RUN_FAILED - A stage raised
 */
export type RunStartEvent = RunContext & {
  event: 'RUN_START';
  projectDir: string;
  profile?: string;
}

export type StageStartingEvent = RunContext & {
  event: 'STAGE_STARTING';
  stage: StageName;
}

export type StageFinishedEvent = RunContext & {
  event: 'STAGE_FINISHED';
  stage: StageName;
  durationMs: number;
}

export type StreamOutputEvent = RunContext & {
  event: 'STREAM_OUTPUT';
  data: string;
}

export type StreamStatusEvent = RunContext & {
  event: 'STREAM_STATUS';
  phase: StatusPhase;
  fields: Record<string, unknown>;
}

export type CleanupFailedEvent = RunContext & {
  event: 'CLEANUP_FAILED';
  message: string;
}

export type RunFinishedEvent = RunContext & {
  event: 'RUN_FINISHED';
  outcome: RunOutcome;
}

export type RunFailedEvent = RunContext & {
  event: 'RUN_FAILED';
  stage?: StageName;
  code: string;
  message: string;
}

export type RunEvent =
  | RunStartEvent
  | StageStartingEvent
  | StageFinishedEvent
  | StreamOutputEvent
  | StreamStatusEvent
  | CleanupFailedEvent
  | RunFinishedEvent
  | RunFailedEvent

/**
 * Interface for reporting run events.
 */
export type Reporter = {
  emit(event: RunEvent): void;
}

/**
 * Reporter that outputs structured JSON logs via pino.
 * Suitable for CI/CD environments and log aggregation.
 */
export class ConsoleReporter implements Reporter {
  private readonly logger = pino({level: 'info'})

  emit(event: RunEvent): void {
    switch (event.event) {
      case 'CLEANUP_FAILED': {
        this.logger.warn(event)
        break
      }

      case 'RUN_FAILED': {
        this.logger.error(event)
        break
      }

      default: {
        this.logger.info(event)
      }
    }
  }
}
