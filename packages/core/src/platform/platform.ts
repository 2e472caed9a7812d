import type {RunIdentity} from '../types.js'

/**
 * Abstract interface for the remote compute and storage platform.
 *
 * An aborted `signal` cancels the call, which then rejects with
 * `RunAbortedError`.
 *
 * Implementations:
 * - `SnowCliPlatform`: drives the Snowflake CLI
 * - Test doubles recording the calls
 *
 * Every call receives the run identity so that implementations can tag the
 * remote operation with the run's correlation tag.
 */
export abstract class ComputePlatform {
  /**
   * Uploads a local file to a stage location (e.g. "WORK_STAGE/abcd1234").
   */
  abstract upload(identity: RunIdentity, localPath: string, location: string, signal?: AbortSignal): Promise<void>

  /**
   * Creates the service `identity.jobName` from a serialized specification.
   * Returns as soon as the platform accepted it. Takes no signal: a service
   * creation is always allowed to settle so that cleanup can drop it.
   */
  abstract submit(identity: RunIdentity, computePool: string, specification: string): Promise<void>

  /**
   * Blocks until the service reports ready.
   * @returns false when the service was not ready within `timeoutSec`
   */
  abstract waitReady(identity: RunIdentity, timeoutSec: number, signal?: AbortSignal): Promise<boolean>

  /**
   * Returns the host (or URL) of the service's public streaming endpoint.
   */
  abstract queryEndpoint(identity: RunIdentity, signal?: AbortSignal): Promise<string>

  /**
   * Drops the service if it exists. Safe to call when it was never created.
   */
  abstract deleteJob(identity: RunIdentity): Promise<void>
}
