import type {Command} from 'commander'
import type {NfsnowError, RunOutcome} from '@nfsnow/core'

export type GlobalOptions = {
  configDir: string;
  json?: boolean;
}

export function getGlobalOptions(cmd: Command): GlobalOptions {
  return cmd.optsWithGlobals<GlobalOptions>()
}

/**
 * Closing lines for a failed command. Transient failures get a hint that
 * running the command again may help.
 */
export function describeError(error: NfsnowError): {message: string; hint?: string} {
  if (error.transient) {
    return {message: error.message, hint: 'This failure may be temporary, try running the command again.'}
  }

  return {message: error.message}
}

/**
 * Maps a run outcome to the process exit code and the closing message.
 */
export function describeOutcome(outcome: RunOutcome): {exitCode: number; message: string} {
  if (outcome.status === 'incomplete') {
    if (outcome.reason === 'unknown-exit-code') {
      return {exitCode: 1, message: 'Nextflow run completed without a valid exit code'}
    }

    return {exitCode: 1, message: 'Nextflow run was interrupted or failed to complete'}
  }

  if (outcome.exitCode === 0) {
    return {exitCode: 0, message: 'Nextflow run completed successfully'}
  }

  return {exitCode: outcome.exitCode, message: `Nextflow run failed with exit code ${outcome.exitCode}`}
}
