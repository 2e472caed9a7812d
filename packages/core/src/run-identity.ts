import {randomInt} from 'node:crypto'
import type {RandomSource, RunIdentity} from './types.js'

const letters = 'abcdefghijklmnopqrstuvwxyz'
const alphanumerics = letters + '0123456789'

export const TOKEN_LENGTH = 8
export const DEFAULT_JOB_PREFIX = 'NXF_MAIN'

export const cryptoRandom: RandomSource = max => randomInt(max)

/**
 * Generates a run token usable as a Nextflow run name: a lowercase letter
 * followed by lowercase letters and digits.
 */
export function generateRunToken(random: RandomSource = cryptoRandom): string {
  let token = letters[random(letters.length)]
  while (token.length < TOKEN_LENGTH) {
    token += alphanumerics[random(alphanumerics.length)]
  }

  return token
}

export function createRunIdentity(options?: {random?: RandomSource; prefix?: string}): RunIdentity {
  const token = generateRunToken(options?.random)
  return Object.freeze({
    token,
    jobName: `${options?.prefix ?? DEFAULT_JOB_PREFIX}_${token}`,
    tags: Object.freeze({
      NEXTFLOW_JOB_TYPE: 'main',
      NEXTFLOW_RUN_ID: token
    })
  })
}
