import {InvalidInputError} from './errors.js'
import type {Volume, VolumeConfig, VolumeMount} from './types.js'

export const emptyVolumeConfig: VolumeConfig = Object.freeze({volumes: [], volumeMounts: []})

/**
 * Parses a `snowflake.stageMounts` expression such as
 * `"data/in:/mnt/in,data/ref:/mnt/ref"` into index-aligned volumes
 * (`vol-1`, `vol-2`, …) and their mounts.
 */
export function parseStageMounts(expression: string): VolumeConfig {
  if (expression.trim() === '') {
    return emptyVolumeConfig
  }

  const volumes: Volume[] = []
  const volumeMounts: VolumeMount[] = []

  for (const [index, raw] of expression.split(',').entries()) {
    const parts = raw.trim().split(':')
    if (parts.length !== 2 || parts.some(part => part.trim() === '')) {
      throw new InvalidInputError(`Invalid stage mount expression: ${raw}`)
    }

    const [stage, mountPath] = parts.map(part => part.trim())
    const name = `vol-${index + 1}`
    volumes.push({name, source: `@${stage}`})
    volumeMounts.push({name, mountPath})
  }

  return Object.freeze({volumes, volumeMounts})
}
