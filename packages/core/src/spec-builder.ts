import {stringify as stringifyYaml} from 'yaml'
import {InvalidInputError} from './errors.js'
import type {
  JobSpecification,
  ProjectConfiguration,
  RunIdentity,
  UploadedArtifact
} from './types.js'

export const WORKDIR_VOLUME = 'workdir'
export const WORKDIR_MOUNT_PATH = '/mnt/workdir'
export const PROJECT_MOUNT_PATH = '/mnt/project'
export const MAIN_CONTAINER_NAME = 'nf-main'
export const STREAM_ENDPOINT = {name: 'wss', port: 8765, public: true} as const

export type BuildSpecificationOptions = {
  config: ProjectConfiguration;
  identity: RunIdentity;
  artifact: UploadedArtifact;
  /** Container image bundling Nextflow and the PTY streaming server. */
  image: string;
  profile?: string;
  /** Expose the streaming endpoint (default: true). */
  streaming?: boolean;
}

/**
 * Returns a copy of `config` with the per-run work directory volume and
 * mount appended. The input is left untouched.
 */
export function extendWithWorkdir(config: ProjectConfiguration, identity: RunIdentity): ProjectConfiguration {
  return Object.freeze({
    ...config,
    volumeConfig: Object.freeze({
      volumes: [...config.volumeConfig.volumes, {name: WORKDIR_VOLUME, source: `@${config.workDirStage}/${identity.token}/`}],
      volumeMounts: [...config.volumeConfig.volumeMounts, {name: WORKDIR_VOLUME, mountPath: WORKDIR_MOUNT_PATH}]
    })
  })
}

/**
 * Nextflow invocation run inside the container, wrapped by the PTY server
 * that relays its output over the WebSocket endpoint.
 */
export function buildNextflowCommand(identity: RunIdentity, profile?: string): string[] {
  return [
    'nextflow',
    'run',
    '.',
    '-name',
    identity.token,
    '-ansi-log',
    'true',
    ...(profile ? ['-profile', profile] : []),
    '-work-dir',
    WORKDIR_MOUNT_PATH,
    '-with-report',
    `${WORKDIR_MOUNT_PATH}/report.html`,
    '-with-trace',
    `${WORKDIR_MOUNT_PATH}/trace.txt`,
    '-with-timeline',
    `${WORKDIR_MOUNT_PATH}/timeline.html`
  ]
}

/**
 * Quotes a word for bash. Words made of safe characters are left as is.
 */
export function shellQuote(word: string): string {
  if (/^[\w./:=@%+-]+$/.test(word)) {
    return word
  }

  return `'${word.replaceAll('\'', `'\\''`)}'`
}

export function buildRunScript(identity: RunIdentity, artifact: UploadedArtifact, profile?: string): string {
  return [
    `mkdir -p ${PROJECT_MOUNT_PATH}`,
    `cd ${PROJECT_MOUNT_PATH}`,
    `tar -zxf ${shellQuote(`${WORKDIR_MOUNT_PATH}/${artifact.fileName}`)}`,
    `cd ${shellQuote(artifact.rootDir)}`,
    `python3 /app/pty_server.py -- ${buildNextflowCommand(identity, profile).map(word => shellQuote(word)).join(' ')}`,
    ''
  ].join('\n')
}

/**
 * Checks that every mount of every container references a declared volume.
 */
export function validateSpecification(specification: JobSpecification): void {
  const volumeNames = new Set(specification.spec.volumes.map(v => v.name))
  for (const container of specification.spec.containers) {
    for (const mount of container.volumeMounts) {
      if (!volumeNames.has(mount.name)) {
        throw new InvalidInputError(`Container ${container.name}: volume mount '${mount.name}' has no matching volume`)
      }
    }
  }
}

export function buildJobSpecification(options: BuildSpecificationOptions): JobSpecification {
  const {identity, artifact, image, profile, streaming = true} = options
  const config = extendWithWorkdir(options.config, identity)

  const specification: JobSpecification = {
    spec: {
      containers: [
        {
          name: MAIN_CONTAINER_NAME,
          image,
          command: ['/bin/bash', '-c', buildRunScript(identity, artifact, profile)],
          volumeMounts: config.volumeConfig.volumeMounts.map(m => ({...m}))
        }
      ],
      volumes: config.volumeConfig.volumes.map(v => ({...v})),
      endpoints: streaming ? [{...STREAM_ENDPOINT}] : []
    }
  }

  validateSpecification(specification)
  return specification
}

export function serializeSpecification(specification: JobSpecification): string {
  return stringifyYaml(specification, {indent: 2, lineWidth: 0})
}
