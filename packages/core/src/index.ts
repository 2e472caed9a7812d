// Orchestration
export {Orchestrator, DEFAULT_READY_TIMEOUT_SEC, type OrchestratorOptions, type RunOptions} from './orchestrator.js'

// Configuration extraction
export {ConfigExtractor, DEFAULT_TOOL, parseConfigLine, resolveProjectDir, unquote} from './config-extractor.js'
export {CommandRunner, ExecaCommandRunner, type OutputHandlers, type RunCommandOptions} from './engine/command-runner.js'
export {parseStageMounts, emptyVolumeConfig} from './stage-mounts.js'

// Packaging
export {ArtifactPackager, buildExcludeFilter, createProjectArchive, EXCLUDED_PATTERNS} from './packager.js'

// Service specification
export {
  buildJobSpecification,
  buildNextflowCommand,
  buildRunScript,
  shellQuote,
  extendWithWorkdir,
  serializeSpecification,
  validateSpecification,
  MAIN_CONTAINER_NAME,
  PROJECT_MOUNT_PATH,
  STREAM_ENDPOINT,
  WORKDIR_MOUNT_PATH,
  WORKDIR_VOLUME,
  type BuildSpecificationOptions
} from './spec-builder.js'
export {createRunIdentity, generateRunToken, cryptoRandom, DEFAULT_JOB_PREFIX, TOKEN_LENGTH} from './run-identity.js'

// Platform
export {ComputePlatform} from './platform/platform.js'
export {SnowCliPlatform, lastResultRows, quoteLiteral, toStreamUrl, type SnowCliPlatformOptions} from './platform/snow-cli-platform.js'
export {StaticTokenSession, CommandTokenSession, type SessionProvider} from './platform/session.js'

// Streaming
export {
  StreamClient,
  authorizationHeader,
  parseEndpoint,
  type Streamer,
  type StreamOptions,
  type StreamState,
  type StreamClientOptions
} from './stream/stream-client.js'
export {decodeFrame, exitCodeOf, statusPhases} from './stream/protocol.js'
export type {
  StatusPhase,
  StreamMessage,
  OutputMessage,
  StatusMessage,
  ErrorMessage,
  UnknownMessage
} from './stream/protocol.js'

// Reporting
export {ConsoleReporter} from './reporter.js'
export type {
  Reporter,
  RunContext,
  StageName,
  RunEvent,
  RunStartEvent,
  StageStartingEvent,
  StageFinishedEvent,
  StreamOutputEvent,
  StreamStatusEvent,
  CleanupFailedEvent,
  RunFinishedEvent,
  RunFailedEvent
} from './reporter.js'

// Utilities
export {formatDuration} from './utils.js'

// Domain types
export type {
  Volume,
  VolumeMount,
  VolumeConfig,
  Container,
  Endpoint,
  JobSpecification,
  ProjectConfiguration,
  RandomSource,
  RunIdentity,
  UploadedArtifact,
  RunOutcome
} from './types.js'

// Errors
export {
  NfsnowError,
  InvalidInputError,
  RunAbortedError,
  ToolNotFoundError,
  ConfigParseError,
  PackagingError,
  PlatformCommandError,
  UploadError,
  SubmissionError,
  ReadinessTimeoutError,
  AuthenticationError,
  InvalidEndpointError,
  StreamConnectionError,
  ServerError
} from './errors.js'
