export class NfsnowError extends Error {
  constructor(
    readonly code: string,
    message: string,
    options?: {cause?: unknown}
  ) {
    super(message, options)
    this.name = 'NfsnowError'
  }

  /**
   * Hint that the same run may succeed if started again. Nothing retries on
   * its own; callers decide their retry policy from it.
   */
  get transient(): boolean {
    return false
  }
}

// -- Input errors ------------------------------------------------------------

export class InvalidInputError extends NfsnowError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('INVALID_INPUT', message, options)
    this.name = 'InvalidInputError'
  }
}

export class RunAbortedError extends NfsnowError {
  constructor(stage: string, options?: {cause?: unknown}) {
    super('RUN_ABORTED', `Run aborted during ${stage}`, options)
    this.name = 'RunAbortedError'
  }
}

// -- Local tooling errors ----------------------------------------------------

export class ToolNotFoundError extends NfsnowError {
  constructor(readonly tool: string, options?: {cause?: unknown}) {
    super('TOOL_NOT_FOUND', `Command not found: ${tool}`, options)
    this.name = 'ToolNotFoundError'
  }
}

export class ConfigParseError extends NfsnowError {
  constructor(
    message: string,
    readonly stderr: string[] = [],
    options?: {cause?: unknown}
  ) {
    super('CONFIG_PARSE_FAILED', stderr.length > 0 ? `${message}\n${stderr.join('\n')}` : message, options)
    this.name = 'ConfigParseError'
  }
}

export class PackagingError extends NfsnowError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('PACKAGING_FAILED', message, options)
    this.name = 'PackagingError'
  }
}

// -- Platform errors ---------------------------------------------------------

export class PlatformCommandError extends NfsnowError {
  constructor(
    message: string,
    readonly stderr = '',
    options?: {cause?: unknown}
  ) {
    super('PLATFORM_COMMAND_FAILED', stderr ? `${message}: ${stderr}` : message, options)
    this.name = 'PlatformCommandError'
  }
}

export class UploadError extends NfsnowError {
  constructor(location: string, options?: {cause?: unknown}) {
    super('UPLOAD_FAILED', `Failed to upload project to ${location}`, options)
    this.name = 'UploadError'
  }
}

export class SubmissionError extends NfsnowError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('SUBMISSION_FAILED', message, options)
    this.name = 'SubmissionError'
  }
}

export class ReadinessTimeoutError extends NfsnowError {
  constructor(jobName: string, timeoutSec: number, options?: {cause?: unknown}) {
    super('READINESS_TIMEOUT', `Service ${jobName} was not ready within ${timeoutSec}s`, options)
    this.name = 'ReadinessTimeoutError'
  }

  override get transient(): boolean {
    return true
  }
}

// -- Streaming errors --------------------------------------------------------

export class AuthenticationError extends NfsnowError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('AUTHENTICATION_FAILED', message, options)
    this.name = 'AuthenticationError'
  }
}

export class InvalidEndpointError extends NfsnowError {
  constructor(readonly url: string, options?: {cause?: unknown}) {
    super('INVALID_ENDPOINT', `Invalid WebSocket URL: ${url}`, options)
    this.name = 'InvalidEndpointError'
  }
}

export class StreamConnectionError extends NfsnowError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('CONNECTION_FAILED', message, options)
    this.name = 'StreamConnectionError'
  }

  override get transient(): boolean {
    return true
  }
}

export class ServerError extends NfsnowError {
  constructor(
    message: string,
    readonly serverCode: string | undefined,
    readonly data: unknown,
    options?: {cause?: unknown}
  ) {
    super('SERVER_ERROR', serverCode === undefined ? message : `${message} (Code: ${serverCode})`, options)
    this.name = 'ServerError'
  }
}
