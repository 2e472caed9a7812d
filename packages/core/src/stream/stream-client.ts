import {Buffer} from 'node:buffer'
import WebSocket from 'ws'
import {
  AuthenticationError,
  InvalidEndpointError,
  ServerError,
  StreamConnectionError
} from '../errors.js'
import type {SessionProvider} from '../platform/session.js'
import type {RunOutcome} from '../types.js'
import {decodeFrame, exitCodeOf, type StatusPhase} from './protocol.js'

/**
 * Lifecycle of one streaming connection.
 *
 * disconnected → authenticating → connecting → connected → streaming
 *   → completed | cancelled | failed
 */
export type StreamState =
  | 'disconnected'
  | 'authenticating'
  | 'connecting'
  | 'connected'
  | 'streaming'
  | 'completed'
  | 'cancelled'
  | 'failed'

export type StreamOptions = {
  /** Receives output chunks verbatim, in arrival order. */
  onOutput?: (data: string) => void | Promise<void>;
  /** Receives status updates other than the terminal `completed`, plus it. */
  onStatus?: (phase: StatusPhase, fields: Record<string, unknown>) => void | Promise<void>;
  onStateChange?: (state: StreamState) => void;
  /** Closes the connection; the stream then resolves as cancelled. */
  signal?: AbortSignal;
}

/**
 * Anything able to follow a run's output stream to its outcome.
 */
export type Streamer = {
  stream(url: string, options?: StreamOptions): Promise<RunOutcome>;
}

export type StreamClientOptions = {
  /** Opening handshake timeout in milliseconds (default: 30000). */
  handshakeTimeoutMs?: number;
}

type SocketEvent =
  | {kind: 'open'}
  | {kind: 'message'; data: string}
  | {kind: 'rejected'; statusCode: number}
  | {kind: 'error'; error: Error}
  | {kind: 'close'; code: number; reason: string}
  | {kind: 'abort'}

/**
 * Unbounded FIFO with a single awaiting consumer.
 */
class EventQueue<T> {
  private readonly items: T[] = []
  private waiting: ((item: T) => void) | undefined

  push(item: T): void {
    const waiting = this.waiting
    if (waiting) {
      this.waiting = undefined
      waiting(item)
      return
    }

    this.items.push(item)
  }

  async next(): Promise<T> {
    const item = this.items.shift()
    if (item !== undefined) {
      return item
    }

    return new Promise<T>(resolve => {
      this.waiting = resolve
    })
  }
}

function rawDataToString(data: WebSocket.RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8')
  }

  return Buffer.isBuffer(data) ? data.toString('utf8') : Buffer.from(data).toString('utf8')
}

/**
 * Validates a streaming endpoint URL before any network use.
 */
export function parseEndpoint(url: string): URL {
  let parsed: URL
  try {
    parsed = new URL(url)
  } catch (error) {
    throw new InvalidEndpointError(url, {cause: error})
  }

  if ((parsed.protocol !== 'wss:' && parsed.protocol !== 'ws:') || parsed.hostname === '') {
    throw new InvalidEndpointError(url)
  }

  return parsed
}

export function authorizationHeader(token: string): string {
  return `Snowflake Token="${token}"`
}

/**
 * Client for the PTY server running next to Nextflow in the service.
 *
 * Authenticates with a session token, decodes the JSON frame protocol and
 * resolves with the exit code carried by the `completed` status. Frames are
 * dispatched strictly in arrival order; async sinks are awaited before the
 * next frame is handled. A close before completion, or an abort, resolves as
 * `incomplete` rather than rejecting.
 */
export class StreamClient implements Streamer {
  private readonly handshakeTimeoutMs: number

  constructor(
    private readonly session: SessionProvider,
    options: StreamClientOptions = {}
  ) {
    this.handshakeTimeoutMs = options.handshakeTimeoutMs ?? 30_000
  }

  async stream(url: string, options: StreamOptions = {}): Promise<RunOutcome> {
    const {signal} = options
    const transition = (state: StreamState) => {
      options.onStateChange?.(state)
    }

    const endpoint = parseEndpoint(url)

    if (signal?.aborted) {
      transition('cancelled')
      return {status: 'incomplete', reason: 'cancelled'}
    }

    transition('authenticating')
    let token: string
    try {
      token = await this.session.issueToken()
    } catch (error) {
      transition('failed')
      if (error instanceof AuthenticationError) {
        throw error
      }

      throw new AuthenticationError(`Failed to get authentication token: ${error instanceof Error ? error.message : String(error)}`, {cause: error})
    }

    transition('connecting')
    const events = new EventQueue<SocketEvent>()
    const socket = new WebSocket(endpoint, {
      headers: {Authorization: authorizationHeader(token)},
      handshakeTimeout: this.handshakeTimeoutMs
    })

    socket.on('open', () => {
      events.push({kind: 'open'})
    })
    socket.on('message', (data: WebSocket.RawData) => {
      events.push({kind: 'message', data: rawDataToString(data)})
    })
    socket.on('unexpected-response', (_request, response) => {
      response.resume()
      events.push({kind: 'rejected', statusCode: response.statusCode ?? 0})
    })
    socket.on('error', (error: Error) => {
      events.push({kind: 'error', error})
    })
    socket.on('close', (code: number, reason: Buffer) => {
      events.push({kind: 'close', code, reason: reason.toString('utf8')})
    })

    const onAbort = () => {
      events.push({kind: 'abort'})
    }

    signal?.addEventListener('abort', onAbort, {once: true})
    if (signal?.aborted) {
      onAbort()
    }

    try {
      return await this.consume(url, socket, events, options, transition)
    } catch (error) {
      transition('failed')
      throw error
    } finally {
      signal?.removeEventListener('abort', onAbort)
      closeSocket(socket)
    }
  }

  private async consume(
    url: string,
    socket: WebSocket,
    events: EventQueue<SocketEvent>,
    options: StreamOptions,
    transition: (state: StreamState) => void
  ): Promise<RunOutcome> {
    let open = false

    for (;;) {
      const event = await events.next()

      switch (event.kind) {
        case 'open': {
          open = true
          transition('connected')
          await options.onStatus?.('connected', {url})
          transition('streaming')
          break
        }

        case 'rejected': {
          if (event.statusCode === 401 || event.statusCode === 403) {
            throw new AuthenticationError(`Authentication failed (HTTP ${event.statusCode}). Check your Snowflake connection.`)
          }

          throw new StreamConnectionError(`Connection handshake failed: unexpected server response ${event.statusCode}`)
        }

        case 'error': {
          if (!open) {
            throw new StreamConnectionError(`Connection failed: ${event.error.message}`, {cause: event.error})
          }

          // A close event always follows; the run is then incomplete.
          break
        }

        case 'close': {
          if (!open) {
            throw new StreamConnectionError(`Connection closed during handshake (code ${event.code})`)
          }

          transition('disconnected')
          await options.onStatus?.('disconnected', {reason: event.reason || 'Connection closed by server', code: event.code})
          return {status: 'incomplete', reason: 'closed'}
        }

        case 'abort': {
          transition('cancelled')
          if (open) {
            socket.close(1000, 'Disconnected by user')
            await options.onStatus?.('disconnected', {reason: 'Disconnected by user'})
          }

          return {status: 'incomplete', reason: 'cancelled'}
        }

        case 'message': {
          const outcome = await this.dispatch(event.data, options)
          if (outcome) {
            transition('completed')
            return outcome
          }

          break
        }
      }
    }
  }

  /**
   * Handles one frame. Returns the outcome once the run has completed.
   */
  private async dispatch(raw: string, options: StreamOptions): Promise<RunOutcome | undefined> {
    const message = decodeFrame(raw)

    switch (message.type) {
      case 'output': {
        await options.onOutput?.(message.data)
        return undefined
      }

      case 'status': {
        await options.onStatus?.(message.phase, message.fields)
        if (message.phase === 'completed') {
          const exitCode = exitCodeOf(message.fields)
          return exitCode === undefined
            ? {status: 'incomplete', reason: 'unknown-exit-code'}
            : {status: 'exited', exitCode}
        }

        return undefined
      }

      case 'error': {
        throw new ServerError(message.message, message.code, message.data)
      }

      case 'unknown': {
        await options.onOutput?.(`Unknown message type '${message.messageType}': ${message.raw}\n`)
        return undefined
      }
    }
  }
}

function closeSocket(socket: WebSocket): void {
  if (socket.readyState === WebSocket.OPEN) {
    socket.close(1000)
  } else if (socket.readyState === WebSocket.CONNECTING) {
    socket.terminate()
  }
}
