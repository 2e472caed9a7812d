import {z} from 'zod'

// -- Server → client frames --------------------------------------------------

export const statusPhases = ['starting', 'started', 'connected', 'disconnected', 'completed'] as const

export type StatusPhase = (typeof statusPhases)[number]

const outputFrameSchema = z.object({
  type: z.literal('output'),
  data: z.string().optional()
})

const statusFrameSchema = z.object({
  type: z.literal('status'),
  status: z.enum(statusPhases)
}).passthrough()

const errorFrameSchema = z.object({
  type: z.literal('error'),
  message: z.string().optional(),
  code: z.union([z.string(), z.number()]).optional(),
  data: z.unknown().optional()
})

const frameSchema = z.discriminatedUnion('type', [
  outputFrameSchema,
  statusFrameSchema,
  errorFrameSchema
])

const typedObjectSchema = z.object({type: z.unknown()}).passthrough()

// -- Decoded messages --------------------------------------------------------

export type OutputMessage = {
  type: 'output';
  data: string;
}

export type StatusMessage = {
  type: 'status';
  phase: StatusPhase;
  /** Every field of the frame except `type` and `status`. */
  fields: Record<string, unknown>;
}

export type ErrorMessage = {
  type: 'error';
  message: string;
  code?: string;
  data: unknown;
}

/** JSON frame whose type (or status phase) is not part of the protocol. */
export type UnknownMessage = {
  type: 'unknown';
  messageType: string;
  raw: string;
}

export type StreamMessage =
  | OutputMessage
  | StatusMessage
  | ErrorMessage
  | UnknownMessage

/**
 * Decodes one text frame. Frames that are not JSON objects are treated as
 * raw output; decoding never throws.
 */
export function decodeFrame(raw: string): StreamMessage {
  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch {
    return {type: 'output', data: raw}
  }

  if (!isPlainObject(parsed)) {
    return {type: 'output', data: raw}
  }

  const frame = frameSchema.safeParse(parsed)
  if (!frame.success) {
    const typed = typedObjectSchema.safeParse(parsed)
    const messageType = typed.success && typeof typed.data.type === 'string' ? typed.data.type : 'unknown'
    return {type: 'unknown', messageType, raw}
  }

  switch (frame.data.type) {
    case 'output': {
      return {type: 'output', data: frame.data.data ?? ''}
    }

    case 'status': {
      const {type: _type, status, ...fields} = frame.data
      return {type: 'status', phase: status, fields}
    }

    case 'error': {
      const {message, code, data} = frame.data
      return {
        type: 'error',
        message: message ?? 'Unknown server error',
        code: code === undefined ? undefined : String(code),
        data: data ?? {}
      }
    }
  }
}

/**
 * Reads the process exit code from the fields of a `completed` status.
 * Defaults to 0 when the server sent none; returns undefined when the field
 * is present but not an integer.
 */
export function exitCodeOf(fields: Record<string, unknown>): number | undefined {
  if (!Object.hasOwn(fields, 'exit_code')) {
    return 0
  }

  const value = fields.exit_code
  if (typeof value === 'number' && Number.isInteger(value)) {
    return value
  }

  if (typeof value === 'string' && /^-?\d+$/.test(value.trim())) {
    return Number.parseInt(value, 10)
  }

  return undefined
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
