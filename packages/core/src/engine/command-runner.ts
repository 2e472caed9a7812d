import process from 'node:process'
import {execa} from 'execa'
import {RunAbortedError, ToolNotFoundError} from '../errors.js'

/**
 * Line-oriented callbacks for a subprocess' output streams.
 */
export type OutputHandlers = {
  onStdout: (line: string) => void;
  onStderr: (line: string) => void;
}

export type RunCommandOptions = {
  /** Working directory of the subprocess. */
  cwd?: string;
  /** Aborts the subprocess; the run then rejects with `RunAbortedError`. */
  signal?: AbortSignal;
}

/**
 * Abstract interface for running an external command.
 *
 * Implementations:
 * - `ExecaCommandRunner`: spawns the command with execa
 * - Test doubles replaying canned output
 *
 * The runner feeds every stdout and stderr line, in order, to the matching
 * handler and resolves with the process exit code once both streams are
 * drained. A command that cannot be spawned rejects with `ToolNotFoundError`.
 */
export abstract class CommandRunner {
  abstract run(argv: readonly string[], handlers: OutputHandlers, options?: RunCommandOptions): Promise<number>
}

export class ExecaCommandRunner extends CommandRunner {
  constructor(private readonly env: Record<string, string | undefined> = process.env) {
    super()
  }

  async run(argv: readonly string[], handlers: OutputHandlers, options?: RunCommandOptions): Promise<number> {
    const [command, ...args] = argv
    if (!command) {
      throw new ToolNotFoundError('<empty command>')
    }

    const proc = execa(command, args, {
      cwd: options?.cwd,
      env: this.env,
      extendEnv: false,
      reject: false,
      cancelSignal: options?.signal
    })

    let streamError: unknown
    try {
      await streamLines(proc, handlers)
    } catch (error) {
      streamError = error
    }

    const result = await proc
    if (result.isCanceled) {
      throw new RunAbortedError(command, {cause: result})
    }

    if (result.exitCode === undefined) {
      throw new ToolNotFoundError(command, {cause: result.failed ? result : streamError})
    }

    if (streamError !== undefined) {
      throw streamError
    }

    return result.exitCode
  }
}

/**
 * Stream stdout/stderr from a subprocess via iterables.
 */
async function streamLines(proc: ReturnType<typeof execa>, handlers: OutputHandlers): Promise<void> {
  const stdoutDone = (async () => {
    for await (const line of proc.iterable({from: 'stdout'})) {
      handlers.onStdout(String(line))
    }
  })()

  const stderrDone = (async () => {
    for await (const line of proc.iterable({from: 'stderr'})) {
      handlers.onStderr(String(line))
    }
  })()

  await Promise.all([stdoutDone, stderrDone])
}
