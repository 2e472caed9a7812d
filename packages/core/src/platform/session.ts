import process from 'node:process'
import {execa} from 'execa'
import {AuthenticationError} from '../errors.js'

/**
 * Source of short-lived credentials for the service ingress.
 * Must be safe to call concurrently from independent runs.
 */
export type SessionProvider = {
  issueToken(): Promise<string>;
}

export class StaticTokenSession implements SessionProvider {
  constructor(private readonly token: string) {}

  async issueToken(): Promise<string> {
    if (this.token.trim() === '') {
      throw new AuthenticationError('No session token configured')
    }

    return this.token.trim()
  }
}

/**
 * Issues a token by running a command and reading its standard output,
 * like a git credential helper.
 */
export class CommandTokenSession implements SessionProvider {
  constructor(
    private readonly command: string,
    private readonly env: Record<string, string | undefined> = process.env
  ) {}

  async issueToken(): Promise<string> {
    let stdout: string
    try {
      ({stdout} = await execa(this.command, {shell: true, env: this.env, extendEnv: false}))
    } catch (error) {
      throw new AuthenticationError(`Failed to get authentication token from '${this.command}'`, {cause: error})
    }

    const token = stdout.trim()
    if (token === '') {
      throw new AuthenticationError(`Token command '${this.command}' printed nothing`)
    }

    return token
  }
}
