import { CommandResult } from '../contracts'
import { SessionError } from '../errors/SessionError'

/**
 * Turn a session error into exit code 1 with its guidance; anything else is rethrown
 */
export function sessionErrorResult(error: unknown): CommandResult {
  if (error instanceof SessionError) {
    return {
      exitCode: 1,
      error: `Error: ${error.message}\n${error.guidance}`,
    }
  }
  throw error
}
