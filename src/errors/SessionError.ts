export const SESSION_ERROR_CODES = Object.freeze({
  INVALID_PATH: 'INVALID_PATH',
  SESSION_ALREADY_ACTIVE: 'SESSION_ALREADY_ACTIVE',
  NO_ACTIVE_SESSION: 'NO_ACTIVE_SESSION',
  PROJECT_PATH_UNAVAILABLE: 'PROJECT_PATH_UNAVAILABLE',
  CORRUPT_SESSION_RECORD: 'CORRUPT_SESSION_RECORD',
} as const)

export type SessionErrorCode = (typeof SESSION_ERROR_CODES)[keyof typeof SESSION_ERROR_CODES]

/**
 * Failure of a session operation. `guidance` is the next step shown to the
 * user under the message.
 */
export class SessionError extends Error {
  readonly code: SessionErrorCode
  readonly guidance: string

  constructor(
    message: string,
    input: {
      code: SessionErrorCode
      guidance: string
      cause?: unknown
    }
  ) {
    super(message, input.cause === undefined ? undefined : { cause: input.cause })
    this.name = 'SessionError'
    this.code = input.code
    this.guidance = input.guidance
  }
}

/**
 * Thrown by the scanner when the scan root itself cannot be used.
 * Per-file problems never throw; they become scan warnings.
 */
export class CounterError extends Error {
  readonly code = SESSION_ERROR_CODES.INVALID_PATH

  constructor(
    message: string,
    readonly root: string,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause })
    this.name = 'CounterError'
  }
}

function asMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

export function invalidPathError(error: CounterError): SessionError {
  return new SessionError(error.message, {
    code: SESSION_ERROR_CODES.INVALID_PATH,
    guidance: 'Pass an existing, readable project directory.',
    cause: error,
  })
}

export function sessionAlreadyActiveError(projectPath: string, startTime: string): SessionError {
  return new SessionError(`A session is already active for ${projectPath} (started ${startTime})`, {
    code: SESSION_ERROR_CODES.SESSION_ALREADY_ACTIVE,
    guidance: 'Run "ego end" to finish it, or "ego discard" to drop it.',
  })
}

export function noActiveSessionError(): SessionError {
  return new SessionError('No active session found', {
    code: SESSION_ERROR_CODES.NO_ACTIVE_SESSION,
    guidance: 'Run "ego start <PROJECT_DIRECTORY>" first.',
  })
}

export function projectPathUnavailableError(projectPath: string, error: unknown): SessionError {
  return new SessionError(`Project directory is no longer available: ${projectPath} (${asMessage(error)})`, {
    code: SESSION_ERROR_CODES.PROJECT_PATH_UNAVAILABLE,
    guidance: 'Restore the directory and run "ego end" again, or run "ego discard".',
    cause: error,
  })
}

export function corruptSessionRecordError(filePath: string, error: unknown): SessionError {
  return new SessionError(`Session record at ${filePath} is unreadable: ${asMessage(error)}`, {
    code: SESSION_ERROR_CODES.CORRUPT_SESSION_RECORD,
    guidance: 'Run "ego discard" to remove it.',
    cause: error,
  })
}
