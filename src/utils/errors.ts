/**
 * Typed errors raised by the bootstrap run
 * Used instead of `any` in catch blocks so every failure carries a code
 */

export type BootstrapErrorCode =
  | 'HTTP_ERROR'
  | 'COMMAND_FAILED'
  | 'INSTALL_EXHAUSTED'
  | 'READINESS_TIMEOUT'
  | 'STEP_FAILED'

export class BootstrapError extends Error {
  readonly code: BootstrapErrorCode

  constructor(message: string, code: BootstrapErrorCode) {
    super(message)
    this.name = 'BootstrapError'
    this.code = code

    // Maintains proper stack trace for where error was thrown (V8 engines)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target)
    }
  }
}

/**
 * Non-2xx response from a download or metadata request
 */
export class HttpError extends BootstrapError {
  readonly status: number
  readonly url: string

  constructor(message: string, status: number, url: string) {
    super(message, 'HTTP_ERROR')
    this.name = 'HttpError'
    this.status = status
    this.url = url
  }

  static isHttpError(error: unknown): error is HttpError {
    return error instanceof HttpError
  }
}

export class CommandError extends BootstrapError {
  readonly command: string
  readonly exitCode: number | null
  readonly stderr: string

  constructor(command: string, exitCode: number | null, stderr: string) {
    const reason = stderr.trim().split('\n').pop() || `exit code ${exitCode ?? 'unknown'}`
    super(`Command failed: ${command} (${reason})`, 'COMMAND_FAILED')
    this.name = 'CommandError'
    this.command = command
    this.exitCode = exitCode
    this.stderr = stderr
  }
}

export type AttemptFailureReason = 'download-failed' | 'install-failed'

export interface FailedAttempt {
  version: string
  mirror: string
  url: string
  reason: AttemptFailureReason
  error: string
}

/**
 * Every (candidate, mirror) pair of the fallback plan failed
 */
export class InstallExhaustedError extends BootstrapError {
  readonly attempts: FailedAttempt[]

  constructor(attempts: FailedAttempt[]) {
    super(`Could not install from any source after ${attempts.length} attempts`, 'INSTALL_EXHAUSTED')
    this.name = 'InstallExhaustedError'
    this.attempts = attempts
  }
}

export interface ReadinessState {
  active: boolean
  listening: boolean
}

export class ReadinessTimeoutError extends BootstrapError {
  readonly waitedMs: number
  readonly lastState: ReadinessState

  constructor(service: string, port: number, waitedMs: number, lastState: ReadinessState) {
    super(
      `${service} not ready after ${waitedMs}ms (active=${lastState.active}, listening on ${port}=${lastState.listening})`,
      'READINESS_TIMEOUT'
    )
    this.name = 'ReadinessTimeoutError'
    this.waitedMs = waitedMs
    this.lastState = lastState
  }
}

export class StepFailedError extends BootstrapError {
  readonly step: string

  constructor(step: string, cause: unknown) {
    super(`Step "${step}" failed: ${getErrorMessage(cause)}`, 'STEP_FAILED')
    this.name = 'StepFailedError'
    this.step = step
    this.cause = cause
  }
}

/**
 * Get error message safely from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message
  }
  if (typeof error === 'string') {
    return error
  }
  return 'Unknown error'
}

/**
 * Get structured error info for logging
 */
export function getErrorInfo(error: unknown): {
  name?: string
  code?: BootstrapErrorCode
  message: string
  step?: string
  cause?: string
} {
  if (error instanceof StepFailedError) {
    return {
      name: error.name,
      code: error.code,
      message: error.message,
      step: error.step,
      cause: getErrorMessage(error.cause),
    }
  }
  if (error instanceof BootstrapError) {
    return {
      name: error.name,
      code: error.code,
      message: error.message,
    }
  }
  return {
    message: getErrorMessage(error),
  }
}
