import * as os from 'os'
import { validateConfig, type BootstrapConfig } from './config'
import { InstallExhaustedError, StepFailedError } from './utils/errors'

export const EXIT_SUCCESS = 0
export const EXIT_FAILURE = 1

export type ExitSignal = 'SIGINT' | 'SIGTERM'

export const EXIT_SIGNALS: ReadonlyArray<ExitSignal> = ['SIGINT', 'SIGTERM']

/**
 * 128 + signal number, as a shell reports a process killed by the signal
 */
export function signalExitCode(signal: ExitSignal): number {
  return 128 + os.constants.signals[signal]
}

/**
 * Problems that stop the run before any command executes
 */
export function preflightErrors(config: BootstrapConfig, uid: number | undefined): string[] {
  const errors = [...validateConfig(config).errors]
  if (config.requireRoot && !config.useSudo && uid !== 0) {
    errors.push('This installer must run as root (or set USE_SUDO=true)')
  }
  return errors
}

/**
 * Exit status of a run: 0 when it resolves, 1 for anything it throws.
 * `onError` sees the failure before the status is returned
 */
export async function exitCodeOf(run: () => Promise<void>, onError: (error: unknown) => void): Promise<number> {
  try {
    await run()
    return EXIT_SUCCESS
  } catch (error: unknown) {
    onError(error)
    return EXIT_FAILURE
  }
}

/**
 * Extra lines printed after a failure, listing every failed install source
 */
export function failureDetails(error: unknown): string[] {
  const cause = error instanceof StepFailedError ? error.cause : error
  if (!(cause instanceof InstallExhaustedError)) {
    return []
  }

  return [
    ...cause.attempts.map(attempt => `  - ${attempt.url}: ${attempt.reason} (${attempt.error})`),
    'Please check your internet connection and try again',
  ]
}
