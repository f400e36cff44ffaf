import { execFile as execFileCallback } from 'child_process'
import { promisify } from 'util'
import { CommandError } from '../utils/errors'
import { logger } from '../utils/logger'

const execFileAsync = promisify(execFileCallback)

const MAX_BUFFER_BYTES = 16 * 1024 * 1024
const OUTPUT_TAIL_LINES = 5

export interface CommandOptions {
  timeoutMs?: number
  /** Run without the sudo prefix even when the runner is configured with one */
  unprivileged?: boolean
  /** Log the last lines of stdout at info once the command finishes */
  reportOutput?: boolean
}

export interface CommandResult {
  ok: boolean
  stdout: string
  stderr: string
  exitCode: number | null
  error?: string
}

/**
 * Runs host commands. Implementations never throw for a non-zero exit;
 * callers decide whether a failure aborts the run
 */
export interface CommandRunner {
  run(command: string, args: string[], options?: CommandOptions): Promise<CommandResult>
}

export function formatCommand(command: string, args: string[]): string {
  return [command, ...args].join(' ')
}

/**
 * Run a command and throw CommandError when it fails
 */
export async function runOrThrow(
  runner: CommandRunner,
  command: string,
  args: string[],
  options?: CommandOptions
): Promise<CommandResult> {
  const result = await runner.run(command, args, options)
  if (!result.ok) {
    throw new CommandError(formatCommand(command, args), result.exitCode, result.stderr || result.error || '')
  }
  return result
}

/**
 * File and argv passed to execFile, with sudo prepended when requested
 */
export function commandLineFor(
  useSudo: boolean,
  command: string,
  args: string[],
  options: CommandOptions = {}
): [string, string[]] {
  return useSudo && !options.unprivileged ? ['sudo', [command, ...args]] : [command, args]
}

export function outputTail(output: string, lines: number = OUTPUT_TAIL_LINES): string[] {
  return output
    .split('\n')
    .map(line => line.trimEnd())
    .filter(line => line.length > 0)
    .slice(-lines)
}

interface ExecFailure {
  stdout?: unknown
  stderr?: unknown
  code?: unknown
  message?: unknown
}

function isExecFailure(error: unknown): error is ExecFailure {
  return typeof error === 'object' && error !== null
}

function text(value: unknown): string {
  if (typeof value === 'string') return value
  if (Buffer.isBuffer(value)) return value.toString('utf8')
  return ''
}

/**
 * CommandRunner backed by child_process.execFile (no shell)
 */
export class ExecFileCommandRunner implements CommandRunner {
  constructor(
    private readonly useSudo: boolean = false,
    private readonly defaultTimeoutMs: number = 1800000
  ) {}

  async run(command: string, args: string[], options: CommandOptions = {}): Promise<CommandResult> {
    const [file, argv] = commandLineFor(this.useSudo, command, args, options)

    logger.debug('Running command', { command: formatCommand(file, argv) })

    try {
      const { stdout, stderr } = await execFileAsync(file, argv, {
        timeout: options.timeoutMs ?? this.defaultTimeoutMs,
        maxBuffer: MAX_BUFFER_BYTES,
      })

      if (options.reportOutput) {
        outputTail(text(stdout)).forEach(line => logger.info(`  ${line}`, { command }))
      }

      return {
        ok: true,
        stdout: text(stdout),
        stderr: text(stderr),
        exitCode: 0,
      }
    } catch (error: unknown) {
      const failure: ExecFailure = isExecFailure(error) ? error : {}
      const exitCode = typeof failure.code === 'number' ? failure.code : null
      const message = typeof failure.message === 'string' ? failure.message : String(error)

      logger.debug('Command failed', {
        command: formatCommand(file, argv),
        exitCode,
        error: message,
      })
      if (options.reportOutput) {
        outputTail(text(failure.stdout)).forEach(line => logger.info(`  ${line}`, { command }))
      }

      return {
        ok: false,
        stdout: text(failure.stdout),
        stderr: text(failure.stderr),
        exitCode,
        error: message,
      }
    }
  }
}
