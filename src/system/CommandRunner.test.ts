import { afterEach, describe, expect, it, vi } from 'vitest'
import { FakeCommandRunner } from '../testing/fakes'
import { CommandError } from '../utils/errors'
import { logger } from '../utils/logger'
import { commandLineFor, ExecFileCommandRunner, formatCommand, outputTail, runOrThrow } from './CommandRunner'

describe('ExecFileCommandRunner', () => {
  const runner = new ExecFileCommandRunner(false, 10000)

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('captures stdout and stderr of a successful command', async () => {
    const result = await runner.run(process.execPath, ['-e', 'process.stdout.write("out"); process.stderr.write("err")'])

    expect(result).toEqual({ ok: true, stdout: 'out', stderr: 'err', exitCode: 0 })
  })

  it('reports a non-zero exit without throwing', async () => {
    const result = await runner.run(process.execPath, ['-e', 'process.stderr.write("boom"); process.exit(3)'])

    expect(result.ok).toBe(false)
    expect(result.exitCode).toBe(3)
    expect(result.stderr).toBe('boom')
  })

  it('reports a missing executable without throwing', async () => {
    const result = await runner.run('definitely-not-a-real-command-xyz', [])

    expect(result.ok).toBe(false)
    expect(result.exitCode).toBeNull()
    expect(result.error).toContain('ENOENT')
  })

  it('logs the last lines of output at info when asked to', async () => {
    const info = vi.spyOn(logger, 'info')
    const script = 'for (let i = 1; i <= 7; i++) console.log("line " + i)'

    await runner.run(process.execPath, ['-e', script], { reportOutput: true })

    expect(info.mock.calls.map(call => call[0])).toEqual(['  line 3', '  line 4', '  line 5', '  line 6', '  line 7'])
  })

  it('keeps output out of the info log by default', async () => {
    const info = vi.spyOn(logger, 'info')

    await runner.run(process.execPath, ['-e', 'console.log("quiet")'])

    expect(info).not.toHaveBeenCalled()
  })
})

describe('commandLineFor', () => {
  it('prefixes the command with sudo', () => {
    expect(commandLineFor(true, 'dnf', ['update', '-y'])).toEqual(['sudo', ['dnf', 'update', '-y']])
  })

  it('runs unprivileged commands and sudo-less runners directly', () => {
    expect(commandLineFor(true, 'java', ['-version'], { unprivileged: true })).toEqual(['java', ['-version']])
    expect(commandLineFor(false, 'dnf', ['update', '-y'])).toEqual(['dnf', ['update', '-y']])
  })
})

describe('outputTail', () => {
  it('keeps the last non-empty lines', () => {
    expect(outputTail('a\n\nb  \nc\n', 2)).toEqual(['b', 'c'])
    expect(outputTail('')).toEqual([])
  })
})

describe('runOrThrow', () => {
  it('throws CommandError carrying the last stderr line', async () => {
    const runner = new FakeCommandRunner().failWhen('dnf', ['install'], 'Loading mirrors\nNo match for argument: nope')

    const failure = await runOrThrow(runner, 'dnf', ['install', 'nope', '-y']).catch((error: unknown) => error)

    expect(failure).toBeInstanceOf(CommandError)
    if (!(failure instanceof CommandError)) return
    expect(failure.command).toBe('dnf install nope -y')
    expect(failure.exitCode).toBe(1)
    expect(failure.message).toBe('Command failed: dnf install nope -y (No match for argument: nope)')
  })

  it('formats commands with their arguments', () => {
    expect(formatCommand('systemctl', ['start', 'jenkins'])).toBe('systemctl start jenkins')
  })
})
