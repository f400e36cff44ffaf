import { describe, expect, it } from 'vitest'
import { FakeCommandRunner } from '../testing/fakes'
import { CommandError } from '../utils/errors'
import { DnfPackageManager } from './PackageManager'
import { SystemdServiceManager } from './ServiceManager'
import { readToolVersions } from './ToolVersions'

describe('DnfPackageManager', () => {
  it('issues dnf and rpm commands', async () => {
    const runner = new FakeCommandRunner()
    const packages = new DnfPackageManager(runner)

    await packages.update()
    await packages.install(['wget', 'fontconfig'])
    expect(await packages.importKey('https://keys.test/key')).toBe(true)
    expect(await packages.installLocal('/tmp/app.rpm')).toBe(true)

    expect(runner.commandLines()).toEqual([
      'dnf update -y',
      'dnf install wget fontconfig -y',
      'rpm --import https://keys.test/key',
      'rpm -ivh /tmp/app.rpm',
    ])
    expect(runner.calls.map(call => call.options?.reportOutput === true)).toEqual([true, true, false, true])
  })

  it('throws from install but not from tryInstall', async () => {
    const runner = new FakeCommandRunner().failWhen('dnf', ['install'])
    const packages = new DnfPackageManager(runner)

    await expect(packages.install(['jenkins'])).rejects.toBeInstanceOf(CommandError)
    expect(await packages.tryInstall(['jenkins'])).toBe(false)
  })
})

describe('SystemdServiceManager', () => {
  it('maps is-active exit status to a boolean', async () => {
    const runner = new FakeCommandRunner().failWhen('systemctl', ['is-active'])

    expect(await new SystemdServiceManager(runner).isActive('jenkins')).toBe(false)
    expect(runner.commandLines()).toEqual(['systemctl is-active --quiet jenkins'])
  })

  it('returns status text even when systemctl exits non-zero', async () => {
    const runner = new FakeCommandRunner().on('systemctl', () => ({
      ok: false,
      exitCode: 3,
      stdout: '● jenkins.service - Jenkins\n   Active: activating (start)\n',
    }))

    expect(await new SystemdServiceManager(runner).status('jenkins')).toBe(
      '● jenkins.service - Jenkins\n   Active: activating (start)'
    )
  })
})

describe('readToolVersions', () => {
  it('reads java from stderr and git from stdout', async () => {
    const runner = new FakeCommandRunner()
      .on('java', () => ({ stderr: '\nopenjdk version "17.0.12"\nmore\n' }))
      .on('git', () => ({ stdout: 'git version 2.40.1\n' }))

    expect(await readToolVersions(runner)).toEqual({ java: 'openjdk version "17.0.12"', git: 'git version 2.40.1' })
    expect(runner.calls.every(call => call.options?.unprivileged === true)).toBe(true)
  })

  it('returns null for tools that do not run', async () => {
    const runner = new FakeCommandRunner().failWhen('java', []).failWhen('git', [])

    expect(await readToolVersions(runner)).toEqual({ java: null, git: null })
  })
})
