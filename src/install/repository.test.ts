import { readFileSync } from 'fs'
import * as fs from 'fs/promises'
import * as os from 'os'
import * as path from 'path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { loadConfig, type BootstrapConfig } from '../config'
import { LocalHostFiles, RunnerHostFiles } from '../system/HostFiles'
import { DnfPackageManager } from '../system/PackageManager'
import { FakeCommandRunner, FakeHttpClient } from '../testing/fakes'
import { CommandError } from '../utils/errors'
import { registerRepository, renderRepoDescriptor } from './repository'

const PRIMARY_KEY = 'https://pkg.jenkins.io/redhat-stable/jenkins.io-2023.key'
const ALTERNATE_KEY = 'https://pkg.jenkins.io/redhat/jenkins.io-2023.key'

describe('renderRepoDescriptor', () => {
  it('renders the manual descriptor', () => {
    expect(
      renderRepoDescriptor({ id: 'jenkins', name: 'Jenkins-stable', baseUrl: 'https://pkg.jenkins.io/redhat-stable' })
    ).toBe('[jenkins]\nname=Jenkins-stable\nbaseurl=https://pkg.jenkins.io/redhat-stable\ngpgcheck=1\n')
  })
})

describe('registerRepository', () => {
  let workDir: string
  let config: BootstrapConfig

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'repo-'))
    config = loadConfig({ REPO_DESCRIPTOR_PATH: path.join(workDir, 'yum.repos.d', 'jenkins.repo') })
  })

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true })
  })

  it('saves the remote descriptor and imports the primary key', async () => {
    const http = new FakeHttpClient().serve(config.repoDescriptorUrl, '[jenkins]\nremote=yes\n')
    const runner = new FakeCommandRunner()

    const registration = await registerRepository(config, { http, files: new LocalHostFiles(), packages: new DnfPackageManager(runner) })

    expect(registration).toEqual({
      source: 'remote',
      descriptorPath: config.repoDescriptorPath,
      keyUrl: PRIMARY_KEY,
    })
    expect(await fs.readFile(config.repoDescriptorPath, 'utf8')).toBe('[jenkins]\nremote=yes\n')
    expect(runner.commandLines()).toEqual([`rpm --import ${PRIMARY_KEY}`])
  })

  it('writes the manual descriptor and continues when the remote one is unreachable', async () => {
    const http = new FakeHttpClient().failWith(config.repoDescriptorUrl, 'connect ETIMEDOUT')
    const runner = new FakeCommandRunner()

    const registration = await registerRepository(config, { http, files: new LocalHostFiles(), packages: new DnfPackageManager(runner) })

    expect(registration.source).toBe('manual')
    expect(await fs.readFile(config.repoDescriptorPath, 'utf8')).toBe(
      '[jenkins]\nname=Jenkins-stable\nbaseurl=https://pkg.jenkins.io/redhat-stable\ngpgcheck=1\n'
    )
    expect(runner.commandLines()).toEqual([`rpm --import ${PRIMARY_KEY}`])
  })

  it('falls back to the alternative key URL', async () => {
    const http = new FakeHttpClient().serve(config.repoDescriptorUrl, '[jenkins]\n')
    const runner = new FakeCommandRunner().failWhen('rpm', ['--import', PRIMARY_KEY])

    const registration = await registerRepository(config, { http, files: new LocalHostFiles(), packages: new DnfPackageManager(runner) })

    expect(registration.keyUrl).toBe(ALTERNATE_KEY)
    expect(runner.commandLines()).toEqual([`rpm --import ${PRIMARY_KEY}`, `rpm --import ${ALTERNATE_KEY}`])
  })

  it('aborts when no key URL can be imported', async () => {
    const http = new FakeHttpClient()
    const runner = new FakeCommandRunner().failWhen('rpm', ['--import'])

    await expect(
      registerRepository(config, { http, files: new LocalHostFiles(), packages: new DnfPackageManager(runner) })
    ).rejects.toBeInstanceOf(CommandError)
    expect(runner.commandLines()).toEqual([`rpm --import ${PRIMARY_KEY}`, `rpm --import ${ALTERNATE_KEY}`])
  })

  it('installs the descriptor through the runner when writes need sudo', async () => {
    const http = new FakeHttpClient().failWith(config.repoDescriptorUrl, 'connect ETIMEDOUT')
    const staged: string[] = []
    const runner = new FakeCommandRunner().on('install', args => {
      staged.push(readFileSync(args[3], 'utf8'))
      return undefined
    })

    const registration = await registerRepository(config, {
      http,
      files: new RunnerHostFiles(runner),
      packages: new DnfPackageManager(runner),
    })

    expect(registration.source).toBe('manual')
    expect(runner.calls[0].command).toBe('install')
    expect(runner.calls[0].args.slice(0, 3)).toEqual(['-D', '-m', '0644'])
    expect(runner.calls[0].args[4]).toBe(config.repoDescriptorPath)
    expect(staged).toEqual(['[jenkins]\nname=Jenkins-stable\nbaseurl=https://pkg.jenkins.io/redhat-stable\ngpgcheck=1\n'])
    expect(runner.commandLines()[1]).toBe(`rpm --import ${PRIMARY_KEY}`)
    await expect(fs.access(config.repoDescriptorPath)).rejects.toThrow()
  })
})
