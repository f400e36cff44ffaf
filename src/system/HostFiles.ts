import * as fs from 'fs/promises'
import * as os from 'os'
import * as path from 'path'
import { runOrThrow, type CommandRunner } from './CommandRunner'

/**
 * File access to system paths (/etc, the application home).
 * Writes create missing parent directories
 */
export interface HostFiles {
  writeFile(destination: string, content: string): Promise<void>
  /** Copy a file the current user can read into place */
  installFile(source: string, destination: string): Promise<void>
  /** Null when the file is missing or unreadable */
  readText(filePath: string): Promise<string | null>
}

function isUnreadable(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'EACCES')
}

/**
 * Direct filesystem access, for runs that already hold root
 */
export class LocalHostFiles implements HostFiles {
  async writeFile(destination: string, content: string): Promise<void> {
    await fs.mkdir(path.dirname(destination), { recursive: true })
    await fs.writeFile(destination, content)
  }

  async installFile(source: string, destination: string): Promise<void> {
    await fs.mkdir(path.dirname(destination), { recursive: true })
    await fs.copyFile(source, destination)
  }

  async readText(filePath: string): Promise<string | null> {
    try {
      return await fs.readFile(filePath, 'utf8')
    } catch (error: unknown) {
      if (isUnreadable(error)) {
        return null
      }
      throw error
    }
  }
}

/**
 * Goes through the command runner so sudo applies: content is staged in a
 * private temp directory and moved into place with install(1), reads use cat
 */
export class RunnerHostFiles implements HostFiles {
  constructor(
    private readonly runner: CommandRunner,
    private readonly mode: string = '0644'
  ) {}

  async writeFile(destination: string, content: string): Promise<void> {
    const stagingDir = await createStagingDir()
    try {
      const staged = path.join(stagingDir, path.basename(destination))
      await fs.writeFile(staged, content)
      await this.installFile(staged, destination)
    } finally {
      await fs.rm(stagingDir, { recursive: true, force: true })
    }
  }

  async installFile(source: string, destination: string): Promise<void> {
    await runOrThrow(this.runner, 'install', ['-D', '-m', this.mode, source, destination])
  }

  async readText(filePath: string): Promise<string | null> {
    const result = await this.runner.run('cat', [filePath])
    return result.ok ? result.stdout : null
  }
}

export function createStagingDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'ci-host-bootstrap-'))
}

export function createHostFiles(useSudo: boolean, runner: CommandRunner): HostFiles {
  return useSudo ? new RunnerHostFiles(runner) : new LocalHostFiles()
}
