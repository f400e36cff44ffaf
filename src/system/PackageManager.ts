import type { CommandOptions, CommandRunner } from './CommandRunner'
import { runOrThrow } from './CommandRunner'
import { logger } from '../utils/logger'

/**
 * OS package operations needed by the bootstrap run
 */
export interface PackageManager {
  update(): Promise<void>
  install(packages: string[]): Promise<void>
  tryInstall(packages: string[]): Promise<boolean>
  importKey(url: string): Promise<boolean>
  installLocal(artifactPath: string): Promise<boolean>
}

const VERBOSE: CommandOptions = { reportOutput: true }

/**
 * dnf/rpm implementation for Amazon Linux 2023
 */
export class DnfPackageManager implements PackageManager {
  constructor(private readonly runner: CommandRunner) {}

  async update(): Promise<void> {
    await runOrThrow(this.runner, 'dnf', ['update', '-y'], VERBOSE)
  }

  async install(packages: string[]): Promise<void> {
    await runOrThrow(this.runner, 'dnf', ['install', ...packages, '-y'], VERBOSE)
  }

  async tryInstall(packages: string[]): Promise<boolean> {
    const result = await this.runner.run('dnf', ['install', ...packages, '-y'], VERBOSE)
    if (!result.ok) {
      logger.warn('dnf install failed', { packages, exitCode: result.exitCode, error: result.error })
    }
    return result.ok
  }

  async importKey(url: string): Promise<boolean> {
    const result = await this.runner.run('rpm', ['--import', url])
    if (!result.ok) {
      logger.warn('Could not import GPG key', { url, exitCode: result.exitCode })
    }
    return result.ok
  }

  async installLocal(artifactPath: string): Promise<boolean> {
    const result = await this.runner.run('rpm', ['-ivh', artifactPath], VERBOSE)
    if (!result.ok) {
      logger.warn('rpm install failed', { artifactPath, exitCode: result.exitCode, stderr: result.stderr.trim() })
    }
    return result.ok
  }
}
