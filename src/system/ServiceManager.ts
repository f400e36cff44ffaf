import type { CommandRunner } from './CommandRunner'
import { runOrThrow } from './CommandRunner'

export interface ServiceManager {
  daemonReload(): Promise<void>
  enable(name: string): Promise<void>
  start(name: string): Promise<void>
  isActive(name: string): Promise<boolean>
  /** Human-readable status; never throws */
  status(name: string): Promise<string>
}

/**
 * systemctl-backed service manager
 */
export class SystemdServiceManager implements ServiceManager {
  constructor(private readonly runner: CommandRunner) {}

  async daemonReload(): Promise<void> {
    await runOrThrow(this.runner, 'systemctl', ['daemon-reload'])
  }

  async enable(name: string): Promise<void> {
    await runOrThrow(this.runner, 'systemctl', ['enable', name])
  }

  async start(name: string): Promise<void> {
    await runOrThrow(this.runner, 'systemctl', ['start', name])
  }

  async isActive(name: string): Promise<boolean> {
    const result = await this.runner.run('systemctl', ['is-active', '--quiet', name])
    return result.ok
  }

  async status(name: string): Promise<string> {
    // systemctl status exits non-zero for inactive units but still prints the status
    const result = await this.runner.run('systemctl', ['status', name, '--no-pager'])
    return (result.stdout || result.stderr || result.error || '').trimEnd()
  }
}
