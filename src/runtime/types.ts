import type { BootstrapConfig } from '../config'
import type { HttpClient } from '../http/types'
import type { ApplicationInstallResult } from '../install/fallback'
import type { RepositoryRegistration } from '../install/repository'
import type { CommandRunner } from '../system/CommandRunner'
import type { HostFiles } from '../system/HostFiles'
import type { PackageManager } from '../system/PackageManager'
import type { PortProbe } from '../system/PortProbe'
import type { ServiceManager } from '../system/ServiceManager'
import type { ToolVersions } from '../system/ToolVersions'
import type { ReadinessResult } from './readiness'

/**
 * Everything a step produced, filled in as the run progresses
 */
export interface BootstrapReport {
  toolVersions?: ToolVersions
  repository?: RepositoryRegistration
  install?: ApplicationInstallResult
  appConfigPath?: string
  serviceStatus?: string
  readiness?: ReadinessResult | null
  publicHost?: string
  adminPassword?: string | null
  summary?: string
}

export interface StepContext {
  config: BootstrapConfig
  runner: CommandRunner
  http: HttpClient
  files: HostFiles
  packages: PackageManager
  services: ServiceManager
  ports: PortProbe
  output: NodeJS.WritableStream
  report: BootstrapReport
  sleep?: (ms: number) => Promise<void>
}

export interface ProvisionStep {
  readonly id: string
  readonly title: string
  run(context: StepContext): Promise<void>
}
