import type { BootstrapConfig } from '../config'
import { HttpClientFactory } from '../http/HttpClientFactory'
import { ExecFileCommandRunner } from '../system/CommandRunner'
import { createHostFiles } from '../system/HostFiles'
import { DnfPackageManager } from '../system/PackageManager'
import { SystemdServiceManager } from '../system/ServiceManager'
import { TcpPortProbe } from '../system/PortProbe'
import { UpdateSystemStep } from '../steps/UpdateSystemStep'
import { InstallRuntimeStep } from '../steps/InstallRuntimeStep'
import { RegisterRepositoryStep } from '../steps/RegisterRepositoryStep'
import { InstallApplicationStep } from '../steps/InstallApplicationStep'
import { StartServiceStep } from '../steps/StartServiceStep'
import { AwaitReadinessStep } from '../steps/AwaitReadinessStep'
import { ReportStep } from '../steps/ReportStep'
import type { BootstrapReport, ProvisionStep, StepContext } from './types'
import { StepFailedError, getErrorMessage } from '../utils/errors'
import { logger } from '../utils/logger'

export function defaultSteps(): ProvisionStep[] {
  return [
    new UpdateSystemStep(),
    new InstallRuntimeStep(),
    new RegisterRepositoryStep(),
    new InstallApplicationStep(),
    new StartServiceStep(),
    new AwaitReadinessStep(),
    new ReportStep(),
  ]
}

/**
 * Build the step context from configuration, wiring the real host adapters
 */
export function createContext(config: BootstrapConfig, output: NodeJS.WritableStream = process.stdout): StepContext {
  const runner = new ExecFileCommandRunner(config.useSudo, config.commandTimeoutMs)

  return {
    config,
    runner,
    http: HttpClientFactory.createClient({
      timeoutMs: config.httpTimeoutMs,
      downloadTimeoutMs: config.downloadTimeoutMs,
    }),
    files: createHostFiles(config.useSudo, runner),
    packages: new DnfPackageManager(runner),
    services: new SystemdServiceManager(runner),
    ports: new TcpPortProbe(),
    output,
    report: {},
  }
}

/**
 * Runs the provisioning steps in order and stops at the first one that fails
 */
export class BootstrapRuntime {
  private readonly steps: ProvisionStep[]

  constructor(
    private readonly context: StepContext,
    steps: ProvisionStep[] = defaultSteps()
  ) {
    this.steps = steps
  }

  async run(): Promise<BootstrapReport> {
    logger.info(`Starting installation of ${this.context.config.packageName}`, {
      steps: this.steps.length,
      service: this.context.config.serviceName,
    })

    for (const [index, step] of this.steps.entries()) {
      const label = `[${index + 1}/${this.steps.length}] ${step.title}`
      logger.info(label)
      const startedAt = Date.now()

      try {
        await step.run(this.context)
      } catch (error: unknown) {
        logger.error(`${label} failed`, { step: step.id, error: getErrorMessage(error) })
        throw new StepFailedError(step.id, error)
      }

      logger.debug('Step completed', { step: step.id, durationMs: Date.now() - startedAt })
    }

    logger.info('Installation completed successfully')
    return this.context.report
  }
}
