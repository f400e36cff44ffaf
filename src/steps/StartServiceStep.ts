import type { ProvisionStep, StepContext } from '../runtime/types'

export class StartServiceStep implements ProvisionStep {
  readonly id = 'start-service'
  readonly title = 'Starting service'

  async run(context: StepContext): Promise<void> {
    const { services, config } = context

    await services.daemonReload()
    await services.enable(config.serviceName)
    await services.start(config.serviceName)
  }
}
