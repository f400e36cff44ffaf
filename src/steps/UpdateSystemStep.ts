import type { ProvisionStep, StepContext } from '../runtime/types'

export class UpdateSystemStep implements ProvisionStep {
  readonly id = 'update-system'
  readonly title = 'Updating system packages'

  async run(context: StepContext): Promise<void> {
    await context.packages.update()
  }
}
