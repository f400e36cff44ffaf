import type { ProvisionStep, StepContext } from '../runtime/types'
import { registerRepository } from '../install/repository'
import { logger } from '../utils/logger'

export class RegisterRepositoryStep implements ProvisionStep {
  readonly id = 'register-repository'
  readonly title = 'Adding package repository'

  async run(context: StepContext): Promise<void> {
    const registration = await registerRepository(context.config, {
      http: context.http,
      files: context.files,
      packages: context.packages,
    })

    logger.info('Repository registered', { ...registration })
    context.report.repository = registration
  }
}
