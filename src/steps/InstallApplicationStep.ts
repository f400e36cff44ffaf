import type { ProvisionStep, StepContext } from '../runtime/types'
import { installApplication } from '../install/fallback'
import { appSettingsFrom, writeAppConfig } from '../install/appConfig'
import { logger } from '../utils/logger'

/**
 * Installs the application package (with artifact fallback) and writes its
 * static configuration file
 */
export class InstallApplicationStep implements ProvisionStep {
  readonly id = 'install-application'
  readonly title = 'Installing application'

  async run(context: StepContext): Promise<void> {
    const { config } = context

    const install = await installApplication(config, {
      http: context.http,
      packages: context.packages,
    })
    context.report.install = install

    await writeAppConfig(context.files, config.appConfigPath, appSettingsFrom(config))
    logger.info('Application configuration written', { path: config.appConfigPath })
    context.report.appConfigPath = config.appConfigPath
  }
}
