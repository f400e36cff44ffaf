import type { ProvisionStep, StepContext } from '../runtime/types'
import { readGitVersion, readJavaVersion } from '../system/ToolVersions'
import { CommandError } from '../utils/errors'
import { logger } from '../utils/logger'

/**
 * Installs the language runtime, the source-control client and support tools,
 * then checks that java and git run
 */
export class InstallRuntimeStep implements ProvisionStep {
  readonly id = 'install-runtime'
  readonly title = 'Installing Java runtime, Git and support tools'

  async run(context: StepContext): Promise<void> {
    const { config, packages, runner } = context

    await packages.install(config.runtimePackages)
    const java = await readJavaVersion(runner)
    if (!java) {
      throw new CommandError('java -version', null, 'java is not runnable after install')
    }
    logger.info('Java installed successfully', { version: java })

    await packages.install(config.vcsPackages)
    const git = await readGitVersion(runner)
    if (!git) {
      throw new CommandError('git --version', null, 'git is not runnable after install')
    }
    logger.info('Git installed successfully', { version: git })

    if (config.supportPackages.length > 0) {
      await packages.install(config.supportPackages)
      logger.info('Support tools installed', { packages: config.supportPackages })
    }

    context.report.toolVersions = { java, git }
  }
}
