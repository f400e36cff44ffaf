import type { ProvisionStep, StepContext } from '../runtime/types'
import { resolvePublicHost } from '../runtime/metadata'
import { readInitialAdminPassword, renderSummary } from '../runtime/summary'
import { readToolVersions } from '../system/ToolVersions'

/**
 * Prints the operational summary to the output stream
 */
export class ReportStep implements ProvisionStep {
  readonly id = 'report'
  readonly title = 'Reporting installation details'

  async run(context: StepContext): Promise<void> {
    const { config, report } = context

    const host = await resolvePublicHost(config, context.http)
    const adminPassword = await readInitialAdminPassword(context.files, config.appHome)
    const versions = report.toolVersions ?? await readToolVersions(context.runner)

    const summary = renderSummary({
      host,
      port: config.servicePort,
      appHome: config.appHome,
      serviceUser: config.serviceUser,
      serviceName: config.serviceName,
      install: report.install ?? null,
      ready: Boolean(report.readiness),
      adminPassword,
      versions,
    })

    report.publicHost = host
    report.adminPassword = adminPassword
    report.summary = summary
    context.output.write(summary)
  }
}
