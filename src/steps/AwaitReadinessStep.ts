import type { ProvisionStep, StepContext } from '../runtime/types'
import { waitForReady } from '../runtime/readiness'
import { ReadinessTimeoutError } from '../utils/errors'
import { logger } from '../utils/logger'

/**
 * Polls the service until it is active and listening. A timeout is only
 * fatal when failOnReadinessTimeout is set
 */
export class AwaitReadinessStep implements ProvisionStep {
  readonly id = 'await-readiness'
  readonly title = 'Waiting for service to initialize'

  async run(context: StepContext): Promise<void> {
    const { config } = context

    try {
      const result = await waitForReady(
        { services: context.services, ports: context.ports },
        {
          service: config.serviceName,
          port: config.servicePort,
          timeoutMs: config.readinessTimeoutMs,
          intervalMs: config.readinessIntervalMs,
          sleep: context.sleep,
        }
      )
      logger.info(`${config.serviceName} is listening on port ${config.servicePort}`, { ...result })
      context.report.readiness = result
    } catch (error: unknown) {
      if (!(error instanceof ReadinessTimeoutError) || config.failOnReadinessTimeout) {
        throw error
      }

      logger.warn(`Port ${config.servicePort} not listening yet, the service may still be starting`, {
        waitedMs: error.waitedMs,
        ...error.lastState,
      })
      context.report.readiness = null
    }

    context.report.serviceStatus = await context.services.status(config.serviceName)
    logger.debug('Service status', { status: context.report.serviceStatus })
  }
}
