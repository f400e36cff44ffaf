import type { ServiceManager } from '../system/ServiceManager'
import type { PortProbe } from '../system/PortProbe'
import { ReadinessTimeoutError, type ReadinessState } from '../utils/errors'
import { logger } from '../utils/logger'

export interface ReadinessOptions {
  service: string
  port: number
  host?: string
  timeoutMs: number
  intervalMs: number
  sleep?: (ms: number) => Promise<void>
  now?: () => number
}

export interface ReadinessResult {
  waitedMs: number
  probes: number
}

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms))

/**
 * Poll until the service is active and its port accepts connections.
 * Throws ReadinessTimeoutError once the next probe would fall past timeoutMs
 */
export async function waitForReady(
  deps: { services: Pick<ServiceManager, 'isActive'>; ports: PortProbe },
  options: ReadinessOptions
): Promise<ReadinessResult> {
  const sleep = options.sleep ?? defaultSleep
  const now = options.now ?? Date.now
  const startedAt = now()
  let probes = 0

  for (;;) {
    probes++
    const state: ReadinessState = {
      active: await deps.services.isActive(options.service),
      listening: await deps.ports.isListening(options.port, options.host),
    }
    const waitedMs = now() - startedAt

    logger.debug('Readiness probe', { probe: probes, waitedMs, ...state })

    if (state.active && state.listening) {
      return { waitedMs, probes }
    }

    if (waitedMs + options.intervalMs > options.timeoutMs) {
      throw new ReadinessTimeoutError(options.service, options.port, waitedMs, state)
    }

    await sleep(options.intervalMs)
  }
}
