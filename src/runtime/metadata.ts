import type { BootstrapConfig } from '../config'
import type { HttpClient } from '../http/types'
import { getErrorMessage } from '../utils/errors'
import { logger } from '../utils/logger'

export const FALLBACK_HOST = 'localhost'

/**
 * Public address of this host, from the override or the instance metadata service
 */
export async function resolvePublicHost(
  config: Pick<BootstrapConfig, 'publicHost' | 'metadataUrl' | 'httpTimeoutMs'>,
  http: HttpClient
): Promise<string> {
  if (config.publicHost) {
    return config.publicHost
  }

  try {
    const host = (await http.getText(config.metadataUrl, { timeoutMs: config.httpTimeoutMs })).trim()
    if (host) {
      return host
    }
    logger.warn('Metadata service returned an empty public address', { url: config.metadataUrl })
  } catch (error: unknown) {
    logger.warn('Could not read public address from metadata service', {
      url: config.metadataUrl,
      error: getErrorMessage(error),
    })
  }

  return FALLBACK_HOST
}
