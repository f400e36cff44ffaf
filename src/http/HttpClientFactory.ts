import type { HttpClient, HttpClientConfig } from './types'
import { FetchHttpClient } from './FetchHttpClient'
import { LoggingHttpClient } from './decorators/LoggingHttpClient'

/**
 * Factory for creating HTTP clients with decorator chain
 */
export class HttpClientFactory {
  /**
   * LoggingHttpClient → FetchHttpClient
   *
   * No retry layer: a failed request moves the caller on to its next source
   */
  static createClient(config: HttpClientConfig): HttpClient {
    const coreClient = new FetchHttpClient(
      { 'User-Agent': config.userAgent ?? 'ci-host-bootstrap' },
      config.timeoutMs,
      config.downloadTimeoutMs
    )

    return new LoggingHttpClient(coreClient)
  }
}
