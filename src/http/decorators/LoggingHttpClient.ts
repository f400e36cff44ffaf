import type { HttpClient, RequestOptions } from '../types'
import { logger } from '../../utils/logger'
import { getErrorMessage, HttpError } from '../../utils/errors'

/**
 * HTTP client decorator that adds failure logging
 * Every caller treats a failed request as a fallback signal, so failures are warnings
 */
export class LoggingHttpClient implements HttpClient {
  constructor(private readonly innerClient: HttpClient) {}

  async getText(url: string, options?: RequestOptions): Promise<string> {
    try {
      return await this.innerClient.getText(url, options)
    } catch (error: unknown) {
      this.logFailure('GET', url, error)
      throw error
    }
  }

  async download(url: string, destination: string, options?: RequestOptions): Promise<number> {
    try {
      return await this.innerClient.download(url, destination, options)
    } catch (error: unknown) {
      this.logFailure('DOWNLOAD', url, error)
      throw error
    }
  }

  private logFailure(method: string, url: string, error: unknown): void {
    logger.warn('HTTP Request Failed', {
      url,
      method,
      status: HttpError.isHttpError(error) ? error.status : undefined,
      error: getErrorMessage(error),
    })
  }
}
