/**
 * HTTP client interface used for repository descriptors, fallback artifacts
 * and the instance metadata service.
 * All HTTP implementations and decorators must implement this interface
 */
export interface HttpClient {
  /** Fetch a URL and return its body as text. Non-2xx responses throw HttpError */
  getText(url: string, options?: RequestOptions): Promise<string>

  /**
   * Fetch a URL into `destination` and return the number of bytes written.
   * A failed download leaves nothing at `destination`
   */
  download(url: string, destination: string, options?: RequestOptions): Promise<number>
}

export interface RequestOptions {
  timeoutMs?: number
  headers?: Record<string, string>
}

/**
 * Configuration for the client composed by HttpClientFactory
 */
export interface HttpClientConfig {
  timeoutMs: number
  downloadTimeoutMs: number
  userAgent?: string
}
