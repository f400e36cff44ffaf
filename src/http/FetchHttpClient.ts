import { createWriteStream } from 'fs'
import * as fs from 'fs/promises'
import { Readable } from 'stream'
import { pipeline } from 'stream/promises'
import type { HttpClient, RequestOptions } from './types'
import { HttpError } from '../utils/errors'
import { logger } from '../utils/logger'

/**
 * Core HTTP client implementation using native fetch API
 * Handles text requests and file downloads with timeout support
 */
export class FetchHttpClient implements HttpClient {
  constructor(
    private readonly defaultHeaders: Record<string, string> = {},
    private readonly timeoutMs: number = 30000,
    private readonly downloadTimeoutMs: number = 600000
  ) {}

  async getText(url: string, options: RequestOptions = {}): Promise<string> {
    const response = await this.fetch(url, options.timeoutMs ?? this.timeoutMs, options.headers)
    return response.text()
  }

  async download(url: string, destination: string, options: RequestOptions = {}): Promise<number> {
    try {
      const response = await this.fetch(url, options.timeoutMs ?? this.downloadTimeoutMs, options.headers)
      if (!response.body) {
        throw new HttpError(`Empty response body: ${url}`, response.status, url)
      }

      await pipeline(Readable.fromWeb(response.body), createWriteStream(destination))
      const { size } = await fs.stat(destination)

      logger.debug('Download complete', { url, destination, bytes: size })
      return size
    } catch (error: unknown) {
      await fs.rm(destination, { force: true })
      throw error
    }
  }

  private async fetch(url: string, timeoutMs: number, headers: Record<string, string> = {}): Promise<Response> {
    logger.debug('HTTP Request', { method: 'GET', url })

    const response = await fetch(url, {
      method: 'GET',
      headers: {
        ...this.defaultHeaders,
        ...headers,
      },
      redirect: 'follow',
      signal: AbortSignal.timeout(timeoutMs),
    })

    logger.debug('HTTP Response', { status: response.status, url })

    if (!response.ok) {
      // Drain the body so the connection is released
      await response.arrayBuffer().catch(() => undefined)
      throw new HttpError(`HTTP ${response.status}: ${url}`, response.status, url)
    }

    return response
  }
}
