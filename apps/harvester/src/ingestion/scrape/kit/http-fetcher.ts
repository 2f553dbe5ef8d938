/**
 * HTTP Fetcher
 *
 * Uses the native fetch API. Supports timeout, size limits, retries with
 * exponential backoff, and blocked-page detection.
 */

import type { ScrapePluginFetchResult } from '../types.js'

export interface RetryPolicy {
  maxAttempts: number
  initialDelayMs: number
  maxDelayMs: number
  backoffMultiplier: number
  retryableStatusCodes: number[]
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  retryableStatusCodes: [429, 500, 502, 503, 504],
}

export const DEFAULT_FETCH_HEADERS = {
  'User-Agent': 'hanjadex-harvester/0.1',
  Accept: 'text/html,application/xhtml+xml',
  'Accept-Language': 'ko-KR,ko;q=0.9,en;q=0.5',
} as const

export interface FetchOptions {
  /** Request timeout in ms (default: 30000) */
  timeoutMs?: number
  /** Maximum response size in bytes (default: 5MB) */
  maxSizeBytes?: number
  /** Custom headers (merged with defaults) */
  headers?: Record<string, string>
}

const DEFAULT_TIMEOUT_MS = 30000
const DEFAULT_MAX_SIZE_BYTES = 5 * 1024 * 1024

export type FetchResultStatus = 'ok' | 'error' | 'blocked' | 'timeout' | 'too_large'

export interface FetchResult {
  status: FetchResultStatus
  statusCode?: number
  html?: string
  error?: string
  durationMs: number
}

export interface Fetcher {
  fetch(url: string, options?: FetchOptions): Promise<FetchResult>
}

export interface HttpFetcherOptions {
  retryPolicy?: RetryPolicy
  /** Injected for tests */
  sleep?: (ms: number) => Promise<void>
}

const BLOCK_INDICATORS = [
  'captcha',
  'recaptcha',
  'challenge-form',
  'please verify you are a human',
  'access denied',
  'bot detection',
  'rate limit',
]

function looksLikeBlockedPage(html: string): boolean {
  const lowerHtml = html.toLowerCase()
  return BLOCK_INDICATORS.some(indicator => lowerHtml.includes(indicator))
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}

export class HttpFetcher implements Fetcher {
  private readonly retryPolicy: RetryPolicy
  private readonly sleep: (ms: number) => Promise<void>

  constructor(options: HttpFetcherOptions = {}) {
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY
    this.sleep = options.sleep ?? defaultSleep
  }

  private backoff(attempt: number): number {
    return Math.min(
      this.retryPolicy.initialDelayMs * Math.pow(this.retryPolicy.backoffMultiplier, attempt - 1),
      this.retryPolicy.maxDelayMs
    )
  }

  async fetch(url: string, options: FetchOptions = {}): Promise<FetchResult> {
    const startTime = Date.now()
    const headers = { ...DEFAULT_FETCH_HEADERS, ...(options.headers ?? {}) }
    let lastError: Error | null = null

    for (let attempt = 1; attempt <= this.retryPolicy.maxAttempts; attempt++) {
      try {
        const result = await this.fetchOnce(url, headers, options, startTime)

        if (
          result.status === 'error' &&
          result.statusCode &&
          this.retryPolicy.retryableStatusCodes.includes(result.statusCode) &&
          attempt < this.retryPolicy.maxAttempts
        ) {
          await this.sleep(this.backoff(attempt))
          continue
        }

        return result
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error))
        if (attempt < this.retryPolicy.maxAttempts) {
          await this.sleep(this.backoff(attempt))
        }
      }
    }

    return {
      status: 'error',
      durationMs: Date.now() - startTime,
      error: lastError?.message ?? 'Unknown error after retries',
    }
  }

  private async fetchOnce(
    url: string,
    headers: Record<string, string>,
    options: FetchOptions,
    startTime: number
  ): Promise<FetchResult> {
    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
    const maxSizeBytes = options.maxSizeBytes ?? DEFAULT_MAX_SIZE_BYTES
    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs)

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers,
        signal: controller.signal,
        redirect: 'follow',
      })

      if (response.status === 403 || response.status === 503) {
        const text = await response.text()
        if (looksLikeBlockedPage(text)) {
          return {
            status: 'blocked',
            statusCode: response.status,
            durationMs: Date.now() - startTime,
            error: 'Request blocked (captcha or access denied)',
          }
        }
      }

      if (!response.ok) {
        return {
          status: 'error',
          statusCode: response.status,
          durationMs: Date.now() - startTime,
          error: `HTTP ${response.status}: ${response.statusText}`,
        }
      }

      const contentLength = response.headers.get('content-length')
      if (contentLength && Number.parseInt(contentLength, 10) > maxSizeBytes) {
        return {
          status: 'too_large',
          statusCode: response.status,
          durationMs: Date.now() - startTime,
          error: `Response too large: ${contentLength} bytes`,
        }
      }

      const html = await readBodyWithLimit(response, maxSizeBytes)
      if (html === null) {
        return {
          status: 'too_large',
          statusCode: response.status,
          durationMs: Date.now() - startTime,
          error: 'Response exceeded size limit',
        }
      }

      return {
        status: 'ok',
        statusCode: response.status,
        html,
        durationMs: Date.now() - startTime,
      }
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        return {
          status: 'timeout',
          durationMs: Date.now() - startTime,
          error: `Request timed out after ${timeoutMs}ms`,
        }
      }
      throw error
    } finally {
      clearTimeout(timeoutId)
    }
  }
}

/**
 * Read a response body, giving up (null) once it passes `maxBytes`.
 */
async function readBodyWithLimit(response: Response, maxBytes: number): Promise<string | null> {
  const reader = response.body?.getReader()
  if (!reader) {
    return ''
  }

  const chunks: Uint8Array[] = []
  let totalSize = 0

  try {
    for (;;) {
      const { done, value } = await reader.read()
      if (done) break

      totalSize += value.length
      if (totalSize > maxBytes) {
        await reader.cancel()
        return null
      }
      chunks.push(value)
    }

    return new TextDecoder('utf-8').decode(Buffer.concat(chunks))
  } finally {
    reader.releaseLock()
  }
}

export function mapFetchResult(result: FetchResult): ScrapePluginFetchResult {
  if (result.status === 'ok') {
    return {
      ok: true,
      statusCode: result.statusCode,
      body: result.html,
      durationMs: result.durationMs,
    }
  }

  return {
    ok: false,
    statusCode: result.statusCode,
    error: result.error ?? result.status,
    durationMs: result.durationMs,
  }
}
