import type { ScrapePluginFetchResult, ScrapePluginRateLimit } from '../types.js'
import { HttpFetcher, mapFetchResult, type Fetcher } from './http-fetcher.js'

const MAX_REQUESTS_PER_SECOND = 2
const MIN_DELAY_MS = 500

export interface FetchWithPolicyInput {
  url: string
  baseUrls: string[]
  rateLimit?: ScrapePluginRateLimit
  headers?: Record<string, string>
  timeoutMs?: number
}

export interface PolitenessGateOptions {
  now?: () => number
  sleep?: (ms: number) => Promise<void>
}

/**
 * In-process spacing of requests per host. The harvester runs one lookup
 * at a time, so a last-request timestamp per host is enough.
 */
export class PolitenessGate {
  private readonly lastRequestAt = new Map<string, number>()
  private readonly now: () => number
  private readonly sleep: (ms: number) => Promise<void>

  constructor(options: PolitenessGateOptions = {}) {
    this.now = options.now ?? Date.now
    this.sleep = options.sleep ?? (ms => new Promise(resolve => setTimeout(resolve, ms)))
  }

  /**
   * Wait until `minIntervalMs` has passed since the previous request to `host`.
   * Returns how long it waited.
   */
  async acquire(host: string, minIntervalMs: number): Promise<number> {
    const previous = this.lastRequestAt.get(host)
    const waitMs = previous === undefined ? 0 : Math.max(0, previous + minIntervalMs - this.now())
    if (waitMs > 0) {
      await this.sleep(waitMs)
    }
    this.lastRequestAt.set(host, this.now())
    return waitMs
  }
}

let gate: PolitenessGate | null = null
let fetcher: Fetcher | null = null

function getPolicyDependencies(): { gate: PolitenessGate; fetcher: Fetcher } {
  if (!gate) {
    gate = new PolitenessGate()
  }
  if (!fetcher) {
    fetcher = new HttpFetcher()
  }
  return { gate, fetcher }
}

export function clampRateLimit(rateLimit?: ScrapePluginRateLimit): {
  requestsPerSecond: number
  minDelayMs: number
} {
  return {
    requestsPerSecond: Math.min(MAX_REQUESTS_PER_SECOND, rateLimit?.requestsPerSecond ?? 0.5),
    minDelayMs: Math.max(MIN_DELAY_MS, rateLimit?.minDelayMs ?? MIN_DELAY_MS),
  }
}

export function minIntervalMs(rateLimit?: ScrapePluginRateLimit): number {
  const limits = clampRateLimit(rateLimit)
  return Math.max(limits.minDelayMs, Math.ceil(1000 / limits.requestsPerSecond))
}

export function isHostAllowed(url: string, baseUrls: string[]): boolean {
  let target: URL
  try {
    target = new URL(url)
  } catch {
    return false
  }

  if (target.protocol !== 'https:') {
    return false
  }

  const host = target.hostname.toLowerCase()
  return baseUrls.some(base => {
    try {
      return new URL(base).hostname.toLowerCase() === host
    } catch {
      return false
    }
  })
}

/**
 * Fetch a page from one of the plugin's own hosts, spaced by its rate limit.
 * Never throws; failures come back as `{ ok: false }`.
 */
export async function fetchWithPolicy(
  input: FetchWithPolicyInput,
  deps: { gate: PolitenessGate; fetcher: Fetcher } = getPolicyDependencies()
): Promise<ScrapePluginFetchResult> {
  if (!isHostAllowed(input.url, input.baseUrls)) {
    return {
      ok: false,
      error: 'URL host is outside allowed base URLs',
      durationMs: 0,
    }
  }

  const host = new URL(input.url).hostname.toLowerCase()
  await deps.gate.acquire(host, minIntervalMs(input.rateLimit))

  try {
    const result = await deps.fetcher.fetch(input.url, {
      headers: input.headers,
      timeoutMs: input.timeoutMs,
    })
    return mapFetchResult(result)
  } catch (error) {
    return {
      ok: false,
      error: error instanceof Error ? error.message : String(error),
      durationMs: 0,
    }
  }
}
