import { fetchWithPolicy } from '../../kit/http.js'
import { encodeQuery } from '../../kit/hanja.js'
import type { ScrapePluginFetchInput, ScrapePluginFetchResult } from '../../types.js'
import { manifest } from './manifest.js'

const [BASE_URL] = manifest.baseUrls

export function searchUrl(query: string): string {
  return `${BASE_URL}/search?query=${encodeQuery(query)}`
}

/**
 * The browser app routes entries under `#/entry/ccko/<id>`; the same path
 * without the fragment is requested so the server sees the id.
 */
export function entryUrl(entryId: string): string {
  return `${BASE_URL}/entry/ccko/${encodeURIComponent(entryId)}`
}

export async function fetchRaw(input: ScrapePluginFetchInput): Promise<ScrapePluginFetchResult> {
  return fetchWithPolicy({
    url: input.url,
    baseUrls: manifest.baseUrls,
    rateLimit:
      input.minDelayMs === undefined
        ? manifest.rateLimit
        : {
            ...manifest.rateLimit,
            minDelayMs: Math.max(manifest.rateLimit?.minDelayMs ?? 0, input.minDelayMs),
          },
    headers: input.headers,
    timeoutMs: input.timeoutMs,
  })
}
