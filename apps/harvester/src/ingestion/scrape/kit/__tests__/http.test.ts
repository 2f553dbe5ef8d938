import { describe, expect, it, vi } from 'vitest'
import type { Fetcher } from '../http-fetcher.js'
import {
  PolitenessGate,
  clampRateLimit,
  fetchWithPolicy,
  isHostAllowed,
  minIntervalMs,
} from '../http.js'
import { mapFetchResult } from '../http-fetcher.js'

describe('clampRateLimit', () => {
  it('caps aggressive plugin hints to framework guardrails', () => {
    expect(clampRateLimit({ requestsPerSecond: 10, minDelayMs: 10 })).toEqual({
      requestsPerSecond: 2,
      minDelayMs: 500,
    })
  })

  it('keeps conservative values when inside guardrails', () => {
    expect(clampRateLimit({ requestsPerSecond: 0.5, minDelayMs: 800 })).toEqual({
      requestsPerSecond: 0.5,
      minDelayMs: 800,
    })
  })
})

describe('minIntervalMs', () => {
  it('takes the stricter of request rate and minimum delay', () => {
    expect(minIntervalMs({ requestsPerSecond: 1, minDelayMs: 500 })).toBe(1000)
    expect(minIntervalMs({ requestsPerSecond: 2, minDelayMs: 1500 })).toBe(1500)
    expect(minIntervalMs()).toBe(2000)
  })
})

describe('isHostAllowed', () => {
  it('allows host when it matches baseUrls exactly', () => {
    expect(isHostAllowed('https://hanja.example.com/search?q=1', ['https://hanja.example.com'])).toBe(
      true
    )
  })

  it('rejects other hosts, plain http and unparseable URLs', () => {
    expect(isHostAllowed('https://www.example.com/a', ['https://hanja.example.com'])).toBe(false)
    expect(isHostAllowed('http://hanja.example.com/a', ['https://hanja.example.com'])).toBe(false)
    expect(isHostAllowed('not a url', ['https://hanja.example.com'])).toBe(false)
  })
})

describe('mapFetchResult', () => {
  it('maps successful and failed fetch results', () => {
    expect(
      mapFetchResult({ status: 'ok', statusCode: 200, html: '<html></html>', durationMs: 123 })
    ).toEqual({ ok: true, statusCode: 200, body: '<html></html>', durationMs: 123 })

    expect(mapFetchResult({ status: 'timeout', durationMs: 456 })).toEqual({
      ok: false,
      statusCode: undefined,
      error: 'timeout',
      durationMs: 456,
    })
  })
})

describe('PolitenessGate', () => {
  it('waits out the interval since the previous request to the same host', async () => {
    let now = 10_000
    const sleep = vi.fn(async (ms: number) => {
      now += ms
    })
    const gate = new PolitenessGate({ now: () => now, sleep })

    expect(await gate.acquire('hanja.example.com', 1000)).toBe(0)
    now += 300
    expect(await gate.acquire('hanja.example.com', 1000)).toBe(700)
    expect(await gate.acquire('other.example.com', 1000)).toBe(0)

    expect(sleep).toHaveBeenCalledTimes(1)
    expect(sleep).toHaveBeenCalledWith(700)
  })
})

describe('fetchWithPolicy', () => {
  const baseUrls = ['https://hanja.example.com']

  function deps(fetcher: Fetcher) {
    return { gate: new PolitenessGate({ sleep: async () => undefined }), fetcher }
  }

  it('refuses URLs outside the base URLs without fetching', async () => {
    const fetch = vi.fn<Fetcher['fetch']>()

    const result = await fetchWithPolicy(
      { url: 'https://elsewhere.example.com/', baseUrls },
      deps({ fetch })
    )

    expect(result).toEqual({ ok: false, error: 'URL host is outside allowed base URLs', durationMs: 0 })
    expect(fetch).not.toHaveBeenCalled()
  })

  it('passes headers and timeout through and maps the result', async () => {
    const fetch = vi.fn<Fetcher['fetch']>(async () => ({
      status: 'ok',
      statusCode: 200,
      html: '<p>木</p>',
      durationMs: 5,
    }))

    const result = await fetchWithPolicy(
      { url: 'https://hanja.example.com/search', baseUrls, timeoutMs: 2000, headers: { 'X-Test': '1' } },
      deps({ fetch })
    )

    expect(result).toEqual({ ok: true, statusCode: 200, body: '<p>木</p>', durationMs: 5 })
    expect(fetch).toHaveBeenCalledWith('https://hanja.example.com/search', {
      headers: { 'X-Test': '1' },
      timeoutMs: 2000,
    })
  })

  it('turns a throwing fetcher into a failed result', async () => {
    const fetch = vi.fn<Fetcher['fetch']>(async () => {
      throw new Error('socket hang up')
    })

    const result = await fetchWithPolicy({ url: 'https://hanja.example.com/', baseUrls }, deps({ fetch }))

    expect(result).toEqual({ ok: false, error: 'socket hang up', durationMs: 0 })
  })
})
