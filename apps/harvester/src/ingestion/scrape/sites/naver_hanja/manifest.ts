import type { ScrapePluginManifest } from '../../types.js'

export const manifest: ScrapePluginManifest = {
  id: 'naver_hanja',
  name: 'Naver Hanja Dictionary',
  owner: 'harvester',
  version: '1.0.0',
  baseUrls: ['https://hanja.dict.naver.com'],
  entryIdField: 'naver_hanja_id',
  wordIdField: 'naver_word_id',
  rateLimit: {
    requestsPerSecond: 1,
    minDelayMs: 500,
  },
}
