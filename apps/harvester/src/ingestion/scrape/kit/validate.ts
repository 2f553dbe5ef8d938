import type { ScrapePluginManifest } from '../types.js'

export const SITE_ID_PATTERN = /^[a-z0-9_]+$/
const FIELD_NAME_PATTERN = /^[a-z][a-z0-9_]*$/

export type ValidateManifestResult = { ok: true } | { ok: false; error: string }

export function validateBaseUrls(manifest: ScrapePluginManifest): ValidateManifestResult {
  if (!manifest.baseUrls.length) {
    return { ok: false, error: 'manifest.baseUrls must not be empty' }
  }

  for (const entry of manifest.baseUrls) {
    try {
      const parsed = new URL(entry)
      if (parsed.protocol !== 'https:') {
        return { ok: false, error: `base URL must be https: ${entry}` }
      }
    } catch {
      return { ok: false, error: `invalid base URL: ${entry}` }
    }
  }

  return { ok: true }
}

export function validateManifest(manifest: ScrapePluginManifest): ValidateManifestResult {
  if (!SITE_ID_PATTERN.test(manifest.id)) {
    return { ok: false, error: `manifest.id must match ${SITE_ID_PATTERN}: '${manifest.id}'` }
  }
  if (!manifest.version.trim()) {
    return { ok: false, error: `Plugin '${manifest.id}' must declare a version` }
  }
  for (const field of [manifest.entryIdField, manifest.wordIdField]) {
    if (!FIELD_NAME_PATTERN.test(field)) {
      return { ok: false, error: `Plugin '${manifest.id}' has invalid output field name '${field}'` }
    }
  }

  const rateLimit = manifest.rateLimit
  if (rateLimit?.requestsPerSecond !== undefined && rateLimit.requestsPerSecond <= 0) {
    return { ok: false, error: 'manifest.rateLimit.requestsPerSecond must be > 0' }
  }
  if (rateLimit?.minDelayMs !== undefined && rateLimit.minDelayMs < 0) {
    return { ok: false, error: 'manifest.rateLimit.minDelayMs must be >= 0' }
  }

  return validateBaseUrls(manifest)
}
