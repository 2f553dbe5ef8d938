import psl from 'psl'
import type { DictionarySitePlugin, ScrapePluginManifest, SitePluginRegistration } from './types.js'
import { SITE_PLUGIN_REGISTRATIONS } from './sites/index.js'
import { validateManifest } from './kit/validate.js'

const registrations = new Map<string, SitePluginRegistration>()
const domainOwners = new Map<string, string>()

function registrableDomainForBaseUrl(baseUrl: string): string {
  let host: string
  try {
    host = new URL(baseUrl).hostname.toLowerCase()
  } catch {
    return baseUrl.toLowerCase()
  }

  const registrable = psl.get(host)
  return (registrable ?? host).toLowerCase()
}

export function registerSitePlugin(registration: SitePluginRegistration): void {
  const { manifest } = registration
  const validation = validateManifest(manifest)
  if (!validation.ok) {
    throw new Error(validation.error)
  }

  if (registrations.has(manifest.id)) {
    throw new Error(`Plugin '${manifest.id}' is already registered`)
  }

  const domains = manifest.baseUrls.map(registrableDomainForBaseUrl)
  for (const registrableDomain of domains) {
    const existingOwner = domainOwners.get(registrableDomain)
    if (existingOwner && existingOwner !== manifest.id) {
      throw new Error(
        `Plugin '${manifest.id}' collides with '${existingOwner}' on registrable domain '${registrableDomain}'`
      )
    }
  }

  for (const registrableDomain of domains) {
    domainOwners.set(registrableDomain, manifest.id)
  }
  registrations.set(manifest.id, registration)
}

/** Test hook: forget a registration and the domains it claimed. */
export function unregisterSitePlugin(siteId: string): boolean {
  if (!registrations.delete(siteId)) {
    return false
  }
  for (const [domain, owner] of domainOwners) {
    if (owner === siteId) domainOwners.delete(domain)
  }
  return true
}

for (const registration of SITE_PLUGIN_REGISTRATIONS) {
  registerSitePlugin(registration)
}

export function getRegisteredSitePluginIds(): string[] {
  return [...registrations.keys()].sort((a, b) => a.localeCompare(b))
}

export function getRegisteredSitePluginManifest(siteId: string): ScrapePluginManifest | undefined {
  return registrations.get(siteId)?.manifest
}

export async function loadSitePlugin(siteId: string): Promise<DictionarySitePlugin | undefined> {
  const registration = registrations.get(siteId)
  if (!registration) {
    return undefined
  }
  return registration.load()
}
