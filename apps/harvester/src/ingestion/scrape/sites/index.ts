import type { SitePluginRegistration } from '../types.js'
import { plugin as naverHanjaPlugin } from './naver_hanja/index.js'

export const SITE_PLUGIN_REGISTRATIONS: SitePluginRegistration[] = [
  { manifest: naverHanjaPlugin.manifest, load: async () => naverHanjaPlugin },
]

export const DEFAULT_SITE_ID = naverHanjaPlugin.manifest.id
