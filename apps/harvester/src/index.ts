export * from './ingestion/text/types.js'
export * from './ingestion/text/errors.js'
export { compilePatternSpec, compilePatternSpecs, matchLine, namedGroups } from './ingestion/text/patterns.js'
export { DEFAULT_CHUNK_DELIMITER, extractRecords, parseChunk } from './ingestion/text/extract.js'
export { DEFAULT_ID_FIELD, mergeRecords, parseEntrySchema, type MergeOptions } from './ingestion/text/merge.js'
export { applyModifiers, describeModifier, type ApplyModifiersOptions } from './ingestion/text/modifiers.js'
export { buildModifier, modifierReferenceSchema, type ModifierReference } from './ingestion/text/builtin-modifiers.js'
export { DEFAULT_INPUT_ROOT, loadInputText, resolveInputPath } from './ingestion/text/input.js'
export {
  compilePipelineConfig,
  loadPipelineConfig,
  type PipelineConfig,
  type RawPipelineConfig,
} from './ingestion/text/config.js'
export {
  associatedWords,
  runCompiledTextPipeline,
  runTextPipeline,
  type CompiledTextPipelineInput,
  type TextPipelineInput,
  type TextPipelineResult,
} from './ingestion/text/pipeline.js'
export { createSiteLookup, type SiteLookupOptions } from './ingestion/scrape/collaborator.js'
export {
  getRegisteredSitePluginIds,
  getRegisteredSitePluginManifest,
  loadSitePlugin,
  registerSitePlugin,
} from './ingestion/scrape/registry.js'
export type { DictionarySitePlugin, ScrapePluginManifest } from './ingestion/scrape/types.js'
export {
  mergeColumns,
  recordsToCsv,
  writeResultFiles,
  type ResultColumns,
  type ResultFiles,
} from './export/csv.js'
export { loadSettings, type HarvesterSettings } from './config/settings.js'
