export type { ManifestDocument, RawEntry, StructuredEntry, DeclaredPackage } from './manifest/types.js'
export type { CustomPackageSpec, SpecCatalog } from './manifest/specs.js'
export type { Backend, BackendColor, NameMatching } from './backends/types.js'
export type { Category, Registry } from './backends/registry.js'
export type { PlatformInfo } from './core/platform.js'
export type { ResolvedSet } from './core/resolver.js'
export type { BackendReport, ReconcileReport } from './core/reconcile.js'
export type { ApiOptions } from './api/runtime.js'
export type { SyncOptions, SyncOutput } from './api/sync.js'
export type { RemoveOptions } from './api/remove.js'
export type { UpdateOptions } from './api/update.js'
export type { ListOptions, CategoryPanels, BackendPanel, PackageRow } from './api/list.js'
export type { StatusCategory, StatusRow } from './api/status.js'
export type { ShowOptions, PackageInfo } from './api/show.js'
export type {
  Result,
  Step,
  Logger,
  CommonOptions,
  CommandResult,
  PackageRecord,
  PackageDetails,
  BackendOutcome,
} from './types.js'

export { ConfigError } from './errors.js'
export { loadManifest, normalizeManifest, parsePackageEntry } from './manifest/types.js'
export { saveManifest, serializeManifest, addEntry, removeEntry } from './manifest/io.js'
export { flattenManifest } from './manifest/flatten.js'
export { loadSpecs } from './manifest/specs.js'
export { createRegistry, createDefaultRegistry, DEFAULT_CATEGORIES, DEFAULT_ORDER } from './backends/registry.js'
export { CustomManager } from './backends/custom.js'
export { detectPlatform, platformMatches } from './core/platform.js'
export { Shell } from './core/shell.js'
export { resolveAll, resolveBackend } from './core/resolver.js'
export { reconcile } from './core/reconcile.js'

export { sync, install, remove, update, list, status, show, bootstrap } from './api/index.js'
