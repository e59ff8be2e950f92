import { CUSTOM_ID } from '../backends/custom.js'
import type { CustomManager } from '../backends/custom.js'
import { activeCategories } from '../backends/registry.js'
import type { Backend, BackendColor, NameMatching } from '../backends/types.js'
import { resolveAll } from '../core/resolver.js'
import type { ResolvedSet } from '../core/resolver.js'
import { runOperation } from '../core/runner.js'
import { flattenManifest } from '../manifest/flatten.js'
import type { SpecCatalog } from '../manifest/specs.js'
import type { PackageRecord, Result } from '../types.js'
import { createRuntime, loadCatalog, loadManifestInput } from './runtime.js'
import type { ApiOptions } from './runtime.js'

export type PackageState = 'installed' | 'missing' | 'untracked'

export interface PackageRow {
  name: string
  /**
   * What to show: the installed record's display name when it has one.
   */
  label: string
  state: PackageState
}

export interface BackendPanel {
  backend: string
  color: BackendColor
  available: boolean
  /**
   * Number of packages the manifest declares for this backend after resolution.
   */
  declared: number
  rows: PackageRow[]
}

export interface CategoryPanels {
  id: string
  title: string
  panels: BackendPanel[]
}

export interface ListOptions extends ApiOptions {
  /**
   * Include installed packages the manifest does not track.
   */
  verbose?: boolean
  types?: string[]
}

/**
 * Exact id first, then display name, then both case-insensitively (for `loose` backends).
 */
export function findInstalledRecord(records: PackageRecord[], name: string, matching: NameMatching): PackageRecord | undefined {
  const exact = records.find(p => p.name === name)
  if (exact || matching === 'exact') return exact
  const byDisplay = records.find(p => p.displayName === name)
  if (byDisplay) return byDisplay
  const key = name.toLowerCase()
  return records.find(p => p.name.toLowerCase() === key) ?? records.find(p => p.displayName?.toLowerCase() === key)
}

export function buildBackendPanel(backend: Backend, declared: string[], verbose: boolean): BackendPanel | undefined {
  const panel: BackendPanel = { backend: backend.id, color: backend.color, available: false, declared: declared.length, rows: [] }
  if (!backend.isAvailable()) return declared.length ? panel : undefined
  panel.available = true

  const records = backend.listInstalled()
  const tracked = new Set(backend.nameMatching === 'loose' ? declared.map(n => n.toLowerCase()) : declared)
  const isTracked = (n: string) => tracked.has(backend.nameMatching === 'loose' ? n.toLowerCase() : n)

  const names = new Set(declared)
  if (verbose) {
    for (const p of records) names.add(backend.nameMatching === 'loose' ? (p.displayName || p.name) : p.name)
  }
  if (!names.size) return undefined

  for (const name of [...names].sort()) {
    const pkg = findInstalledRecord(records, name, backend.nameMatching)
    if (!pkg) {
      panel.rows.push({ name, label: name, state: 'missing' })
      continue
    }
    const label = pkg.displayName || pkg.name
    panel.rows.push({ name, label, state: verbose && !isTracked(name) ? 'untracked' : 'installed' })
  }
  return panel
}

export function buildCustomPanel(custom: CustomManager, declared: string[], catalog: SpecCatalog, verbose: boolean): BackendPanel | undefined {
  if (!declared.length && !verbose) return undefined
  const tracked = new Set(declared)
  const names = new Set(declared)
  if (verbose) for (const n of Object.keys(catalog)) names.add(n)
  if (!names.size) return undefined

  const configs: SpecCatalog = {}
  for (const [n, raw] of Object.entries(catalog)) {
    if (names.has(n)) configs[n] = raw
  }
  const installed = new Set(custom.listInstalled(configs).map(p => p.name))

  const rows: PackageRow[] = [...names].sort().map((name): PackageRow => {
    if (!installed.has(name)) return { name, label: name, state: 'missing' }
    return { name, label: name, state: verbose && !tracked.has(name) ? 'untracked' : 'installed' }
  })
  return { backend: CUSTOM_ID, color: custom.color, available: true, declared: declared.length, rows }
}

/**
 * Tracked packages grouped by active category, each row marked installed, missing or untracked.
 */
export async function list(
  manifest: string | unknown,
  opts: ListOptions = {},
): Promise<{ result: Result; resolved: ResolvedSet; categories: CategoryPanels[] }> {
  const rt = createRuntime(opts)
  const input = await loadManifestInput(manifest, opts)
  const resolved = resolveAll(flattenManifest(input.doc, rt.registry, rt.platform), rt)
  const filter = opts.types ? new Set(opts.types) : undefined
  const verbose = opts.verbose ?? false
  const categories: CategoryPanels[] = []

  const result = await runOperation({
    operation: 'list',
    manifestPath: input.manifestPath,
    opts,
    execute: async () => {
      for (const cat of activeCategories(rt.registry, rt.platform)) {
        const panels: BackendPanel[] = []
        for (const id of cat.backends) {
          if (filter && !filter.has(id)) continue
          const declared = resolved[id] ?? []
          let panel: BackendPanel | undefined
          if (id === CUSTOM_ID) {
            const catalog = declared.length || verbose ? await loadCatalog(opts) : {}
            panel = buildCustomPanel(rt.custom, declared, catalog, verbose)
          } else {
            const backend = rt.registry.backends.get(id)
            panel = backend ? buildBackendPanel(backend, declared, verbose) : undefined
          }
          if (panel) panels.push(panel)
        }
        if (panels.length) categories.push({ id: cat.id, title: cat.title, panels })
      }
    },
  })

  return { result, resolved, categories }
}
