import { CUSTOM_ID } from '../backends/custom.js'
import { activeCategories } from '../backends/registry.js'
import type { Registry } from '../backends/registry.js'
import { platformMatches } from '../core/platform.js'
import type { PlatformInfo } from '../core/platform.js'
import { decodeEntry, getCategorySection } from './types.js'
import type { DeclaredPackage, ManifestDocument, RawEntry } from './types.js'

/**
 * Declaring section (backend id or `custom`) -> packages declared there.
 * Sections are keyed by where an entry is written, not where it will be installed.
 */
export type FlatManifest = Record<string, DeclaredPackage[]>

function collect(entries: RawEntry[], section: string, platform: PlatformInfo): DeclaredPackage[] {
  const seen = new Set<string>()
  const out: DeclaredPackage[] = []
  for (const entry of entries) {
    const pkg = decodeEntry(entry, section)
    if (!pkg.name || seen.has(pkg.name)) continue
    if (!platformMatches(pkg.platforms, platform)) continue
    seen.add(pkg.name)
    out.push(pkg)
  }
  return out
}

/**
 * Keep active categories only, apply per-entry platform restrictions, de-duplicate names
 * within a section. Empty sections are dropped.
 */
export function flattenManifest(doc: ManifestDocument, registry: Registry, platform: PlatformInfo): FlatManifest {
  const flat: FlatManifest = {}
  for (const cat of activeCategories(registry, platform)) {
    for (const section of cat.backends) {
      const entries = section === CUSTOM_ID
        ? doc.custom
        : getCategorySection(doc, cat.id)?.[section]
      if (!entries) continue
      const pkgs = collect(entries, section, platform)
      if (pkgs.length) flat[section] = pkgs
    }
  }
  return flat
}

export function declaredNames(flat: FlatManifest, section: string): string[] {
  return (flat[section] ?? []).map(p => p.name)
}

/**
 * Declaring section of `name`: custom first, then standard sections in registry order.
 */
export function findDeclaringSection(flat: FlatManifest, registry: Registry, name: string): string | undefined {
  if (declaredNames(flat, CUSTOM_ID).includes(name)) return CUSTOM_ID
  for (const id of registry.order) {
    if (id === CUSTOM_ID) continue
    if (declaredNames(flat, id).includes(name)) return id
  }
  return undefined
}
