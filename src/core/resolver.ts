import { CUSTOM_ID } from '../backends/custom.js'
import { isBackendActive } from '../backends/registry.js'
import type { Registry } from '../backends/registry.js'
import type { FlatManifest } from '../manifest/flatten.js'
import type { DeclaredPackage } from '../manifest/types.js'
import type { PlatformInfo } from './platform.js'

/**
 * Concrete backend id -> plain names to operate on. Rebuilt on every command.
 */
export type ResolvedSet = Record<string, string[]>

export interface ResolveContext {
  registry: Registry
  platform: PlatformInfo
}

/**
 * The override wins only when it is registered, available, and in an active category.
 * Anything else falls back to the declaring backend without a warning.
 */
export function resolveBackend(declaring: string, pkg: DeclaredPackage, ctx: ResolveContext): string {
  const preferred = pkg.override
  if (!preferred) return declaring
  const backend = ctx.registry.backends.get(preferred)
  if (!backend || !backend.isAvailable()) return declaring
  return isBackendActive(ctx.registry, preferred, ctx.platform) ? preferred : declaring
}

/**
 * Group every declared package under the backend that will actually service it.
 * Custom packages pass through unresolved.
 */
export function resolveAll(flat: FlatManifest, ctx: ResolveContext): ResolvedSet {
  const resolved: ResolvedSet = {}
  const push = (backend: string, name: string) => {
    const list = resolved[backend] ?? (resolved[backend] = [])
    if (!list.includes(name)) list.push(name)
  }

  for (const [section, pkgs] of Object.entries(flat)) {
    if (section === CUSTOM_ID) {
      for (const p of pkgs) push(CUSTOM_ID, p.name)
      continue
    }
    for (const p of pkgs) push(resolveBackend(section, p, ctx), p.name)
  }
  return resolved
}

/**
 * Resolved backend of a declared name, custom first, then standard sections in registry order.
 */
export function findResolvedType(flat: FlatManifest, name: string, ctx: ResolveContext): string | undefined {
  if ((flat[CUSTOM_ID] ?? []).some(p => p.name === name)) return CUSTOM_ID
  for (const id of ctx.registry.order) {
    if (id === CUSTOM_ID) continue
    const pkg = (flat[id] ?? []).find(p => p.name === name)
    if (pkg) return resolveBackend(id, pkg, ctx)
  }
  return undefined
}
