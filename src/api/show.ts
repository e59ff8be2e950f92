import { CUSTOM_ID } from '../backends/custom.js'
import { requireBackend } from '../backends/registry.js'
import type { Backend, BackendColor } from '../backends/types.js'
import { resolveAll } from '../core/resolver.js'
import { runOperation } from '../core/runner.js'
import { ConfigError } from '../errors.js'
import { flattenManifest } from '../manifest/flatten.js'
import { parseSpec } from '../manifest/specs.js'
import type { PackageDetails, Result } from '../types.js'
import { createRuntime, loadCatalog, loadManifestInput } from './runtime.js'
import type { ApiOptions } from './runtime.js'

export interface ShowOptions extends ApiOptions {
  type?: string
}

export interface PackageInfo {
  type: string
  color: BackendColor
  details: PackageDetails
  /**
   * Whether the manifest tracks the name under the backend it was found in.
   */
  tracked: boolean
}

/**
 * Details of one installed package. Custom specs are checked first, then each available
 * backend in preferred order unless `type` narrows the search.
 */
export async function show(
  manifest: string | unknown,
  name: string,
  opts: ShowOptions = {},
): Promise<{ result: Result; info: PackageInfo }> {
  const rt = createRuntime(opts)
  const input = await loadManifestInput(manifest, opts)
  const resolved = resolveAll(flattenManifest(input.doc, rt.registry, rt.platform), rt)
  const type = opts.type

  let found: { type: string; color: BackendColor; details: PackageDetails } | undefined

  if (type === CUSTOM_ID || type === undefined) {
    const catalog = await loadCatalog(opts)
    const raw = catalog[name]
    if (raw !== undefined) {
      const details = rt.custom.getDetails(parseSpec(name, raw))
      if (details) found = { type: CUSTOM_ID, color: rt.custom.color, details }
    }
  }

  if (!found && type !== CUSTOM_ID) {
    const candidates: Backend[] = type !== undefined
      ? [requireBackend(rt.registry, type)]
      : rt.registry.order.flatMap(id => {
        const b = rt.registry.backends.get(id)
        return b ? [b] : []
      })
    for (const backend of candidates) {
      if (!backend.isAvailable()) continue
      const details = backend.getDetails(name)
      if (details) {
        found = { type: backend.id, color: backend.color, details }
        break
      }
    }
  }

  if (!found) {
    const hint = type === undefined ? '\nTry specifying --type if the package is installed' : ''
    throw new ConfigError(`Package '${name}' not found${hint}`)
  }

  const info: PackageInfo = { ...found, tracked: (resolved[found.type] ?? []).includes(name) }
  const result = await runOperation({
    operation: 'show',
    manifestPath: input.manifestPath,
    opts,
    execute: () => {},
  })
  return { result, info }
}
