import { CUSTOM_ID } from '../backends/custom.js'
import { activeCategories } from '../backends/registry.js'
import type { BackendColor } from '../backends/types.js'
import { runOperation } from '../core/runner.js'
import { flattenManifest } from '../manifest/flatten.js'
import type { Result } from '../types.js'
import { createRuntime, loadManifestInput } from './runtime.js'
import type { ApiOptions } from './runtime.js'

export interface StatusRow {
  backend: string
  color: BackendColor
  tool: string
  available: boolean
  /**
   * Entries declared in this backend's own section (before fallback resolution).
   */
  packages: number
}

export interface StatusCategory {
  id: string
  title: string
  rows: StatusRow[]
}

/**
 * Availability of every backend in each active category, with declared package counts.
 */
export async function status(
  manifest: string | unknown,
  opts: ApiOptions = {},
): Promise<{ result: Result; categories: StatusCategory[] }> {
  const rt = createRuntime(opts)
  const input = await loadManifestInput(manifest, opts)
  const flat = flattenManifest(input.doc, rt.registry, rt.platform)
  const categories: StatusCategory[] = []

  const result = await runOperation({
    operation: 'status',
    manifestPath: input.manifestPath,
    opts,
    execute: () => {
      for (const cat of activeCategories(rt.registry, rt.platform)) {
        const rows: StatusRow[] = []
        for (const id of cat.backends) {
          const packages = flat[id]?.length ?? 0
          if (id === CUSTOM_ID) {
            rows.push({ backend: id, color: rt.custom.color, tool: rt.custom.tool, available: true, packages })
            continue
          }
          const backend = rt.registry.backends.get(id)
          if (!backend) continue
          rows.push({ backend: id, color: backend.color, tool: backend.tool, available: backend.isAvailable(), packages })
        }
        categories.push({ id: cat.id, title: cat.title, rows })
      }
    },
  })

  return { result, categories }
}
