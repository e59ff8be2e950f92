import { CUSTOM_ID } from '../backends/custom.js'
import { requireAvailable } from '../backends/registry.js'
import { findResolvedType } from '../core/resolver.js'
import { runOperation } from '../core/runner.js'
import { ConfigError } from '../errors.js'
import { findDeclaringSection, flattenManifest } from '../manifest/flatten.js'
import { removeEntry } from '../manifest/io.js'
import { parseSpec } from '../manifest/specs.js'
import type { ManifestDocument } from '../manifest/types.js'
import type { CommandResult, Result } from '../types.js'
import { createRuntime, loadCatalog, loadManifestInput, persistManifest, recordCommand } from './runtime.js'
import type { ApiOptions } from './runtime.js'

export interface RemoveOptions extends ApiOptions {
  /**
   * Backend id; auto-detected from the manifest (after fallback resolution) when omitted.
   */
  type?: string
  /**
   * Default: false. If true, uninstall but keep the manifest entry.
   */
  keep?: boolean
}

/**
 * remove: uninstall a package and stop tracking it. The manifest entry is deleted from
 * the section that declares it, which may differ from the backend it resolved to.
 */
export async function remove(
  manifest: string | unknown,
  name: string,
  opts: RemoveOptions = {},
): Promise<{ result: Result; manifest: ManifestDocument }> {
  const rt = createRuntime(opts)
  const input = await loadManifestInput(manifest, opts)
  const flat = flattenManifest(input.doc, rt.registry, rt.platform)

  const type = opts.type ?? findResolvedType(flat, name, rt)
  if (type === undefined) {
    throw new ConfigError(`Package '${name}' not found in manifest.\nUse --type to specify the package type.`)
  }

  if (rt.dryRun) rt.logger?.warn('DRY RUN - No changes will be made')

  const result = await runOperation({
    operation: 'remove',
    manifestPath: input.manifestPath,
    opts,
    execute: async (res) => {
      rt.logger?.info(`Removing ${type}: ${name}`)
      let r: CommandResult
      if (type === CUSTOM_ID) {
        const catalog = await loadCatalog(opts)
        const raw = catalog[name]
        if (raw === undefined) throw new ConfigError(`No spec found for custom package '${name}'.`)
        const spec = parseSpec(name, raw)
        if (!spec.remove) {
          rt.logger?.warn(`No remove command defined for '${name}'. The package may need to be removed manually.`)
          r = { success: true, message: 'manual action required' }
        } else {
          r = rt.custom.remove(spec, rt.dryRun)
        }
      } else {
        r = requireAvailable(rt.registry, type).remove([name], rt.dryRun)
      }
      recordCommand(res, { kind: 'remove', backend: type, packages: [name], message: `Remove ${name}` }, r, rt.dryRun)
      if (!r.success) {
        rt.logger?.error(r.message || 'Removal failed')
        return
      }
      rt.logger?.info('Done')
      res.changes.push({ action: 'remove', backend: type, package: name })
    },
    finalize: async (res) => {
      if (opts.keep) {
        rt.logger?.info('Kept in manifest')
        res.steps.push({ kind: 'noop', message: 'keep=true; manifest entry kept', status: 'skipped' })
        return res
      }
      if (rt.dryRun) return res
      const section = type === CUSTOM_ID ? CUSTOM_ID : findDeclaringSection(flat, rt.registry, name)
      if (!section) return res
      const removed = removeEntry(input.doc, rt.registry, section, name)
      if (!removed.changed) return res
      res.changes.push({ action: 'manifest_remove', backend: section, package: name })
      return await persistManifest(res, input, rt.dryRun)
    },
  })

  return { result, manifest: input.doc }
}
