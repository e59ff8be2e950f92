import { CUSTOM_ID } from '../backends/custom.js'
import { requireAvailable } from '../backends/registry.js'
import { platformMatches } from '../core/platform.js'
import { describePackages } from '../core/reconcile.js'
import { resolveAll } from '../core/resolver.js'
import { runOperation } from '../core/runner.js'
import { ConfigError } from '../errors.js'
import { flattenManifest } from '../manifest/flatten.js'
import { addEntry } from '../manifest/io.js'
import { parseSpec } from '../manifest/specs.js'
import { entryName, entryPlatforms } from '../manifest/types.js'
import type { ManifestDocument } from '../manifest/types.js'
import type { Result } from '../types.js'
import { createRuntime, loadCatalog, loadManifestInput, persistManifest, recordCommand } from './runtime.js'
import type { ApiOptions } from './runtime.js'

export interface InstallOptions extends ApiOptions {}

function customPlatforms(doc: ManifestDocument, name: string): string | string[] | undefined {
  const entry = (doc.custom ?? []).find(e => entryName(e) === name)
  return entry === undefined ? undefined : entryPlatforms(entry)
}

/**
 * Install one package with the given backend and record it in the manifest unless it
 * already resolves to that backend, from its own section or through a `name:backend`
 * entry elsewhere. Custom packages need a spec in the catalog.
 */
export async function install(
  manifest: string | unknown,
  type: string,
  name: string,
  opts: InstallOptions = {},
): Promise<{ result: Result; manifest: ManifestDocument }> {
  const rt = createRuntime(opts)
  const input = await loadManifestInput(manifest, opts)
  const flat = flattenManifest(input.doc, rt.registry, rt.platform)
  const tracked = (resolveAll(flat, rt)[type] ?? []).includes(name)
  let record = false

  if (rt.dryRun) rt.logger?.warn('DRY RUN - No changes will be made')

  const result = await runOperation({
    operation: 'install',
    manifestPath: input.manifestPath,
    opts,
    execute: async (res) => {
      if (type === CUSTOM_ID) {
        const catalog = await loadCatalog(opts)
        const raw = catalog[name]
        if (raw === undefined) {
          throw new ConfigError(`No spec found for custom package '${name}'.\nAvailable specs: ${Object.keys(catalog).join(', ')}`)
        }
        if (!platformMatches(customPlatforms(input.doc, name), rt.platform)) {
          throw new ConfigError(`Custom package '${name}' is not supported on this platform.`)
        }
        const spec = parseSpec(name, raw)
        rt.logger?.info(`Installing ${CUSTOM_ID}: ${name}`)
        if (spec.depends.length) rt.logger?.info(`  Depends: ${spec.depends.join(', ')}`)
        const r = rt.custom.install(spec, rt.dryRun)
        recordCommand(res, { kind: 'install', backend: CUSTOM_ID, packages: [name], message: `Run install script for ${name}` }, r, rt.dryRun)
        record = r.success && !tracked
      } else {
        const backend = requireAvailable(rt.registry, type)
        rt.logger?.info(`Installing ${type}: ${describePackages([name])}`)
        const r = backend.install([name], rt.dryRun)
        recordCommand(res, { kind: 'install', backend: type, packages: [name], message: `Install ${name}` }, r, rt.dryRun)
        record = r.success && !tracked
      }
      if (res.errors.length) {
        rt.logger?.error(res.errors[res.errors.length - 1])
        return
      }
      rt.logger?.info('Done')
      res.changes.push({ action: 'install', backend: type, package: name })
    },
    finalize: async (res) => {
      if (!record || rt.dryRun) return res
      const added = addEntry(input.doc, rt.registry, type, name)
      if (!added.changed) return res
      res.changes.push({ action: 'manifest_add', backend: type, package: name })
      return await persistManifest(res, input, rt.dryRun)
    },
  })

  return { result, manifest: input.doc }
}
