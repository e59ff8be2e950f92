import { CUSTOM_ID } from '../backends/custom.js'
import { reorder, requireAvailable } from '../backends/registry.js'
import type { Registry } from '../backends/registry.js'
import { installedNameSet, isInstalledName } from '../core/reconcile.js'
import { findResolvedType, resolveAll } from '../core/resolver.js'
import { runOperation } from '../core/runner.js'
import { ConfigError } from '../errors.js'
import { flattenManifest } from '../manifest/flatten.js'
import type { Result } from '../types.js'
import { createRuntime, loadManifestInput, recordCommand } from './runtime.js'
import type { ApiOptions } from './runtime.js'

export interface UpdateOptions extends ApiOptions {
  type?: string
}

/**
 * First available backend that reports `name` as installed.
 */
function findInstalledType(registry: Registry, name: string): string | undefined {
  for (const id of registry.order) {
    const backend = registry.backends.get(id)
    if (!backend || !backend.isAvailable()) continue
    if (isInstalledName(installedNameSet(backend.listInstalled(), backend.nameMatching), name, backend.nameMatching)) {
      return id
    }
  }
  return undefined
}

/**
 * Update one package, or everything each resolved backend manages.
 * Updating all continues past an unavailable or failing backend.
 */
export async function update(
  manifest: string | unknown,
  name: string | undefined,
  opts: UpdateOptions = {},
): Promise<{ result: Result }> {
  const rt = createRuntime(opts)
  const input = await loadManifestInput(manifest, opts)
  const flat = flattenManifest(input.doc, rt.registry, rt.platform)

  if (rt.dryRun) rt.logger?.warn('DRY RUN - No changes will be made')

  if (name) {
    const type = opts.type ?? findResolvedType(flat, name, rt) ?? findInstalledType(rt.registry, name)
    if (type === undefined) {
      throw new ConfigError(`Package '${name}' not found.\nUse --type to specify the package type.`)
    }
    if (type === CUSTOM_ID) {
      throw new ConfigError(`Custom package '${name}' has no update command; reinstall it instead.`)
    }
    const backend = requireAvailable(rt.registry, type)
    const result = await runOperation({
      operation: 'update',
      manifestPath: input.manifestPath,
      opts,
      execute: (res) => {
        rt.logger?.info(`Updating ${type}: ${name}`)
        const r = backend.update([name], rt.dryRun)
        recordCommand(res, { kind: 'update', backend: type, packages: [name], message: `Update ${name}` }, r, rt.dryRun)
        if (r.success) rt.logger?.info('Done')
        else rt.logger?.error(r.message || 'Update failed')
      },
    })
    return { result }
  }

  const resolved = resolveAll(flat, rt)
  const requested = opts.type ? [opts.type] : Object.keys(resolved)
  const types = reorder(rt.registry, requested).filter(t => t !== CUSTOM_ID)

  const result = await runOperation({
    operation: 'update',
    manifestPath: input.manifestPath,
    opts,
    execute: (res) => {
      for (const type of types) {
        rt.logger?.info(`Updating ${type}`)
        const backend = rt.registry.backends.get(type)
        if (!backend) {
          const msg = `Unknown package type '${type}'`
          rt.logger?.error(msg)
          res.errors.push(msg)
          res.steps.push({ kind: 'update', backend: type, message: 'Unknown backend', status: 'failed', error: msg })
          continue
        }
        if (!backend.isAvailable()) {
          const msg = `Required tool '${backend.tool}' not found in PATH`
          rt.logger?.error(msg)
          res.errors.push(`${type}: ${msg}`)
          res.steps.push({ kind: 'update', backend: type, message: 'Backend not available', status: 'failed', outcome: 'skipped_unavailable', error: msg })
          continue
        }
        const r = backend.update(undefined, rt.dryRun)
        recordCommand(res, { kind: 'update', backend: type, message: `Update all ${type} packages` }, r, rt.dryRun)
        if (r.success) rt.logger?.info('Done')
        else rt.logger?.error(r.message || 'Update failed')
      }
    },
  })
  return { result }
}
