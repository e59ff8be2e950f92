import { CUSTOM_ID } from '../backends/custom.js'
import { reconcile } from '../core/reconcile.js'
import type { BackendReport, ReconcileReport } from '../core/reconcile.js'
import { resolveAll } from '../core/resolver.js'
import type { ResolvedSet } from '../core/resolver.js'
import { runOperation } from '../core/runner.js'
import { ConfigError } from '../errors.js'
import { flattenManifest } from '../manifest/flatten.js'
import type { ManifestDocument } from '../manifest/types.js'
import type { Result, Step } from '../types.js'
import { createRuntime, loadCatalog, loadManifestInput } from './runtime.js'
import type { ApiOptions } from './runtime.js'

export interface SyncOptions extends ApiOptions {
  /**
   * Only reconcile these backend ids (`custom` included).
   */
  types?: string[]
}

export interface SyncOutput {
  result: Result
  manifest: ManifestDocument
  resolved: ResolvedSet
  report: ReconcileReport
}

function stepFor(report: BackendReport, dryRun: boolean): Step {
  const base = { kind: 'install' as const, backend: report.backend, outcome: report.outcome }
  switch (report.outcome) {
    case 'skipped_unavailable':
      return { ...base, packages: report.declared, message: 'Backend not available', status: 'failed', error: report.errors[0] }
    case 'already_satisfied':
      return {
        ...base,
        packages: report.declared,
        message: report.errors.length ? 'Nothing installable' : `All ${report.declared.length} packages installed`,
        status: 'skipped',
      }
    case 'applied_ok':
      return { ...base, packages: report.missing, message: `Install ${report.missing.length} missing`, status: dryRun ? 'skipped' : 'executed' }
    case 'applied_failed':
      return { ...base, packages: report.missing, message: `Install ${report.missing.length} missing`, status: 'failed', error: report.errors[report.errors.length - 1] }
    default: {
      const _exhaustive: never = report.outcome
      throw new Error(`Unknown outcome: ${String(_exhaustive)}`)
    }
  }
}

/**
 * init / sync: install every declared package that is not installed yet. Never writes the manifest.
 */
export async function sync(manifest: string | unknown, opts: SyncOptions = {}): Promise<SyncOutput> {
  const rt = createRuntime(opts)
  const input = await loadManifestInput(manifest, opts)
  const flat = flattenManifest(input.doc, rt.registry, rt.platform)
  const resolved = resolveAll(flat, rt)

  if (opts.types) {
    for (const t of opts.types) {
      if (t !== CUSTOM_ID && !rt.registry.backends.has(t)) {
        throw new ConfigError(`Unknown package type '${t}'\nValid types: ${[...rt.registry.backends.keys(), CUSTOM_ID].join(', ')}`)
      }
    }
  }

  const catalog = resolved[CUSTOM_ID]?.length ? await loadCatalog(opts) : {}
  let report: ReconcileReport = { state: 'all_ok', reports: [], successCount: 0, errorCount: 0 }

  if (rt.dryRun) rt.logger?.warn('DRY RUN - No changes will be made')
  if (input.manifestPath) rt.logger?.info(`Manifest: ${input.manifestPath}`)

  const result = await runOperation({
    operation: 'sync',
    manifestPath: input.manifestPath,
    opts,
    execute: (res) => {
      report = reconcile({
        resolved,
        registry: rt.registry,
        custom: rt.custom,
        specs: catalog,
        types: opts.types,
        dryRun: rt.dryRun,
        logger: rt.logger,
      })
      for (const r of report.reports) {
        res.steps.push(stepFor(r, rt.dryRun))
        res.errors.push(...r.errors)
        for (const name of r.applied) res.changes.push({ action: 'install', backend: r.backend, package: name })
      }
      if (report.errorCount === 0) rt.logger?.info('All packages installed successfully!')
      else rt.logger?.warn(`Completed with ${report.errorCount} error(s)`)
    },
  })

  return { result, manifest: input.doc, resolved, report }
}
