import { CUSTOM_ID } from '../backends/custom.js'
import type { CustomManager } from '../backends/custom.js'
import { reorder } from '../backends/registry.js'
import type { Registry } from '../backends/registry.js'
import type { Backend, NameMatching } from '../backends/types.js'
import { parseSpec } from '../manifest/specs.js'
import type { SpecCatalog } from '../manifest/specs.js'
import type { BackendOutcome, Logger, PackageRecord } from '../types.js'
import type { ResolvedSet } from './resolver.js'

export interface BackendReport {
  backend: string
  outcome: BackendOutcome
  declared: string[]
  missing: string[]
  /**
   * Names the backend was asked to install and reported success for.
   */
  applied: string[]
  message?: string
  /**
   * Per-backend or per-item errors, in the order they happened.
   */
  errors: string[]
}

export type CommandState = 'all_ok' | 'partial_failure'

export interface ReconcileReport {
  state: CommandState
  reports: BackendReport[]
  successCount: number
  errorCount: number
}

export interface ReconcileInput {
  resolved: ResolvedSet
  registry: Registry
  custom: CustomManager
  specs: SpecCatalog
  /**
   * Restrict to these backend ids; default: every key of `resolved`.
   */
  types?: string[]
  dryRun?: boolean
  logger?: Logger
}

/**
 * Names that count as installed. `loose` backends also match display names, case-insensitively.
 */
export function installedNameSet(records: PackageRecord[], matching: NameMatching): Set<string> {
  const names = new Set(records.map(p => p.name))
  if (matching === 'loose') {
    for (const p of records) if (p.displayName) names.add(p.displayName)
    for (const n of [...names]) names.add(n.toLowerCase())
  }
  return names
}

export function isInstalledName(installed: Set<string>, name: string, matching: NameMatching): boolean {
  if (installed.has(name)) return true
  return matching === 'loose' && installed.has(name.toLowerCase())
}

export function describePackages(names: string[]): string {
  return names.length <= 3 ? names.join(', ') : `${names.length} packages`
}

function reconcileBackend(backend: Backend, declared: string[], input: ReconcileInput, counters: { success: number; error: number }): BackendReport {
  const logger = input.logger
  const report: BackendReport = { backend: backend.id, outcome: 'already_satisfied', declared, missing: [], applied: [], errors: [] }

  if (!backend.isAvailable()) {
    const msg = `Required tool '${backend.tool}' not found in PATH; skipping ${backend.id}`
    logger?.error(msg)
    report.outcome = 'skipped_unavailable'
    report.errors.push(msg)
    counters.error++
    return report
  }

  const installed = installedNameSet(backend.listInstalled(), backend.nameMatching)
  report.missing = declared.filter(n => !isInstalledName(installed, n, backend.nameMatching))

  if (!report.missing.length) {
    logger?.info(`${backend.id}: all ${declared.length} packages installed`)
    return report
  }

  logger?.info(`Installing ${backend.id}: ${describePackages(report.missing)}`)
  logger?.info(`  Skipping ${declared.length - report.missing.length} already installed`)

  const r = backend.install(report.missing, input.dryRun)
  if (r.success) {
    counters.success++
    report.outcome = 'applied_ok'
    report.applied = [...report.missing]
    report.message = r.message
    logger?.info('Done')
  } else {
    counters.error++
    report.outcome = 'applied_failed'
    const msg = r.message || 'Installation failed'
    report.message = msg
    report.errors.push(`${backend.id}: ${msg}`)
    logger?.error(msg)
  }
  return report
}

function reconcileCustom(declared: string[], input: ReconcileInput, counters: { success: number; error: number }): BackendReport {
  const { custom, specs, logger } = input
  const report: BackendReport = { backend: CUSTOM_ID, outcome: 'already_satisfied', declared, missing: [], applied: [], errors: [] }

  for (const name of declared) {
    const raw = specs[name]
    if (raw === undefined) {
      const msg = `No spec found for '${name}'`
      logger?.error(msg)
      report.errors.push(msg)
      counters.error++
      continue
    }
    if (!custom.isInstalled(parseSpec(name, raw))) report.missing.push(name)
  }

  if (!report.missing.length) {
    if (!report.errors.length) logger?.info(`${CUSTOM_ID}: all ${declared.length} packages installed`)
    return report
  }

  logger?.info(`Installing ${CUSTOM_ID}: ${describePackages(report.missing)}`)
  logger?.info(`  Skipping ${declared.length - report.missing.length} already installed`)

  let failed = false
  for (const name of report.missing) {
    const spec = parseSpec(name, specs[name])
    logger?.info(`  ${name}`)
    if (spec.depends.length) logger?.info(`  Depends: ${spec.depends.join(', ')}`)
    const r = custom.install(spec, input.dryRun)
    if (r.success) {
      report.applied.push(name)
      logger?.info(`${name} installed`)
    } else {
      failed = true
      counters.error++
      const msg = r.message || `${name} installation failed`
      report.errors.push(`${CUSTOM_ID}/${name}: ${msg}`)
      logger?.error(msg)
    }
  }
  report.outcome = failed ? 'applied_failed' : 'applied_ok'
  return report
}

/**
 * Install whatever is declared but missing, one backend at a time in preferred order.
 * A failing or unavailable backend never stops the ones after it.
 */
export function reconcile(input: ReconcileInput): ReconcileReport {
  const counters = { success: 0, error: 0 }
  const reports: BackendReport[] = []
  const types = reorder(input.registry, input.types ?? Object.keys(input.resolved))

  for (const type of types) {
    const declared = input.resolved[type] ?? []
    if (!declared.length) continue

    if (type === CUSTOM_ID) {
      reports.push(reconcileCustom(declared, input, counters))
      continue
    }

    const backend = input.registry.backends.get(type)
    if (!backend) {
      const msg = `Unknown package type '${type}'`
      input.logger?.error(msg)
      counters.error++
      reports.push({ backend: type, outcome: 'skipped_unavailable', declared, missing: [], applied: [], errors: [msg] })
      continue
    }
    reports.push(reconcileBackend(backend, declared, input, counters))
  }

  return {
    state: reports.some(r => r.outcome === 'applied_failed') ? 'partial_failure' : 'all_ok',
    reports,
    successCount: counters.success,
    errorCount: counters.error,
  }
}
