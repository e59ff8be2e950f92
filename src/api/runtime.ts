import path from 'path'

import { CustomManager } from '../backends/custom.js'
import { createDefaultRegistry } from '../backends/registry.js'
import type { Registry } from '../backends/registry.js'
import { detectPlatform } from '../core/platform.js'
import type { PlatformInfo } from '../core/platform.js'
import { Shell } from '../core/shell.js'
import { errorMessage } from '../errors.js'
import { saveManifest } from '../manifest/io.js'
import { loadSpecs } from '../manifest/specs.js'
import type { SpecCatalog } from '../manifest/specs.js'
import { loadManifest, normalizeManifest } from '../manifest/types.js'
import type { ManifestDocument } from '../manifest/types.js'
import type { CommandResult, CommonOptions, Logger, Result, Step } from '../types.js'

export interface ManifestInputOptions {
  /**
   * Optional manifestPath for observability/audit only, when the manifest is passed in memory.
   */
  manifestPath?: string
}

/**
 * Collaborators of one command. Everything defaults to the real machine.
 */
export interface RuntimeOptions {
  env?: NodeJS.ProcessEnv
  platform?: PlatformInfo
  shell?: Shell
  registry?: Registry
  custom?: CustomManager
  /**
   * Custom package catalog: a path, or the catalog itself.
   */
  specsPath?: string
  specs?: SpecCatalog
}

export interface ApiOptions extends CommonOptions, ManifestInputOptions, RuntimeOptions {}

export interface Runtime {
  platform: PlatformInfo
  shell: Shell
  registry: Registry
  custom: CustomManager
  logger?: Logger
  dryRun: boolean
}

export function createRuntime(opts: ApiOptions = {}): Runtime {
  const logger = opts.logger
  const shell = opts.shell ?? new Shell({ logger, env: opts.env })
  return {
    platform: opts.platform ?? detectPlatform({ env: opts.env }),
    shell,
    registry: opts.registry ?? createDefaultRegistry(shell, logger),
    custom: opts.custom ?? new CustomManager(shell, logger),
    logger,
    dryRun: opts.dryRun ?? false,
  }
}

export interface ManifestInput {
  doc: ManifestDocument
  manifestPath?: string
  /**
   * True when the document came from a file and changes should be written back.
   */
  persist: boolean
}

/**
 * A string is a manifest path (which must exist); anything else is an in-memory document.
 */
export async function loadManifestInput(manifest: string | unknown, opts: ApiOptions = {}): Promise<ManifestInput> {
  if (typeof manifest === 'string') {
    const abs = path.resolve(manifest)
    return { doc: await loadManifest(abs), manifestPath: abs, persist: true }
  }
  return { doc: normalizeManifest(manifest), manifestPath: opts.manifestPath, persist: false }
}

export async function loadCatalog(opts: ApiOptions = {}): Promise<SpecCatalog> {
  if (opts.specs) return opts.specs
  return await loadSpecs({ specsPath: opts.specsPath, env: opts.env, logger: opts.logger })
}

/**
 * Record a backend operation as a step, and its failure as an error.
 * A successful result with a message is advisory and lands in warnings.
 */
export function recordCommand(res: Result, step: Omit<Step, 'status'>, r: CommandResult, dryRun: boolean): void {
  if (r.success) {
    res.steps.push({ ...step, status: dryRun ? 'skipped' : 'executed' })
    if (r.message) res.warnings.push(`${step.backend ?? step.kind}: ${r.message}`)
    return
  }
  const error = r.message || `${step.kind} failed`
  res.steps.push({ ...step, status: 'failed', error })
  res.errors.push(step.backend ? `${step.backend}: ${error}` : error)
}

/**
 * Write the document back when it came from a file; a dry run or an in-memory document never writes.
 */
export async function persistManifest(res: Result, input: ManifestInput, dryRun: boolean): Promise<Result> {
  const file = input.manifestPath
  if (dryRun) {
    res.steps.push({ kind: 'write_manifest', message: 'Dry run; manifest not written', status: 'skipped' })
    return res
  }
  if (!input.persist || !file) {
    res.steps.push({ kind: 'write_manifest', message: 'In-memory manifest; not writing to disk', status: 'skipped' })
    return res
  }
  try {
    await saveManifest(file, input.doc)
    res.steps.push({ kind: 'write_manifest', message: 'Update manifest', status: 'executed', paths: { file } })
  } catch (e) {
    const msg = errorMessage(e)
    res.ok = false
    res.errors.push(`Failed to write manifest: ${msg}`)
    res.steps.push({ kind: 'write_manifest', message: 'Update manifest', status: 'failed', error: msg, paths: { file } })
  }
  return res
}
