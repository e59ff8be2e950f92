import { tryAppendAuditStep } from './audit.js'
import { formatPlan } from './format-plan.js'
import type { CommonOptions, Result } from '../types.js'

function nowIso() {
  return new Date().toISOString()
}

export function mkResult(operation: Result['operation'], manifestPath?: string, dryRun = false): Result {
  const now = nowIso()
  return {
    ok: true,
    operation,
    manifestPath,
    dryRun,
    startedAt: now,
    finishedAt: now,
    durationMs: 0,
    steps: [],
    warnings: [],
    errors: [],
    changes: [],
  }
}

export interface RunOperationInput {
  operation: Result['operation']
  manifestPath?: string
  opts?: CommonOptions
  /**
   * Does the work, pushing steps, errors and changes onto the result.
   * Configuration errors are thrown and abort the operation.
   */
  execute: (result: Result) => Promise<void> | void
  /**
   * Called after execute but before audit is appended; only when nothing failed.
   * Allows callers to push extra steps (e.g., write_manifest) and mark failure.
   */
  finalize?: (result: Result) => Promise<Result> | Result
}

export async function runOperation(input: RunOperationInput): Promise<Result> {
  const startedMs = Date.now()
  const logger = input.opts?.logger

  let res = mkResult(input.operation, input.manifestPath, input.opts?.dryRun ?? false)
  await input.execute(res)

  res.ok = res.errors.length === 0 && !res.steps.some(s => s.status === 'failed')

  if (input.opts?.includePlanText) {
    res.planText = formatPlan(res.steps)
  }

  if (input.finalize && res.ok) {
    res = await input.finalize(res)
  }

  res.durationMs = Date.now() - startedMs
  res.finishedAt = nowIso()

  res = await tryAppendAuditStep(res, input.opts)

  logger?.info?.(`[pkgsync] ${input.operation} ${res.ok ? 'ok' : 'fail'} (${res.durationMs}ms)`)
  return res
}
