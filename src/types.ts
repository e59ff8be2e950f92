export type Operation =
  | 'sync'
  | 'install'
  | 'remove'
  | 'update'
  | 'list'
  | 'status'
  | 'bootstrap'
  | 'show'

export type StepKind =
  | 'noop'
  | 'install'
  | 'remove'
  | 'update'
  | 'bootstrap'
  | 'write_manifest'
  | 'audit'

/**
 * Terminal state of one backend within a reconciliation pass.
 */
export type BackendOutcome =
  | 'skipped_unavailable'
  | 'already_satisfied'
  | 'applied_ok'
  | 'applied_failed'

export interface Step {
  kind: StepKind
  message: string
  /**
   * Backend identifier the step ran against (or `custom`).
   */
  backend?: string
  packages?: string[]
  /**
   * Optional paths involved in the step, for observability and auditing.
   */
  paths?: Record<string, string>
  status?: 'executed' | 'skipped' | 'failed'
  outcome?: BackendOutcome
  error?: string
}

export interface Change {
  action: string
  backend?: string
  package?: string
}

export interface Result {
  ok: boolean
  operation: Operation
  manifestPath?: string
  dryRun: boolean
  startedAt: string
  finishedAt: string
  durationMs: number
  steps: Step[]
  warnings: string[]
  errors: string[]
  /**
   * Summary of changes that occurred (or would occur, on a dry run).
   */
  changes: Change[]
  /**
   * Optional human-readable plan / summary text (best-effort).
   */
  planText?: string
}

export interface Logger {
  info(msg: string): void
  warn(msg: string): void
  error(msg: string): void
}

export interface CommonOptions {
  /**
   * If provided, we append one JSON line per operation (Result summary).
   */
  auditLogPath?: string
  logger?: Logger
  /**
   * If true, external commands are only echoed, and the manifest is never written.
   */
  dryRun?: boolean
  /**
   * If true, return plan text in Result.planText (best-effort).
   */
  includePlanText?: boolean
}

export interface CommandResult {
  success: boolean
  message?: string
}

export interface PackageRecord {
  name: string
  version: string
  /**
   * Human label when the canonical identifier differs from it (store IDs, winget IDs).
   */
  displayName?: string
}

export interface PackageDetails {
  name: string
  version: string
  summary?: string
  homepage?: string
  license?: string
  location?: string
  requires: string[]
  binaries: string[]
}
