import fs from 'fs-extra'
import path from 'path'

import { errorMessage } from '../errors.js'
import type { CommonOptions, Result } from '../types.js'

export async function appendAudit(logPath: string, result: Result) {
  await fs.ensureDir(path.dirname(logPath))
  const line = JSON.stringify(result) + '\n'
  await fs.appendFile(logPath, line, 'utf8')
}

/**
 * Opt-in: only when `auditLogPath` is set. A write failure is a warning, never an error.
 */
export async function tryAppendAuditStep(result: Result, opts?: CommonOptions): Promise<Result> {
  const logPath = opts?.auditLogPath
  if (!logPath) return result
  const abs = path.resolve(logPath)
  try {
    await appendAudit(abs, result)
    result.steps.push({ kind: 'audit', message: 'Append audit log', status: 'executed', paths: { file: abs } })
  } catch (e) {
    const msg = errorMessage(e)
    result.warnings.push(`Failed to write audit log: ${msg}`)
    result.steps.push({ kind: 'audit', message: 'Append audit log', status: 'failed', error: msg, paths: { file: abs } })
  }
  return result
}
