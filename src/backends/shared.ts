import type { Shell } from '../core/shell.js'
import type { CommandResult, PackageDetails } from '../types.js'

/**
 * One sub-invocation per name, stopping at the first failure.
 */
export function runEach(names: string[], fn: (name: string) => CommandResult): CommandResult {
  for (const name of names) {
    const r = fn(name)
    if (!r.success) return r
  }
  return { success: true }
}

/**
 * One sub-invocation per name, every name attempted; success only if all succeeded.
 */
export function runAll(names: string[], fn: (name: string) => CommandResult): CommandResult {
  const failed: string[] = []
  for (const name of names) {
    if (!fn(name).success) failed.push(name)
  }
  if (failed.length) return { success: false, message: `Failed: ${failed.join(', ')}` }
  return { success: true }
}

/**
 * Captured stdout split into lines, or undefined when the query failed.
 */
export function queryLines(shell: Shell, cmd: readonly string[]): string[] | undefined {
  const r = shell.capture(cmd)
  if (!r.ok) return undefined
  return r.stdout.split(/\r?\n/)
}

export function emptyDetails(name: string, version: string): PackageDetails {
  return { name, version, requires: [], binaries: [] }
}

/**
 * Reads `Key: value` lines into details; keys compared case-insensitively.
 */
export function applyKeyValueDetails(details: PackageDetails, lines: string[]): PackageDetails {
  for (const line of lines) {
    const idx = line.indexOf(':')
    if (idx < 0) continue
    const key = line.slice(0, idx).trim().toLowerCase()
    const value = line.slice(idx + 1).trim()
    if (key === 'version') details.version = value
    else if (key === 'homepage') details.homepage = value
    else if (key === 'description' && !details.summary) details.summary = value
    else if (key === 'license') details.license = value
  }
  return details
}
