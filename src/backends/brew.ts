import type { Shell } from '../core/shell.js'
import type { PackageDetails, PackageRecord } from '../types.js'
import { emptyDetails, queryLines } from './shared.js'
import type { Backend } from './types.js'

/**
 * `brew list --versions` prints `name v1 [v2 ...]`; the last version wins.
 */
export function parseBrewList(lines: string[]): PackageRecord[] {
  const out: PackageRecord[] = []
  for (const line of lines) {
    const parts = line.trim().split(/\s+/)
    if (parts.length >= 2) out.push({ name: parts[0], version: parts[parts.length - 1] })
  }
  return out
}

/**
 * `brew info` output: a `==> name: ...` header, a description line, then the homepage.
 */
export function parseBrewInfo(name: string, lines: string[], header: RegExp): PackageDetails | undefined {
  if (!lines.length || !lines[0]) return undefined
  const m = header.exec(lines[0])
  const details = m ? emptyDetails(m[1], m[2].trim()) : emptyDetails(name, 'unknown')

  for (const line of lines.slice(1)) {
    if (line.startsWith('==>')) continue
    const text = line.trim()
    if (text.startsWith('http')) {
      details.homepage = text
      break
    }
    if (!details.summary && text) details.summary = text
  }
  return details
}

const FORMULA_HEADER = /^==> (\S+): .*?(\d+\.\d+[.\d]*)/
const CASK_HEADER = /^==> (\S+): (.+)$/

export function createBrewBackend(shell: Shell): Backend {
  return {
    id: 'brew',
    color: 'yellowBright',
    tool: 'brew',
    selfInstall: {},
    nameMatching: 'exact',
    install: (names, dryRun) => shell.run(['brew', 'install', ...names], dryRun),
    remove: (names, dryRun) => shell.run(['brew', 'uninstall', ...names], dryRun),
    listInstalled: () => parseBrewList(queryLines(shell, ['brew', 'list', '--formula', '--versions']) ?? []),
    getDetails: (name) => {
      const lines = queryLines(shell, ['brew', 'info', name])
      return lines ? parseBrewInfo(name, lines, FORMULA_HEADER) : undefined
    },
    update: (names, dryRun) => {
      const refreshed = shell.run(['brew', 'update'], dryRun)
      if (!refreshed.success) return refreshed
      return shell.run(['brew', 'upgrade', ...(names ?? [])], dryRun)
    },
    isAvailable: () => shell.which('brew'),
  }
}

export function createCaskBackend(shell: Shell): Backend {
  return {
    id: 'cask',
    color: 'blueBright',
    tool: 'brew',
    selfInstall: {},
    nameMatching: 'exact',
    install: (names, dryRun) => shell.run(['brew', 'install', '--cask', ...names], dryRun),
    remove: (names, dryRun) => shell.run(['brew', 'uninstall', '--cask', ...names], dryRun),
    listInstalled: () => parseBrewList(queryLines(shell, ['brew', 'list', '--cask', '--versions']) ?? []),
    getDetails: (name) => {
      const lines = queryLines(shell, ['brew', 'info', '--cask', name])
      return lines ? parseBrewInfo(name, lines, CASK_HEADER) : undefined
    },
    update: (names, dryRun) => shell.run(['brew', 'upgrade', '--cask', ...(names ?? [])], dryRun),
    isAvailable: () => shell.which('brew'),
  }
}
