import type { Shell } from '../core/shell.js'
import type { PackageRecord } from '../types.js'
import { applyKeyValueDetails, emptyDetails, queryLines, runAll } from './shared.js'
import type { Backend } from './types.js'

/**
 * `winget.exe list` is a column table (Name, Id, Version, ...) separated by runs of 2+ spaces.
 */
export function parseWingetList(lines: string[]): PackageRecord[] {
  const out: PackageRecord[] = []
  for (const raw of lines) {
    const line = raw.trim()
    if (!line || line.startsWith('Name') || line.startsWith('---')) continue
    const parts = line.split(/\s{2,}/)
    if (parts.length >= 3) out.push({ name: parts[1], version: parts[2], displayName: parts[0] })
  }
  return out
}

export function createWingetBackend(shell: Shell): Backend {
  return {
    id: 'winget',
    color: 'cyan',
    tool: 'winget.exe',
    selfInstall: {},
    nameMatching: 'loose',
    install: (names, dryRun) => runAll(names, id => shell.run([
      'winget.exe', 'install', id, '--silent', '--accept-package-agreements', '--accept-source-agreements',
    ], dryRun)),
    remove: (names, dryRun) => runAll(names, id => shell.run(['winget.exe', 'uninstall', id], dryRun)),
    listInstalled: () => parseWingetList(queryLines(shell, ['winget.exe', 'list']) ?? []),
    getDetails: (name) => {
      const lines = queryLines(shell, ['winget.exe', 'show', name])
      return lines ? applyKeyValueDetails(emptyDetails(name, 'unknown'), lines) : undefined
    },
    update: (names, dryRun) => {
      if (names?.length) return runAll(names, id => shell.run(['winget.exe', 'upgrade', id], dryRun))
      return shell.run(['winget.exe', 'upgrade', '--all'], dryRun)
    },
    isAvailable: () => shell.which('winget.exe'),
  }
}
