import type { Shell } from '../core/shell.js'
import type { Logger, PackageRecord } from '../types.js'
import { emptyDetails, queryLines, runEach } from './shared.js'
import type { Backend } from './types.js'

const MAS_LINE = /^(\d+)\s+(.+?)\s+\(([^)]+)\)$/

/**
 * `mas list` prints `123456789 App Name (1.2.3)`. The store ID is the tracked name.
 */
export function parseMasList(lines: string[]): PackageRecord[] {
  const out: PackageRecord[] = []
  for (const line of lines) {
    const m = MAS_LINE.exec(line.trim())
    if (m) out.push({ name: m[1], version: m[3], displayName: m[2] })
  }
  return out
}

export function createMasBackend(shell: Shell, logger?: Logger): Backend {
  const listInstalled = () => parseMasList(queryLines(shell, ['mas', 'list']) ?? [])
  return {
    id: 'mas',
    color: 'cyanBright',
    tool: 'mas',
    selfInstall: { darwin: ['brew', 'install', 'mas'] },
    nameMatching: 'exact',
    install: (names, dryRun) => runEach(names, id => shell.run(['mas', 'install', id], dryRun)),
    remove: () => {
      logger?.warn('mas cannot uninstall apps. Remove via Finder or Launchpad.')
      return { success: true, message: 'manual action required' }
    },
    listInstalled,
    getDetails: (name) => {
      const app = listInstalled().find(p => p.name === name)
      if (!app) return undefined
      const details = emptyDetails(app.displayName ?? app.name, app.version)
      details.summary = `Mac App Store (ID: ${app.name})`
      return details
    },
    update: (names, dryRun) => shell.run(['mas', 'upgrade', ...(names ?? [])], dryRun),
    isAvailable: () => shell.which('mas'),
  }
}
