import type { Shell } from '../core/shell.js'
import type { PackageRecord } from '../types.js'
import { applyKeyValueDetails, emptyDetails, queryLines, runEach } from './shared.js'
import type { Backend } from './types.js'

const TREE_ENTRY = /(@?[^@\s├└─│]+)@([^\s[]+)/

/**
 * `bun pm ls -g` prints a tree: `├── name@version` (names may be scoped).
 */
export function parseBunList(lines: string[]): PackageRecord[] {
  const out: PackageRecord[] = []
  for (const line of lines) {
    const m = TREE_ENTRY.exec(line)
    if (m) out.push({ name: m[1], version: m[2] })
  }
  return out
}

export function createBunBackend(shell: Shell): Backend {
  const listInstalled = () => parseBunList(queryLines(shell, ['bun', 'pm', 'ls', '-g']) ?? [])
  return {
    id: 'bun',
    color: 'magentaBright',
    tool: 'bun',
    selfInstall: {
      darwin: ['brew', 'install', 'oven-sh/bun/bun'],
      linux: ['sh', '-c', 'curl -fsSL https://bun.sh/install | bash'],
    },
    nameMatching: 'exact',
    install: (names, dryRun) => runEach(names, n => shell.run(['bun', 'add', '-g', n], dryRun)),
    remove: (names, dryRun) => runEach(names, n => shell.run(['bun', 'remove', '-g', n], dryRun)),
    listInstalled,
    getDetails: (name) => {
      const pkg = listInstalled().find(p => p.name === name)
      if (!pkg) return undefined
      const details = emptyDetails(name, pkg.version)
      const info = queryLines(shell, ['bun', 'pm', 'info', name])
      if (info) applyKeyValueDetails(details, info)
      // registry info reports the latest release; keep the installed one
      details.version = pkg.version
      return details
    },
    update: (names, dryRun) => {
      if (names?.length) return runEach(names, n => shell.run(['bun', 'update', '-g', n], dryRun))
      return shell.run(['bun', 'update', '-g'], dryRun)
    },
    isAvailable: () => shell.which('bun'),
  }
}
