import type { Shell } from '../core/shell.js'
import type { Logger, PackageDetails, PackageRecord } from '../types.js'
import { emptyDetails, queryLines } from './shared.js'
import type { Backend } from './types.js'

const CRATE_LINE = /^(\S+)\s+v(\S+):$/

/**
 * `cargo install --list`: top-level `name vX.Y.Z:` lines, each followed by indented binaries.
 */
export function parseCargoList(lines: string[]): PackageRecord[] {
  const out: PackageRecord[] = []
  for (const line of lines) {
    const m = CRATE_LINE.exec(line)
    if (m) out.push({ name: m[1], version: m[2] })
  }
  return out
}

export function parseCargoDetails(name: string, lines: string[]): PackageDetails | undefined {
  let current: PackageDetails | undefined
  for (const line of lines) {
    const m = CRATE_LINE.exec(line)
    if (m) {
      if (current) return current
      if (m[1] === name) current = emptyDetails(m[1], m[2])
    } else if (current && line.trim()) {
      current.binaries.push(line.trim())
    }
  }
  return current
}

export function createRustBackend(shell: Shell, logger?: Logger): Backend {
  const listInstalled = () => parseCargoList(queryLines(shell, ['cargo', 'install', '--list']) ?? [])
  return {
    id: 'rust',
    color: 'red',
    tool: 'cargo',
    selfInstall: {
      all: ['sh', '-c', `curl --proto '=https' --tlsv1.2 -sSf https://sh.rustup.rs | sh -s -- -y`],
    },
    nameMatching: 'exact',
    install: (names, dryRun) => shell.run(['cargo', 'install', '--locked', ...names], dryRun),
    remove: (names, dryRun) => shell.run(['cargo', 'uninstall', ...names], dryRun),
    listInstalled,
    getDetails: (name) => {
      const lines = queryLines(shell, ['cargo', 'install', '--list'])
      return lines ? parseCargoDetails(name, lines) : undefined
    },
    update: (names, dryRun) => {
      if (!listInstalled().some(p => p.name === 'cargo-update')) {
        logger?.warn('cargo-update not installed. Run: cargo install cargo-update --locked')
        return { success: false, message: 'cargo-update not installed' }
      }
      if (names?.length) return shell.run(['cargo', 'install-update', ...names], dryRun)
      return shell.run(['cargo', 'install-update', '-a'], dryRun)
    },
    isAvailable: () => shell.which('cargo'),
  }
}
