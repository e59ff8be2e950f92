import type { Shell } from '../core/shell.js'
import type { PackageDetails, PackageRecord } from '../types.js'
import { emptyDetails, queryLines } from './shared.js'
import type { Backend } from './types.js'

const ENV_NAME = 'base'

/**
 * `micromamba list` rows are `name version build channel`; pypi-installed rows are skipped.
 */
export function parseCondaList(lines: string[]): PackageRecord[] {
  const out: PackageRecord[] = []
  for (const line of lines) {
    if (line.startsWith('#') || !line.trim()) continue
    const parts = line.trim().split(/\s+/)
    if (parts.length < 3) continue
    if (parts[parts.length - 1] === 'pypi') continue
    out.push({ name: parts[0], version: parts[1] })
  }
  return out
}

export function parseCondaDetails(name: string, lines: string[]): PackageDetails | undefined {
  for (const line of lines) {
    if (line.startsWith('#') || !line.trim()) continue
    const parts = line.trim().split(/\s+/)
    if (parts.length >= 4 && parts[0] === name) {
      const details = emptyDetails(parts[0], parts[1])
      details.summary = `build: ${parts[2]}`
      details.location = `channel: ${parts[3]}`
      return details
    }
  }
  return undefined
}

export function createCondaBackend(shell: Shell): Backend {
  return {
    id: 'conda',
    color: 'green',
    tool: 'micromamba',
    selfInstall: {
      darwin: ['brew', 'install', 'micromamba'],
      linux: ['sh', '-c', 'curl -Ls https://micro.mamba.pm/api/micromamba/linux-64/latest | tar -xvj bin/micromamba && mv bin/micromamba ~/.local/bin/'],
    },
    nameMatching: 'exact',
    install: (names, dryRun) => shell.run(['micromamba', 'install', '-n', ENV_NAME, '-y', ...names], dryRun),
    remove: (names, dryRun) => shell.run(['micromamba', 'remove', '-n', ENV_NAME, '-y', ...names], dryRun),
    listInstalled: () => parseCondaList(queryLines(shell, ['micromamba', 'list', '-n', ENV_NAME]) ?? []),
    getDetails: (name) => {
      const lines = queryLines(shell, ['micromamba', 'list', '-n', ENV_NAME, `^${name}$`])
      return lines ? parseCondaDetails(name, lines) : undefined
    },
    update: (names, dryRun) => {
      if (names?.length) return shell.run(['micromamba', 'update', '-n', ENV_NAME, '-y', ...names], dryRun)
      return shell.run(['micromamba', 'update', '-n', ENV_NAME, '--all', '-y'], dryRun)
    },
    isAvailable: () => shell.which('micromamba'),
  }
}
