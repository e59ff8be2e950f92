import fs from 'fs-extra'
import os from 'os'
import path from 'path'

import type { Shell } from '../core/shell.js'
import type { PackageDetails, PackageRecord } from '../types.js'
import { emptyDetails, queryLines, runEach } from './shared.js'
import type { Backend } from './types.js'

const TOOL_LINE = /^(\S+)\s+v?(\S+)$/

/**
 * `uv tool list` prints `name v1.2.3` followed by `- binary` lines.
 */
export function parseUvToolList(lines: string[]): PackageRecord[] {
  const out: PackageRecord[] = []
  for (const raw of lines) {
    const line = raw.trim()
    if (!line || line.startsWith('-')) continue
    const m = TOOL_LINE.exec(line)
    if (m) out.push({ name: m[1], version: m[2] })
  }
  return out
}

export function parseUvToolBinaries(name: string, lines: string[]): string[] {
  const binaries: string[] = []
  let inPackage = false
  for (const line of lines) {
    if (line.startsWith(`${name} `)) {
      inPackage = true
    } else if (inPackage) {
      if (line.startsWith('-')) binaries.push(line.replace(/^[-\s]+/, '').trim())
      else if (line.trim() && !line.startsWith(' ')) break
    }
  }
  return binaries
}

/**
 * `pip show` fields: Summary, Home-page, License, Location, Requires.
 */
export function applyPipShow(details: PackageDetails, lines: string[]): PackageDetails {
  for (const line of lines) {
    const idx = line.indexOf(':')
    if (idx < 0) continue
    const key = line.slice(0, idx)
    const value = line.slice(idx + 1).trim()
    if (key === 'Summary') details.summary = value
    else if (key === 'Home-page') details.homepage = value
    else if (key === 'License') details.license = value
    else if (key === 'Location') details.location = value
    else if (key === 'Requires' && value) details.requires = value.split(',').map(r => r.trim())
  }
  return details
}

export interface PythonBackendOptions {
  homeDir?: string
}

export function createPythonBackend(shell: Shell, opts: PythonBackendOptions = {}): Backend {
  const listInstalled = () => parseUvToolList(queryLines(shell, ['uv', 'tool', 'list']) ?? [])
  return {
    id: 'python',
    color: 'yellow',
    tool: 'uv',
    selfInstall: {
      darwin: ['brew', 'install', 'uv'],
      linux: ['micromamba', 'install', '-n', 'base', '-y', 'uv'],
    },
    nameMatching: 'exact',
    install: (names, dryRun) => runEach(names, n => shell.run(['uv', 'tool', 'install', n, '--force'], dryRun)),
    remove: (names, dryRun) => runEach(names, n => shell.run(['uv', 'tool', 'uninstall', n], dryRun)),
    listInstalled,
    getDetails: (name) => {
      const pkg = listInstalled().find(p => p.name === name)
      if (!pkg) return undefined
      const details = emptyDetails(name, pkg.version)

      const pip = path.join(opts.homeDir ?? os.homedir(), '.local', 'share', 'uv', 'tools', name, 'bin', 'pip')
      if (fs.pathExistsSync(pip)) {
        const shown = queryLines(shell, [pip, 'show', name])
        if (shown) applyPipShow(details, shown)
      }

      const listed = queryLines(shell, ['uv', 'tool', 'list'])
      if (listed) details.binaries = parseUvToolBinaries(name, listed)
      return details
    },
    update: (names, dryRun) => {
      if (names?.length) return runEach(names, n => shell.run(['uv', 'tool', 'upgrade', n], dryRun))
      return shell.run(['uv', 'tool', 'upgrade', '--all'], dryRun)
    },
    isAvailable: () => shell.which('uv'),
  }
}
