import { CustomManager } from '../src/backends/custom.js'
import { createRegistry } from '../src/backends/registry.js'
import type { Registry } from '../src/backends/registry.js'
import type { Backend, NameMatching, SelfInstallPlatform } from '../src/backends/types.js'
import type { PlatformInfo } from '../src/core/platform.js'
import { Shell } from '../src/core/shell.js'
import type { SpawnOptions, SpawnResult } from '../src/core/spawn.js'
import type { CommandResult, Logger, PackageRecord } from '../src/types.js'

export const LINUX: PlatformInfo = { os: 'linux', wsl: false }
export const MAC: PlatformInfo = { os: 'darwin', wsl: false }
export const WSL: PlatformInfo = { os: 'linux', wsl: true }

export interface BackendCall {
  op: 'install' | 'remove' | 'update'
  names?: string[]
  dryRun?: boolean
}

export interface FakeBackend extends Backend {
  installed: PackageRecord[]
  available: boolean
  failWith?: string
  calls: BackendCall[]
}

export interface FakeBackendInit {
  installed?: (string | PackageRecord)[]
  available?: boolean
  failWith?: string
  nameMatching?: NameMatching
  selfInstall?: Partial<Record<SelfInstallPlatform, readonly string[]>>
}

export function fakeBackend(id: string, init: FakeBackendInit = {}): FakeBackend {
  const result = (): CommandResult => (b.failWith ? { success: false, message: b.failWith } : { success: true })
  const b: FakeBackend = {
    id,
    color: 'green',
    tool: `${id}-tool`,
    selfInstall: init.selfInstall ?? {},
    nameMatching: init.nameMatching ?? 'exact',
    installed: (init.installed ?? []).map(p => (typeof p === 'string' ? { name: p, version: '1.0.0' } : p)),
    available: init.available ?? true,
    failWith: init.failWith,
    calls: [],
    install: (names, dryRun) => {
      b.calls.push({ op: 'install', names: [...names], dryRun })
      const r = result()
      if (r.success && !dryRun) for (const n of names) b.installed.push({ name: n, version: '1.0.0' })
      return r
    },
    remove: (names, dryRun) => {
      b.calls.push({ op: 'remove', names: [...names], dryRun })
      const r = result()
      if (r.success && !dryRun) b.installed = b.installed.filter(p => !names.includes(p.name))
      return r
    },
    listInstalled: () => [...b.installed],
    getDetails: (name) => {
      const p = b.installed.find(r => r.name === name)
      return p ? { name: p.name, version: p.version, requires: [], binaries: [] } : undefined
    },
    update: (names, dryRun) => {
      b.calls.push({ op: 'update', names: names ? [...names] : undefined, dryRun })
      return result()
    },
    isAvailable: () => b.available,
  }
  return b
}

export const BACKEND_IDS = ['brew', 'cask', 'mas', 'winget', 'conda', 'python', 'rust', 'bun'] as const

export type FakeBackends = Record<(typeof BACKEND_IDS)[number], FakeBackend>

/**
 * Every default backend id as a fake, wired into a registry with the default categories.
 */
export function fakeRegistry(init: Partial<Record<(typeof BACKEND_IDS)[number], FakeBackendInit>> = {}): { registry: Registry; backends: FakeBackends } {
  const backends: FakeBackends = {
    brew: fakeBackend('brew', init.brew),
    cask: fakeBackend('cask', init.cask),
    mas: fakeBackend('mas', init.mas),
    winget: fakeBackend('winget', { nameMatching: 'loose', ...init.winget }),
    conda: fakeBackend('conda', init.conda),
    python: fakeBackend('python', init.python),
    rust: fakeBackend('rust', init.rust),
    bun: fakeBackend('bun', init.bun),
  }
  return { registry: createRegistry({ backends: Object.values(backends) }), backends }
}

export interface SpawnCall {
  file: string
  args: string[]
  opts: SpawnOptions
}

/**
 * Records every spawn; `respond` decides the outcome (default: exit 0, no output).
 */
export function fakeSpawn(respond: (call: SpawnCall) => Partial<SpawnResult> = () => ({})) {
  const calls: SpawnCall[] = []
  const spawn = (file: string, args: string[], opts: SpawnOptions): SpawnResult => {
    const call = { file, args, opts }
    calls.push(call)
    return { status: 0, stdout: '', ...respond(call) }
  }
  return { spawn, calls }
}

export interface MemoryLogger extends Logger {
  lines: string[]
}

export function memoryLogger(): MemoryLogger {
  const lines: string[] = []
  return {
    lines,
    info: (msg) => { lines.push(`info: ${msg}`) },
    warn: (msg) => { lines.push(`warn: ${msg}`) },
    error: (msg) => { lines.push(`error: ${msg}`) },
  }
}

/**
 * Custom manager whose `check` scripts succeed only for the listed scripts.
 */
export function fakeCustom(passingChecks: string[] = []): { custom: CustomManager; calls: SpawnCall[] } {
  const { spawn, calls } = fakeSpawn(call => {
    const script = call.args[2] ?? ''
    if (call.opts.stdio === 'ignore') return { status: passingChecks.includes(script) ? 0 : 1 }
    return { status: 0 }
  })
  const shell = new Shell({ spawn, shellPath: '/bin/sh', env: {} })
  return { custom: new CustomManager(shell), calls }
}
