import { gateIsActive } from '../core/platform.js'
import type { PlatformGate, PlatformInfo } from '../core/platform.js'
import type { Shell } from '../core/shell.js'
import { ConfigError } from '../errors.js'
import type { Logger } from '../types.js'
import { createBrewBackend, createCaskBackend } from './brew.js'
import { createBunBackend } from './bun.js'
import { createCondaBackend } from './conda.js'
import { CUSTOM_ID } from './custom.js'
import { createMasBackend } from './mas.js'
import { createPythonBackend } from './python.js'
import { createRustBackend } from './rust.js'
import type { Backend } from './types.js'
import { createWingetBackend } from './winget.js'

export interface Category {
  readonly id: string
  readonly title: string
  readonly backends: readonly string[]
  /**
   * `undefined`: always active; `wsl`: active under WSL; otherwise an exact OS tag.
   */
  readonly platform?: PlatformGate
}

export interface Registry {
  readonly backends: ReadonlyMap<string, Backend>
  /**
   * Preferred processing order: system-level managers before language-level ones.
   */
  readonly order: readonly string[]
  readonly categories: readonly Category[]
}

export const DEFAULT_CATEGORIES: readonly Category[] = Object.freeze([
  { id: 'mac', title: 'macOS', backends: ['brew', 'cask', 'mas'], platform: 'darwin' },
  { id: 'wsl', title: 'WSL', backends: ['winget'], platform: 'wsl' },
  { id: 'general', title: 'General', backends: ['conda', 'python', 'rust', 'bun'] },
  { id: 'custom', title: 'Custom', backends: [CUSTOM_ID] },
])

export const DEFAULT_ORDER: readonly string[] = Object.freeze([
  'brew', 'cask', 'mas', 'winget', 'conda', 'python', 'rust', 'bun', CUSTOM_ID,
])

export interface CreateRegistryInput {
  backends: Backend[]
  categories?: readonly Category[]
  order?: readonly string[]
}

export function createRegistry(input: CreateRegistryInput): Registry {
  const categories = input.categories ?? DEFAULT_CATEGORIES
  const seen = new Set<string>()
  for (const cat of categories) {
    for (const id of cat.backends) {
      if (seen.has(id)) throw new Error(`Backend "${id}" belongs to more than one category`)
      seen.add(id)
    }
  }

  const backends = new Map<string, Backend>()
  for (const b of input.backends) {
    if (backends.has(b.id)) throw new Error(`Duplicate backend id: ${b.id}`)
    backends.set(b.id, b)
  }

  return Object.freeze({
    backends,
    order: Object.freeze([...(input.order ?? DEFAULT_ORDER)]),
    categories: Object.freeze(categories.map(c => Object.freeze({ ...c, backends: Object.freeze([...c.backends]) }))),
  })
}

export function createDefaultRegistry(shell: Shell, logger?: Logger): Registry {
  return createRegistry({
    backends: [
      createBrewBackend(shell),
      createCaskBackend(shell),
      createMasBackend(shell, logger),
      createWingetBackend(shell),
      createCondaBackend(shell),
      createPythonBackend(shell),
      createRustBackend(shell, logger),
      createBunBackend(shell),
    ],
  })
}

export function categoryFor(registry: Registry, id: string): Category | undefined {
  return registry.categories.find(c => c.backends.includes(id))
}

export function activeCategories(registry: Registry, platform: PlatformInfo): Category[] {
  return registry.categories.filter(c => gateIsActive(c.platform, platform))
}

export function isBackendActive(registry: Registry, id: string, platform: PlatformInfo): boolean {
  const cat = categoryFor(registry, id)
  return cat !== undefined && gateIsActive(cat.platform, platform)
}

/**
 * Stable-sort ids into preferred order; unknown ids keep their relative order at the end.
 */
export function reorder(registry: Registry, ids: readonly string[]): string[] {
  const wanted = new Set(ids)
  const ordered = registry.order.filter(id => wanted.has(id))
  const known = new Set(ordered)
  const rest: string[] = []
  for (const id of ids) {
    if (!known.has(id)) {
      rest.push(id)
      known.add(id)
    }
  }
  return [...ordered, ...rest]
}

export function requireBackend(registry: Registry, id: string): Backend {
  const backend = registry.backends.get(id)
  if (!backend) {
    const valid = [...registry.backends.keys()].join(', ')
    throw new ConfigError(`Unknown package type '${id}'\nValid types: ${valid}`)
  }
  return backend
}

export function requireAvailable(registry: Registry, id: string): Backend {
  const backend = requireBackend(registry, id)
  if (!backend.isAvailable()) {
    throw new ConfigError(`Required tool '${backend.tool}' not found in PATH`)
  }
  return backend
}

/**
 * Run the backend's own installer for this platform (`darwin`, otherwise `linux`, then `all`).
 */
export function selfInstallCommand(backend: Backend, platform: PlatformInfo): readonly string[] | undefined {
  const key = platform.os === 'darwin' ? 'darwin' : 'linux'
  return backend.selfInstall[key] ?? backend.selfInstall.all
}
