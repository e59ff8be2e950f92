import fs from 'fs-extra'
import * as yaml from 'js-yaml'
import path from 'path'
import { fileURLToPath } from 'url'

import { errorMessage } from '../errors.js'
import type { Logger } from '../types.js'

/**
 * Script-based package definition. `depends` is advisory and only displayed.
 */
export interface CustomPackageSpec {
  name: string
  install: string
  check?: string
  remove?: string
  shell?: string
  depends: string[]
  description?: string
}

/**
 * Catalog as written on disk: a bare install command, or the object form.
 */
export type RawSpec = string | {
  install?: unknown
  check?: unknown
  remove?: unknown
  shell?: unknown
  depends?: unknown
  description?: unknown
}

export type SpecCatalog = Record<string, RawSpec>

function optionalString(v: unknown): string | undefined {
  return typeof v === 'string' && v ? v : undefined
}

export function parseSpec(name: string, raw: RawSpec): CustomPackageSpec {
  if (typeof raw === 'string') return { name, install: raw, depends: [] }
  const depends = Array.isArray(raw.depends)
    ? raw.depends.filter((d): d is string => typeof d === 'string')
    : []
  return {
    name,
    install: optionalString(raw.install) ?? '',
    check: optionalString(raw.check),
    remove: optionalString(raw.remove),
    shell: optionalString(raw.shell),
    depends,
    description: optionalString(raw.description),
  }
}

function isRawSpec(v: unknown): v is RawSpec {
  return typeof v === 'string' || (typeof v === 'object' && v !== null && !Array.isArray(v))
}

/**
 * The catalog shipped with the package, found beside `src/` (or `dist/src/` once built).
 */
export function bundledSpecsPath(): string {
  const here = path.dirname(fileURLToPath(import.meta.url))
  const candidates = [
    path.resolve(here, '..', '..', 'specs.yaml'),
    path.resolve(here, '..', '..', '..', 'specs.yaml'),
  ]
  return candidates.find(p => fs.pathExistsSync(p)) ?? candidates[0]
}

export interface LoadSpecsOptions {
  specsPath?: string
  env?: NodeJS.ProcessEnv
  logger?: Logger
}

export function resolveSpecsPath(opts: LoadSpecsOptions = {}): string {
  const env = opts.env ?? process.env
  return opts.specsPath ?? env.PKGSYNC_SPECS ?? bundledSpecsPath()
}

/**
 * Loaded fresh per command. A missing source is an empty catalog; an unreadable one
 * is an empty catalog plus a warning.
 */
export async function loadSpecs(opts: LoadSpecsOptions = {}): Promise<SpecCatalog> {
  const file = resolveSpecsPath(opts)
  if (!await fs.pathExists(file)) return {}
  try {
    const parsed: unknown = yaml.load(await fs.readFile(file, 'utf8'))
    if (parsed === null || parsed === undefined) return {}
    if (typeof parsed !== 'object' || Array.isArray(parsed)) {
      opts.logger?.warn(`Ignoring spec catalog ${file}: expected a mapping`)
      return {}
    }
    const catalog: SpecCatalog = {}
    for (const [name, raw] of Object.entries(parsed)) {
      if (isRawSpec(raw)) catalog[name] = raw
    }
    return catalog
  } catch (e) {
    opts.logger?.warn(`Ignoring spec catalog ${file}: ${errorMessage(e)}`)
    return {}
  }
}
