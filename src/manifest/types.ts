import fs from 'fs-extra'
import * as yaml from 'js-yaml'
import path from 'path'

import { CUSTOM_ID } from '../backends/custom.js'
import { ConfigError } from '../errors.js'

/**
 * Structured entry form, used to restrict a package to some platforms.
 * Both `platform` and `platforms` are accepted; either may hold one tag or a list.
 */
export interface StructuredEntry {
  name: string
  platform?: string | string[] | null
  platforms?: string | string[] | null
  [k: string]: unknown
}

/**
 * Kept exactly as read; a bare number (a store ID) stays a number until it is decoded.
 */
export type RawEntry = string | number | StructuredEntry

/**
 * backend id -> ordered entries. A key with no value reads as empty.
 */
export type CategorySection = Record<string, RawEntry[] | null>

/**
 * category id -> section, plus the top-level `custom` list.
 * Key order is insertion order and is what serialization writes. Sections a command
 * does not touch are written back as they were loaded, nulls included.
 */
export interface ManifestDocument {
  custom?: RawEntry[] | null
  [category: string]: CategorySection | RawEntry[] | null | undefined
}

/**
 * A manifest entry decoded once at parse time. `override` comes from `name:backend`.
 */
export interface DeclaredPackage {
  name: string
  override?: string
  platforms?: string | string[]
}

/**
 * Split `name:backend` on the first colon. No colon: no override.
 */
export function parsePackageEntry(entry: string): { name: string; override?: string } {
  const idx = entry.indexOf(':')
  if (idx < 0) return { name: entry }
  return { name: entry.slice(0, idx), override: entry.slice(idx + 1) }
}

export function entryName(entry: RawEntry): string {
  if (typeof entry === 'string') return entry
  if (typeof entry === 'number') return String(entry)
  return entry.name
}

export function entryPlatforms(entry: RawEntry): string | string[] | undefined {
  if (typeof entry !== 'object') return undefined
  return entry.platforms ?? entry.platform ?? undefined
}

/**
 * Decode an entry. Custom entries never carry an override.
 */
export function decodeEntry(entry: RawEntry, section: string): DeclaredPackage {
  const raw = entryName(entry)
  const platforms = entryPlatforms(entry)
  const { name, override } = section === CUSTOM_ID ? { name: raw, override: undefined } : parsePackageEntry(raw)
  const out: DeclaredPackage = { name }
  if (override) out.override = override
  if (platforms !== undefined) out.platforms = platforms
  return out
}

export function getCategorySection(doc: ManifestDocument, categoryId: string): CategorySection | undefined {
  const section = doc[categoryId]
  if (section === undefined || section === null || Array.isArray(section)) return undefined
  return section
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v)
}

function isPlatformTags(v: unknown): boolean {
  return v === undefined || v === null || typeof v === 'string' || (Array.isArray(v) && v.every(t => typeof t === 'string'))
}

function checkEntry(entry: unknown, where: string): RawEntry {
  if (typeof entry === 'string' || typeof entry === 'number') return entry
  if (isRecord(entry) && typeof entry.name === 'string') {
    if (!isPlatformTags(entry.platform) || !isPlatformTags(entry.platforms)) {
      throw new ConfigError(`Invalid manifest: "${where}" platform must be a tag or a list of tags`)
    }
    return { ...entry, name: entry.name }
  }
  throw new ConfigError(`Invalid manifest: "${where}" must be a string or an object with a "name"`)
}

function checkEntries(raw: unknown, where: string): RawEntry[] | null {
  if (raw === null || raw === undefined) return null
  if (!Array.isArray(raw)) throw new ConfigError(`Invalid manifest: "${where}" must be a list`)
  return raw.map((entry, i) => checkEntry(entry, `${where}[${i}]`))
}

/**
 * Validate a parsed YAML value without rewriting it. Empty or null top level is an
 * empty document; null sections stay null and read as empty.
 */
export function normalizeManifest(raw: unknown): ManifestDocument {
  if (raw === null || raw === undefined) return {}
  if (!isRecord(raw)) throw new ConfigError('Invalid manifest: top level must be a mapping')

  const doc: ManifestDocument = {}
  for (const [key, value] of Object.entries(raw)) {
    if (key === CUSTOM_ID) {
      doc.custom = checkEntries(value, key)
      continue
    }
    if (value === null || value === undefined) {
      doc[key] = null
      continue
    }
    if (!isRecord(value)) throw new ConfigError(`Invalid manifest: "${key}" must be a mapping of package types`)
    const section: CategorySection = {}
    for (const [backend, list] of Object.entries(value)) {
      section[backend] = checkEntries(list, `${key}.${backend}`)
    }
    doc[key] = section
  }
  return doc
}

export function parseManifestText(text: string): ManifestDocument {
  let parsed: unknown
  try {
    parsed = yaml.load(text)
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e)
    throw new ConfigError(`Invalid manifest YAML: ${msg}`)
  }
  return normalizeManifest(parsed)
}

/**
 * The manifest must be an existing regular file; its content may be empty.
 */
export async function loadManifest(manifestPath: string): Promise<ManifestDocument> {
  const abs = path.resolve(manifestPath)
  if (!await fs.pathExists(abs) || !(await fs.stat(abs)).isFile()) {
    throw new ConfigError(`Manifest file not found: ${abs}`)
  }
  return parseManifestText(await fs.readFile(abs, 'utf8'))
}
