import fs from 'fs-extra'
import * as yaml from 'js-yaml'
import path from 'path'

import { CUSTOM_ID } from '../backends/custom.js'
import { categoryFor } from '../backends/registry.js'
import type { Registry } from '../backends/registry.js'
import { entryName, getCategorySection, parsePackageEntry } from './types.js'
import type { CategorySection, ManifestDocument, RawEntry } from './types.js'

/**
 * Block style, insertion order, no key sorting; lists sit at their key's indentation.
 * A null section is written as a bare key, the way it is usually typed.
 */
export function serializeManifest(doc: ManifestDocument): string {
  return yaml.dump(doc, {
    indent: 2,
    noArrayIndent: true,
    sortKeys: false,
    lineWidth: -1,
    styles: { '!!null': 'empty' },
  })
}

/**
 * Writes every category, active on this machine or not.
 */
export async function saveManifest(manifestPath: string, doc: ManifestDocument): Promise<void> {
  const abs = path.resolve(manifestPath)
  await fs.ensureDir(path.dirname(abs))
  const content = serializeManifest(doc)
  const tmp = `${abs}.tmp.${Date.now()}.${Math.random().toString(16).slice(2)}`
  try {
    await fs.writeFile(tmp, content, 'utf8')
    await fs.rename(tmp, abs)
  } catch (e) {
    await fs.remove(tmp)
    throw e
  }
}

export interface EntryChangeResult {
  changed: boolean
  /**
   * Category the entry lives in, when the section maps to one.
   */
  category?: string
}

function ensureCategorySection(doc: ManifestDocument, categoryId: string): CategorySection {
  const existing = getCategorySection(doc, categoryId)
  if (existing) return existing
  const created: CategorySection = {}
  doc[categoryId] = created
  return created
}

/**
 * Append `name` to its section unless an entry with that name is already there.
 * Standard sections compare by parsed name, so `tmux` is present when `tmux:brew` is.
 */
export function addEntry(doc: ManifestDocument, registry: Registry, section: string, name: string): EntryChangeResult {
  const cat = categoryFor(registry, section)
  if (!cat) return { changed: false }

  if (section === CUSTOM_ID) {
    const list = doc.custom ?? []
    if (list.some(e => entryName(e) === name)) return { changed: false, category: cat.id }
    doc.custom = [...list, name]
    return { changed: true, category: cat.id }
  }

  const catSection = ensureCategorySection(doc, cat.id)
  const list = catSection[section] ?? (catSection[section] = [])
  if (list.some(e => parsePackageEntry(entryName(e)).name === name)) return { changed: false, category: cat.id }
  list.push(name)
  return { changed: true, category: cat.id }
}

/**
 * Standard sections: delete the first entry whose parsed name matches; an emptied backend
 * key is deleted, the category is kept. Custom: delete entries with that exact name; an
 * emptied custom list is deleted.
 */
export function removeEntry(doc: ManifestDocument, registry: Registry, section: string, name: string): EntryChangeResult {
  const cat = categoryFor(registry, section)
  if (!cat) return { changed: false }

  if (section === CUSTOM_ID) {
    const list = doc.custom
    if (!list) return { changed: false, category: cat.id }
    const kept = list.filter(e => entryName(e) !== name)
    if (kept.length === list.length) return { changed: false, category: cat.id }
    if (kept.length) doc.custom = kept
    else delete doc.custom
    return { changed: true, category: cat.id }
  }

  const catSection = getCategorySection(doc, cat.id)
  const list: RawEntry[] | null | undefined = catSection?.[section]
  if (!catSection || !list) return { changed: false, category: cat.id }

  const idx = list.findIndex(e => parsePackageEntry(entryName(e)).name === name)
  if (idx < 0) return { changed: false, category: cat.id }
  list.splice(idx, 1)
  if (!list.length) delete catSection[section]
  return { changed: true, category: cat.id }
}
