import pico from 'picocolors'

import type { CategoryPanels, PackageRow } from '../api/list.js'
import type { PackageInfo } from '../api/show.js'
import type { StatusCategory } from '../api/status.js'
import { CUSTOM_ID } from '../backends/custom.js'
import type { BackendColor } from '../backends/types.js'

export type Colors = ReturnType<typeof pico.createColors>

function paint(c: Colors, color: BackendColor, text: string): string {
  return c[color](text)
}

function categoryHeader(c: Colors, title: string): string {
  return c.bold(c.cyan(`━━━ ${title} ━━━`))
}

function renderRow(c: Colors, row: PackageRow): string {
  switch (row.state) {
    case 'installed':
      return `  ${c.green(`✓ ${row.label}`)}`
    case 'missing':
      return `  ${c.red(`✗ ${row.label}`)}`
    case 'untracked':
      return `  ${c.dim(`· ${row.label}`)}`
  }
}

export function renderList(
  categories: CategoryPanels[],
  opts: { manifestPath?: string; verbose: boolean },
  c: Colors = pico,
): string[] {
  const out: string[] = []
  if (opts.manifestPath) out.push(`${c.dim('Manifest:')} ${opts.manifestPath}`)
  if (!opts.verbose) out.push(c.dim('Showing tracked packages only. Use -v for all.'))
  out.push(`${c.dim('Legend:')} ${c.green('installed')} ${c.red('missing')}${opts.verbose ? ` ${c.dim('untracked')}` : ''}`)

  for (const cat of categories) {
    out.push('', categoryHeader(c, cat.title))
    for (const panel of cat.panels) {
      out.push(`${paint(c, panel.color, panel.backend)} ${c.dim(`(${panel.declared})`)}`)
      if (!panel.available) {
        out.push(`  ${c.dim('not available')}`)
        continue
      }
      for (const row of panel.rows) out.push(renderRow(c, row))
    }
  }
  return out
}

export function renderStatus(
  categories: StatusCategory[],
  opts: { manifestPath?: string; shell: string; platform: string },
  c: Colors = pico,
): string[] {
  const out: string[] = [c.bold('Package Manager Status'), '']
  if (opts.manifestPath) out.push(`${c.dim('Manifest:')} ${opts.manifestPath}`)
  out.push(`${c.dim('Shell:')} ${opts.shell}`)
  out.push(`${c.dim('Platform:')} ${opts.platform}`)

  for (const cat of categories) {
    out.push('', categoryHeader(c, cat.title))
    for (const row of cat.rows) {
      const mark = row.available ? c.green('✓') : c.red('✗')
      const count = row.packages > 0 ? String(row.packages) : c.dim('0')
      out.push(`  ${mark} ${paint(c, row.color, row.backend.padEnd(8))} ${row.tool.padEnd(12)} ${count}`)
    }
  }
  return out
}

export function renderShow(info: PackageInfo, c: Colors = pico): string[] {
  const d = info.details
  const version = info.type === CUSTOM_ID ? `(${d.version})` : `v${d.version}`
  const field = (label: string, value: string) => `${c.cyan(label.padEnd(10))}  ${value}`

  const out: string[] = [
    `${c.bold(d.name)} ${c.dim(version)}`,
    field('Version', d.version),
    field('Type', paint(c, info.color, info.type)),
    field('Tracked', info.tracked ? c.green('✓ yes') : c.dim('no')),
  ]
  if (d.summary) out.push(field('Summary', d.summary))
  if (d.homepage) out.push(field('Homepage', d.homepage))
  if (d.license) out.push(field('License', d.license))
  if (d.location) out.push(field('Location', d.location))
  if (d.requires.length) out.push(field('Requires', d.requires.join(', ')))
  if (d.binaries.length) out.push(field('Binaries', d.binaries.join(', ')))
  return out
}
