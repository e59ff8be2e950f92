#!/usr/bin/env node
import fs from 'fs-extra'
import path from 'path'
import pico from 'picocolors'
import { fileURLToPath } from 'url'

import { bootstrap } from './api/bootstrap.js'
import { install } from './api/install.js'
import { list } from './api/list.js'
import { remove } from './api/remove.js'
import type { ApiOptions } from './api/runtime.js'
import { show } from './api/show.js'
import { status } from './api/status.js'
import { sync } from './api/sync.js'
import { update } from './api/update.js'
import { getEditor, resolveManifestPath } from './cli/config.js'
import { openInEditor } from './cli/editor.js'
import { renderList, renderShow, renderStatus } from './cli/render.js'
import { Shell } from './core/shell.js'
import { ConfigError } from './errors.js'
import type { Logger, Result } from './types.js'

type Argv = string[]

class CliExit extends Error {
  exitCode: number
  constructor(message: string, exitCode = 1) {
    super(message)
    this.exitCode = exitCode
  }
}

function die(msg: string, code = 2): never {
  throw new CliExit(msg, code)
}

function popFlagValue(args: Argv, names: string[]): string | undefined {
  for (let i = 0; i < args.length; i++) {
    const a = args[i]
    if (!names.includes(a)) continue
    const v = args[i + 1]
    if (!v || v.startsWith('-')) die(`${a} requires a value`)
    args.splice(i, 2)
    return v
  }
  return undefined
}

function hasFlag(args: Argv, names: string[]): boolean {
  const idx = args.findIndex(a => names.includes(a))
  if (idx >= 0) {
    args.splice(idx, 1)
    return true
  }
  return false
}

function splitList(v: string | undefined): string[] | undefined {
  if (v === undefined) return undefined
  const items = v.split(',').map(s => s.trim()).filter(Boolean)
  return items.length ? items : undefined
}

function noExtraArgs(args: Argv): void {
  if (args.length) die(`Unknown arguments: ${args.join(' ')}`)
}

function write(line: string, stream: NodeJS.WriteStream = process.stdout): void {
  stream.write(line.endsWith('\n') ? line : line + '\n')
}

function consoleLogger(json: boolean): Logger {
  // --json keeps stdout for the Result.
  const out = json ? process.stderr : process.stdout
  return {
    info: (msg) => write(msg, out),
    warn: (msg) => write(pico.yellow(msg), out),
    error: (msg) => write(pico.red(msg), process.stderr),
  }
}

interface CliOptions extends ApiOptions {
  json: boolean
}

function parseCommonOptions(args: Argv): CliOptions {
  const json = hasFlag(args, ['--json'])
  const dryRun = hasFlag(args, ['-n', '--dry-run'])
  const includePlanText = hasFlag(args, ['--plan'])
  const auditLogPath = popFlagValue(args, ['--audit-log'])
  const specsPath = popFlagValue(args, ['--specs'])
  return { json, dryRun, includePlanText, auditLogPath, specsPath, logger: consoleLogger(json) }
}

function packageVersion(): string {
  const here = path.dirname(fileURLToPath(import.meta.url))
  for (const p of [path.resolve(here, '..', 'package.json'), path.resolve(here, '..', '..', 'package.json')]) {
    if (!fs.pathExistsSync(p)) continue
    const pkg: unknown = fs.readJsonSync(p)
    if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') return pkg.version
  }
  return '0.0.0'
}

function printHelp(): void {
  const msg = `
pkgsync

Usage:
  pkgsync init|sync [-t <types>] [-n]
  pkgsync install <type> <name> [-n]
  pkgsync remove <name> [-t <type>] [-k] [-n]
  pkgsync update [name] [-t <type>] [-n]
  pkgsync list [-v] [-t <types>]
  pkgsync status
  pkgsync bootstrap [type] [-n]
  pkgsync show <name> [-t <type>]
  pkgsync edit

Options:
  -m, --manifest <path>   Manifest file (default: $PKGSYNC_MANIFEST or ~/.config/packages.yaml)
  --specs <path>          Custom package catalog (default: $PKGSYNC_SPECS or bundled specs.yaml)
  -n, --dry-run           Print commands instead of running them; never write the manifest
  --json                  Print the operation result as JSON
  --plan                  Print a summary of the steps taken
  --audit-log <path>      Append one JSON line per operation
  -h, --help              Show this help
  --version               Show the version
`
  process.stdout.write(msg.trimStart())
}

function report(res: Result, opts: CliOptions): number {
  if (opts.json) {
    write(JSON.stringify(res, null, 2))
  } else if (res.planText) {
    write(res.planText)
  }
  return res.ok ? 0 : 1
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  try {
    const args = [...argv]
    if (hasFlag(args, ['--version'])) {
      write(packageVersion())
      return 0
    }
    if (args.length === 0 || hasFlag(args, ['-h', '--help'])) {
      printHelp()
      return 0
    }

    const cmd = args.shift()
    const opts = parseCommonOptions(args)
    const manifestPath = resolveManifestPath(popFlagValue(args, ['-m', '--manifest']))

    if (cmd === 'init' || cmd === 'sync') {
      const types = splitList(popFlagValue(args, ['-t', '--types', '--type']))
      noExtraArgs(args)
      const { result } = await sync(manifestPath, { ...opts, types })
      return report(result, opts)
    }

    if (cmd === 'install') {
      const [type, name, ...rest] = args
      if (!type || !name) die('install requires <type> <name>')
      noExtraArgs(rest)
      const { result } = await install(manifestPath, type, name, opts)
      return report(result, opts)
    }

    if (cmd === 'remove') {
      const type = popFlagValue(args, ['-t', '--type'])
      const keep = hasFlag(args, ['-k', '--keep'])
      const name = args.shift()
      if (!name) die('remove requires <name>')
      noExtraArgs(args)
      const { result } = await remove(manifestPath, name, { ...opts, type, keep })
      return report(result, opts)
    }

    if (cmd === 'update') {
      const type = popFlagValue(args, ['-t', '--type'])
      const name = args.shift()
      noExtraArgs(args)
      const { result } = await update(manifestPath, name, { ...opts, type })
      return report(result, opts)
    }

    if (cmd === 'list') {
      const verbose = hasFlag(args, ['-v', '--verbose'])
      const types = splitList(popFlagValue(args, ['-t', '--types', '--type']))
      noExtraArgs(args)
      const { result, categories } = await list(manifestPath, { ...opts, verbose, types, logger: undefined })
      if (!opts.json) for (const line of renderList(categories, { manifestPath: result.manifestPath, verbose })) write(line)
      return report(result, opts)
    }

    if (cmd === 'status') {
      noExtraArgs(args)
      const shell = new Shell()
      const { result, categories } = await status(manifestPath, { ...opts, shell, logger: undefined })
      if (!opts.json) {
        const lines = renderStatus(categories, { manifestPath: result.manifestPath, shell: shell.path, platform: process.platform })
        for (const line of lines) write(line)
      }
      return report(result, opts)
    }

    if (cmd === 'bootstrap') {
      const name = args.shift()
      noExtraArgs(args)
      const { result } = await bootstrap(name, opts)
      return report(result, opts)
    }

    if (cmd === 'show') {
      const type = popFlagValue(args, ['-t', '--type'])
      const name = args.shift()
      if (!name) die('show requires <name>')
      noExtraArgs(args)
      const { result, info } = await show(manifestPath, name, { ...opts, type, logger: undefined })
      if (!opts.json) for (const line of renderShow(info)) write(line)
      return report(result, opts)
    }

    if (cmd === 'edit') {
      noExtraArgs(args)
      if (!await fs.pathExists(manifestPath)) throw new ConfigError(`Manifest file not found: ${manifestPath}`)
      const editor = getEditor()
      write(`${pico.dim('Opening:')} ${manifestPath}`)
      openInEditor(editor, manifestPath)
      return 0
    }

    die(`Unknown command: ${cmd ?? ''}`)
  } catch (e) {
    if (e instanceof CliExit || e instanceof ConfigError) {
      const msg = e.message || 'Command failed'
      write(`${pico.red('Error:')} ${msg}`, process.stderr)
      return e.exitCode
    }
    throw e
  }
}

// Only run when executed as a script, not when imported (e.g., tests).
const isEntry =
  process.argv[1] &&
  path.resolve(process.argv[1]) === path.resolve(fileURLToPath(import.meta.url))

if (isEntry) {
  main().then(
    (code) => process.exit(code),
    (err: unknown) => {
      const msg = err instanceof Error && err.stack ? err.stack : String(err)
      process.stderr.write(msg.endsWith('\n') ? msg : msg + '\n')
      process.exit(1)
    },
  )
}
