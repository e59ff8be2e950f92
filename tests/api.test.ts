import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import fs from 'fs-extra'
import os from 'node:os'
import path from 'node:path'

import { bootstrap } from '../src/api/bootstrap.js'
import { install } from '../src/api/install.js'
import { list } from '../src/api/list.js'
import { remove } from '../src/api/remove.js'
import { show } from '../src/api/show.js'
import { status } from '../src/api/status.js'
import { sync } from '../src/api/sync.js'
import { update } from '../src/api/update.js'
import { Shell } from '../src/core/shell.js'
import { ConfigError } from '../src/errors.js'
import type { SpecCatalog } from '../src/manifest/specs.js'
import { LINUX, MAC, fakeCustom, fakeRegistry, fakeSpawn, memoryLogger } from './helpers.js'

const SPECS: SpecCatalog = {
  fisher: { install: 'curl -sL fisher.invalid | source', check: 'type -q fisher', shell: 'fish', remove: 'fisher remove fisher' },
  tpm: { install: 'git clone tpm', check: 'test -d tpm', depends: ['tmux'] },
  starship: 'curl -sS starship.invalid | sh',
}

// A store ID, a bare key and an override entry, in the layout the manifest is written in.
const MIXED = [
  'mac:',
  '  mas:',
  '  - 497799835',
  '  brew:',
  '  - tmux',
  'wsl:',
  'general:',
  '  conda:',
  '  - numpy',
  '  - node:brew',
]

describe('api', () => {
  let tmp: string
  let manifestPath: string

  beforeEach(async () => {
    tmp = await fs.mkdtemp(path.join(os.tmpdir(), 'pkgsync-api-'))
    manifestPath = path.join(tmp, 'packages.yaml')
  })

  afterEach(async () => {
    await fs.remove(tmp)
  })

  async function writeManifest(lines: string[]): Promise<string> {
    const text = lines.join('\n') + '\n'
    await fs.writeFile(manifestPath, text, 'utf8')
    return text
  }

  async function readLines(): Promise<string[]> {
    return (await fs.readFile(manifestPath, 'utf8')).split('\n').map(l => l.trimEnd())
  }

  function setup(init: Parameters<typeof fakeRegistry>[0] = {}, passingChecks: string[] = []) {
    const { registry, backends } = fakeRegistry(init)
    const { custom, calls: customCalls } = fakeCustom(passingChecks)
    const logger = memoryLogger()
    return { registry, backends, custom, customCalls, logger }
  }

  describe('sync', () => {
    it('installs through the override on macOS and leaves the manifest untouched', async () => {
      const text = await writeManifest(['general:', '  conda:', '  - numpy', '  - node:brew'])
      const { registry, backends, custom, logger } = setup()

      const { result, resolved, report } = await sync(manifestPath, { registry, custom, platform: MAC, logger })

      expect(resolved).toEqual({ brew: ['node'], conda: ['numpy'] })
      expect(backends.brew.calls).toEqual([{ op: 'install', names: ['node'], dryRun: false }])
      expect(backends.conda.calls).toEqual([{ op: 'install', names: ['numpy'], dryRun: false }])
      expect(report.state).toBe('all_ok')
      expect(result.ok).toBe(true)
      expect(result.changes).toEqual([
        { action: 'install', backend: 'brew', package: 'node' },
        { action: 'install', backend: 'conda', package: 'numpy' },
      ])
      expect(result.manifestPath).toBe(manifestPath)
      expect(await fs.readFile(manifestPath, 'utf8')).toBe(text)
      expect(logger.lines).toContain(`info: Manifest: ${manifestPath}`)
    })

    it('falls back to the declaring backend on Linux', async () => {
      await writeManifest(['general:', '  conda:', '  - numpy', '  - node:brew'])
      const { registry, backends, custom } = setup()

      const { resolved } = await sync(manifestPath, { registry, custom, platform: LINUX })

      expect(resolved).toEqual({ conda: ['numpy', 'node'] })
      expect(backends.conda.calls[0].names).toEqual(['numpy', 'node'])
      expect(backends.brew.calls).toEqual([])
    })

    it('dry run reaches the backends as a dry run', async () => {
      const { registry, backends, custom, logger } = setup()
      const { result } = await sync({ general: { rust: ['ripgrep'] } }, { registry, custom, platform: LINUX, dryRun: true, logger })

      expect(backends.rust.calls).toEqual([{ op: 'install', names: ['ripgrep'], dryRun: true }])
      expect(result.dryRun).toBe(true)
      expect(result.steps[0].status).toBe('skipped')
      expect(logger.lines[0]).toBe('warn: DRY RUN - No changes will be made')
    })

    it('reports a missing custom spec and still installs the rest', async () => {
      const { registry, backends, custom } = setup()
      const { result } = await sync(
        { general: { bun: ['prettier'] }, custom: ['unknown-tool', 'starship'] },
        { registry, custom, platform: LINUX, specs: SPECS },
      )

      expect(result.ok).toBe(false)
      expect(result.errors).toEqual(["No spec found for 'unknown-tool'"])
      expect(backends.bun.installed.map(p => p.name)).toEqual(['prettier'])
      expect(result.changes).toContainEqual({ action: 'install', backend: 'custom', package: 'starship' })
    })

    it('marks an unavailable backend and carries on', async () => {
      const { registry, backends, custom } = setup({ python: { available: false } })
      const { result } = await sync({ general: { python: ['ruff'], rust: ['bat'] } }, { registry, custom, platform: LINUX })

      expect(result.ok).toBe(false)
      expect(result.steps[0]).toMatchObject({ backend: 'python', outcome: 'skipped_unavailable', status: 'failed' })
      expect(result.steps[1]).toMatchObject({ backend: 'rust', outcome: 'applied_ok', status: 'executed' })
      expect(backends.rust.installed.map(p => p.name)).toEqual(['bat'])
    })

    it('restricts to the requested types and rejects unknown ones', async () => {
      const { registry, backends, custom } = setup()
      const doc = { general: { rust: ['bat'], bun: ['prettier'] } }

      await sync(doc, { registry, custom, platform: LINUX, types: ['bun'] })
      expect(backends.rust.calls).toEqual([])
      expect(backends.bun.calls).toHaveLength(1)

      await expect(sync(doc, { registry, custom, platform: LINUX, types: ['npm'] })).rejects.toThrow(ConfigError)
    })

    it('includes plan text and appends an audit line when asked', async () => {
      const { registry, custom } = setup({ rust: { installed: ['bat'] } })
      const auditLogPath = path.join(tmp, 'logs', 'audit.jsonl')

      const { result } = await sync({ general: { rust: ['bat'] } }, { registry, custom, platform: LINUX, includePlanText: true, auditLogPath })

      expect(result.planText).toBe('- install [rust: bat]: All 1 packages installed <already_satisfied>')
      const lines = (await fs.readFile(auditLogPath, 'utf8')).trim().split('\n')
      expect(lines).toHaveLength(1)
      expect(JSON.parse(lines[0])).toMatchObject({ operation: 'sync', ok: true })
      expect(result.steps[result.steps.length - 1]).toMatchObject({ kind: 'audit', status: 'executed' })
    })

    it('fails on a missing manifest file', async () => {
      const { registry, custom } = setup()
      await expect(sync(path.join(tmp, 'nope.yaml'), { registry, custom, platform: LINUX }))
        .rejects.toThrow(`Manifest file not found: ${path.join(tmp, 'nope.yaml')}`)
    })
  })

  describe('install', () => {
    it('installs and records the package in its category', async () => {
      await writeManifest(['general:', '  conda:', '  - numpy'])
      const { registry, backends, custom } = setup()

      const { result } = await install(manifestPath, 'rust', 'ripgrep', { registry, custom, platform: LINUX })

      expect(result.ok).toBe(true)
      expect(backends.rust.calls).toEqual([{ op: 'install', names: ['ripgrep'], dryRun: false }])
      expect(result.changes).toEqual([
        { action: 'install', backend: 'rust', package: 'ripgrep' },
        { action: 'manifest_add', backend: 'rust', package: 'ripgrep' },
      ])
      expect(await fs.readFile(manifestPath, 'utf8')).toBe([
        'general:',
        '  conda:',
        '  - numpy',
        '  rust:',
        '  - ripgrep',
        '',
      ].join('\n'))
    })

    it('does not record a package that is already declared', async () => {
      const text = await writeManifest(['general:', '  conda:', '  - numpy'])
      const { registry, custom } = setup()

      const { result } = await install(manifestPath, 'conda', 'numpy', { registry, custom, platform: LINUX })

      expect(result.ok).toBe(true)
      expect(result.steps.map(s => s.kind)).toEqual(['install'])
      expect(await fs.readFile(manifestPath, 'utf8')).toBe(text)
    })

    it('writes back sections it did not touch as they were, inactive ones included', async () => {
      await writeManifest(MIXED)
      const { registry, custom } = setup()

      const { result } = await install(manifestPath, 'rust', 'bat', { registry, custom, platform: LINUX })

      expect(result.ok).toBe(true)
      expect(await readLines()).toEqual([
        ...MIXED,
        '  rust:',
        '  - bat',
        '',
      ])
    })

    it('does not record a package that already resolves to the backend through an override', async () => {
      const text = await writeManifest(['general:', '  conda:', '  - tmux:brew'])
      const { registry, backends, custom } = setup()

      const { result } = await install(manifestPath, 'brew', 'tmux', { registry, custom, platform: MAC })

      expect(backends.brew.calls).toEqual([{ op: 'install', names: ['tmux'], dryRun: false }])
      expect(result.changes).toEqual([{ action: 'install', backend: 'brew', package: 'tmux' }])
      expect(await fs.readFile(manifestPath, 'utf8')).toBe(text)
    })

    it('dry run never writes the manifest', async () => {
      const text = await writeManifest(['general:', '  conda:', '  - numpy'])
      const { registry, backends, custom } = setup()

      await install(manifestPath, 'bun', 'prettier', { registry, custom, platform: LINUX, dryRun: true })

      expect(backends.bun.calls[0].dryRun).toBe(true)
      expect(await fs.readFile(manifestPath, 'utf8')).toBe(text)
    })

    it('does not record a failed install', async () => {
      const text = await writeManifest(['general:', '  conda:', '  - numpy'])
      const { registry, custom } = setup({ rust: { failWith: 'compile error' } })

      const { result } = await install(manifestPath, 'rust', 'bat', { registry, custom, platform: LINUX })

      expect(result.ok).toBe(false)
      expect(result.errors).toEqual(['rust: compile error'])
      expect(await fs.readFile(manifestPath, 'utf8')).toBe(text)
    })

    it('updates an in-memory document without touching disk', async () => {
      const { registry, custom } = setup()
      const doc = { general: { conda: ['numpy'] } }

      const { result, manifest } = await install(doc, 'conda', 'scipy', { registry, custom, platform: LINUX })

      expect(manifest).toEqual({ general: { conda: ['numpy', 'scipy'] } })
      expect(result.steps[result.steps.length - 1]).toMatchObject({ kind: 'write_manifest', status: 'skipped' })
      expect(await fs.readdir(tmp)).toEqual([])
    })

    it('runs a custom install script and records it', async () => {
      const { registry, custom, customCalls } = setup()

      const { manifest } = await install({}, 'custom', 'tpm', { registry, custom, platform: LINUX, specs: SPECS })

      expect(manifest).toEqual({ custom: ['tpm'] })
      expect(customCalls.find(c => c.opts.stdio === 'inherit')?.args).toEqual(['-l', '-c', 'git clone tpm'])
    })

    it('rejects unknown custom packages, unknown types and missing tools', async () => {
      const { registry, custom } = setup({ cask: { available: false } })
      const opts = { registry, custom, platform: MAC, specs: SPECS }

      await expect(install({}, 'custom', 'nope', opts))
        .rejects.toThrow("No spec found for custom package 'nope'.\nAvailable specs: fisher, tpm, starship")
      await expect(install({}, 'npm', 'left-pad', opts)).rejects.toThrow("Unknown package type 'npm'")
      await expect(install({}, 'cask', 'iterm2', opts)).rejects.toThrow("Required tool 'cask-tool' not found in PATH")
    })
  })

  describe('remove', () => {
    it('uninstalls through the resolved backend and prunes the declaring section', async () => {
      await writeManifest(['general:', '  conda:', '  - node:brew'])
      const { registry, backends, custom } = setup({ brew: { installed: ['node'] } })

      const { result, manifest } = await remove(manifestPath, 'node', { registry, custom, platform: MAC })

      expect(result.ok).toBe(true)
      expect(backends.brew.calls).toEqual([{ op: 'remove', names: ['node'], dryRun: false }])
      expect(manifest).toEqual({ general: {} })
      expect(await fs.readFile(manifestPath, 'utf8')).toBe('general: {}\n')
    })

    it('keeps override entries and inactive sections when a sibling entry goes', async () => {
      await writeManifest(MIXED)
      const { registry, backends, custom } = setup({ conda: { installed: ['numpy'] } })

      const { result } = await remove(manifestPath, 'numpy', { registry, custom, platform: LINUX })

      expect(result.ok).toBe(true)
      expect(backends.conda.calls).toEqual([{ op: 'remove', names: ['numpy'], dryRun: false }])
      expect(await readLines()).toEqual([
        'mac:',
        '  mas:',
        '  - 497799835',
        '  brew:',
        '  - tmux',
        'wsl:',
        'general:',
        '  conda:',
        '  - node:brew',
        '',
      ])
    })

    it('keeps the manifest entry with keep', async () => {
      const text = await writeManifest(['general:', '  rust:', '  - bat'])
      const { registry, backends, custom } = setup()

      const { result } = await remove(manifestPath, 'bat', { registry, custom, platform: LINUX, keep: true })

      expect(backends.rust.calls).toHaveLength(1)
      expect(result.steps.map(s => s.kind)).toEqual(['remove', 'noop'])
      expect(await fs.readFile(manifestPath, 'utf8')).toBe(text)
    })

    it('requires a type for packages the manifest does not declare', async () => {
      const { registry, custom } = setup()
      await expect(remove({}, 'bat', { registry, custom, platform: LINUX }))
        .rejects.toThrow("Package 'bat' not found in manifest.\nUse --type to specify the package type.")
    })

    it('warns when a custom package has no remove script', async () => {
      const { registry, custom, logger } = setup()
      const { result, manifest } = await remove({ custom: ['tpm', 'fisher'] }, 'tpm', { registry, custom, platform: LINUX, specs: SPECS, logger })

      expect(result.ok).toBe(true)
      expect(result.warnings).toEqual(['custom: manual action required'])
      expect(manifest).toEqual({ custom: ['fisher'] })
      expect(logger.lines).toContain("warn: No remove command defined for 'tpm'. The package may need to be removed manually.")
    })
  })

  describe('update', () => {
    it('updates one package in the backend it resolves to', async () => {
      const { registry, backends, custom } = setup()
      await update({ general: { conda: ['node:brew'] } }, 'node', { registry, custom, platform: MAC })
      expect(backends.brew.calls).toEqual([{ op: 'update', names: ['node'], dryRun: false }])
    })

    it('finds an undeclared package among installed ones', async () => {
      const { registry, backends, custom } = setup({ rust: { installed: ['bat'] } })
      await update({}, 'bat', { registry, custom, platform: LINUX })
      expect(backends.rust.calls).toEqual([{ op: 'update', names: ['bat'], dryRun: false }])
    })

    it('rejects unknown and custom packages', async () => {
      const { registry, custom } = setup()
      await expect(update({}, 'nope', { registry, custom, platform: LINUX })).rejects.toThrow("Package 'nope' not found.")
      await expect(update({ custom: ['tpm'] }, 'tpm', { registry, custom, platform: LINUX }))
        .rejects.toThrow("Custom package 'tpm' has no update command; reinstall it instead.")
    })

    it('updates every resolved backend, isolating unavailable ones', async () => {
      const { registry, backends, custom } = setup({ python: { available: false } })

      const { result } = await update(
        { general: { bun: ['prettier'], python: ['ruff'], conda: ['numpy'] }, custom: ['tpm'] },
        undefined,
        { registry, custom, platform: LINUX },
      )

      expect(result.steps.map(s => [s.backend, s.status])).toEqual([
        ['conda', 'executed'],
        ['python', 'failed'],
        ['bun', 'executed'],
      ])
      expect(result.errors).toEqual(["python: Required tool 'python-tool' not found in PATH"])
      expect(backends.conda.calls).toEqual([{ op: 'update', names: undefined, dryRun: false }])
      expect(backends.bun.calls).toHaveLength(1)
    })
  })

  describe('list', () => {
    it('marks tracked packages installed or missing, per active category', async () => {
      const { registry, custom } = setup({ conda: { installed: ['numpy', 'pip'] } })

      const { categories } = await list(
        { mac: { brew: ['git'] }, general: { conda: ['numpy', 'scipy'] } },
        { registry, custom, platform: LINUX },
      )

      expect(categories).toEqual([{
        id: 'general',
        title: 'General',
        panels: [{
          backend: 'conda',
          color: 'green',
          available: true,
          declared: 2,
          rows: [
            { name: 'numpy', label: 'numpy', state: 'installed' },
            { name: 'scipy', label: 'scipy', state: 'missing' },
          ],
        }],
      }])
    })

    it('verbose adds untracked packages', async () => {
      const { registry, custom } = setup({ conda: { installed: ['numpy', 'pip'] } })
      const { categories } = await list({ general: { conda: ['numpy'] } }, { registry, custom, platform: LINUX, verbose: true, specs: {} })
      expect(categories[0].panels[0].rows).toEqual([
        { name: 'numpy', label: 'numpy', state: 'installed' },
        { name: 'pip', label: 'pip', state: 'untracked' },
      ])
    })

    it('shows winget display names', async () => {
      const { registry, custom } = setup({ winget: { installed: [{ name: 'Git.Git', version: '2.44.0', displayName: 'Git' }] } })
      const { categories } = await list({ wsl: { winget: ['Git.Git'] } }, { registry, custom, platform: { os: 'linux', wsl: true } })
      expect(categories[0].panels[0].rows).toEqual([{ name: 'Git.Git', label: 'Git', state: 'installed' }])
    })

    it('reports an unavailable backend without rows', async () => {
      const { registry, custom } = setup({ rust: { available: false } })
      const { categories } = await list({ general: { rust: ['bat'] } }, { registry, custom, platform: LINUX })
      expect(categories[0].panels[0]).toMatchObject({ backend: 'rust', available: false, declared: 1, rows: [] })
    })
  })

  describe('status', () => {
    it('lists every backend of the active categories', async () => {
      const { registry, custom } = setup({ bun: { available: false } })
      const { categories } = await status({ general: { conda: ['numpy', 'scipy'] }, custom: ['tpm'] }, { registry, custom, platform: LINUX })

      expect(categories.map(c => c.id)).toEqual(['general', 'custom'])
      expect(categories[0].rows.map(r => [r.backend, r.available, r.packages])).toEqual([
        ['conda', true, 2],
        ['python', true, 0],
        ['rust', true, 0],
        ['bun', false, 0],
      ])
      expect(categories[1].rows).toEqual([{ backend: 'custom', color: 'magenta', tool: 'scripts', available: true, packages: 1 }])
    })
  })

  describe('show', () => {
    it('finds a package in the first backend that has it', async () => {
      const { registry, custom } = setup({ rust: { installed: [{ name: 'bat', version: '0.24.0' }] } })
      const { info } = await show({ general: { rust: ['bat'] } }, 'bat', { registry, custom, platform: LINUX, specs: {} })
      expect(info).toEqual({
        type: 'rust',
        color: 'green',
        tracked: true,
        details: { name: 'bat', version: '0.24.0', requires: [], binaries: [] },
      })
    })

    it('checks custom specs first', async () => {
      const { registry, custom } = setup({}, ['test -d tpm'])
      const { info } = await show({}, 'tpm', { registry, custom, platform: LINUX, specs: SPECS })
      expect(info.type).toBe('custom')
      expect(info.tracked).toBe(false)
      expect(info.details.requires).toEqual(['tmux'])
    })

    it('suggests --type when nothing is found', async () => {
      const { registry, custom } = setup()
      await expect(show({}, 'nope', { registry, custom, platform: LINUX, specs: {} }))
        .rejects.toThrow("Package 'nope' not found\nTry specifying --type if the package is installed")
      await expect(show({}, 'nope', { registry, custom, platform: LINUX, type: 'rust' }))
        .rejects.toThrow(/^Package 'nope' not found$/)
    })
  })

  describe('bootstrap', () => {
    function bootstrapSetup(init: Parameters<typeof fakeRegistry>[0]) {
      const { registry, backends } = fakeRegistry(init)
      const { spawn, calls } = fakeSpawn()
      const shell = new Shell({ spawn, shellPath: '/bin/sh', env: {} })
      const ran = () => calls.filter(c => c.opts.stdio === 'inherit').map(c => c.args[2])
      return { registry, backends, shell, ran }
    }

    it('installs one missing tool with the platform command', async () => {
      const { registry, shell, ran } = bootstrapSetup({ bun: { available: false, selfInstall: { linux: ['sh', '-c', 'install bun'] } } })
      const { result } = await bootstrap('bun', { registry, shell, platform: LINUX })
      expect(ran()).toEqual([`sh -c 'install bun'`])
      expect(result.changes).toEqual([{ action: 'bootstrap', backend: 'bun', package: 'bun-tool' }])
    })

    it('does nothing for an installed tool', async () => {
      const { registry, shell, ran } = bootstrapSetup({ bun: { selfInstall: { all: ['install-bun'] } } })
      const { result } = await bootstrap('bun', { registry, shell, platform: LINUX })
      expect(ran()).toEqual([])
      expect(result.steps).toEqual([{ kind: 'bootstrap', backend: 'bun', message: 'bun-tool already installed', status: 'skipped' }])
    })

    it('rejects backends without an installer', async () => {
      const { registry, shell } = bootstrapSetup({})
      await expect(bootstrap('brew', { registry, shell, platform: LINUX })).rejects.toThrow('No install command defined for brew')
      await expect(bootstrap('npm', { registry, shell, platform: LINUX })).rejects.toThrow("Unknown package type 'npm'")
    })

    it('bootstraps every missing tool and warns where this platform has no command', async () => {
      const { registry, shell, ran } = bootstrapSetup({
        mas: { available: false, selfInstall: { darwin: ['brew', 'install', 'mas'] } },
        conda: { available: false, selfInstall: { linux: ['install-micromamba'] } },
        python: { selfInstall: { linux: ['install-uv'] } },
      })
      const { result } = await bootstrap(undefined, { registry, shell, platform: LINUX })
      expect(ran()).toEqual(['install-micromamba'])
      expect(result.warnings).toEqual(['No install command for mas on linux'])
      expect(result.ok).toBe(true)
    })
  })
})
