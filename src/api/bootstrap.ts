import { requireBackend, selfInstallCommand } from '../backends/registry.js'
import type { Backend } from '../backends/types.js'
import { runOperation } from '../core/runner.js'
import { ConfigError } from '../errors.js'
import type { Result } from '../types.js'
import { createRuntime, recordCommand } from './runtime.js'
import type { ApiOptions, Runtime } from './runtime.js'

function hasSelfInstall(backend: Backend): boolean {
  return Object.keys(backend.selfInstall).length > 0
}

function installTool(rt: Runtime, backend: Backend, res: Result): void {
  const cmd = selfInstallCommand(backend, rt.platform)
  if (!cmd) {
    const msg = `No install command for ${backend.id} on ${rt.platform.os}`
    rt.logger?.warn(msg)
    res.warnings.push(msg)
    res.steps.push({ kind: 'bootstrap', backend: backend.id, message: msg, status: 'skipped' })
    return
  }
  rt.logger?.info(`Installing ${backend.id} (${backend.tool})`)
  const r = rt.shell.run(cmd, rt.dryRun)
  recordCommand(res, { kind: 'bootstrap', backend: backend.id, packages: [backend.tool], message: `Install ${backend.tool}` }, r, rt.dryRun)
  if (r.success) {
    rt.logger?.info(`${backend.tool} installed`)
    res.changes.push({ action: 'bootstrap', backend: backend.id, package: backend.tool })
  } else {
    rt.logger?.error(r.message || `Failed to install ${backend.tool}`)
  }
}

/**
 * Install the package managers themselves: one by id, or every missing one that has an installer.
 */
export async function bootstrap(name: string | undefined, opts: ApiOptions = {}): Promise<{ result: Result }> {
  const rt = createRuntime(opts)
  if (rt.dryRun) rt.logger?.warn('DRY RUN - No changes will be made')

  let targets: Backend[]
  if (name) {
    const backend = requireBackend(rt.registry, name)
    if (!hasSelfInstall(backend)) {
      throw new ConfigError(`No install command defined for ${name}`)
    }
    if (!backend.isAvailable() && !selfInstallCommand(backend, rt.platform)) {
      throw new ConfigError(`No install command for ${name} on ${rt.platform.os}`)
    }
    targets = [backend]
  } else {
    targets = rt.registry.order.flatMap(id => {
      const b = rt.registry.backends.get(id)
      return b && hasSelfInstall(b) ? [b] : []
    })
  }

  const result = await runOperation({
    operation: 'bootstrap',
    opts,
    execute: (res) => {
      for (const backend of targets) {
        if (backend.isAvailable()) {
          rt.logger?.info(`${backend.id}: ${backend.tool} already installed`)
          res.steps.push({ kind: 'bootstrap', backend: backend.id, message: `${backend.tool} already installed`, status: 'skipped' })
          continue
        }
        installTool(rt, backend, res)
      }
    },
  })
  return { result }
}
