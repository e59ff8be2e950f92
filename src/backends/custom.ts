import type { Shell } from '../core/shell.js'
import { parseSpec } from '../manifest/specs.js'
import type { CustomPackageSpec, SpecCatalog } from '../manifest/specs.js'
import type { CommandResult, Logger, PackageDetails, PackageRecord } from '../types.js'
import type { BackendColor } from './types.js'

export const CUSTOM_ID = 'custom'

/**
 * Script-based packages. Not a Backend: every operation takes the package's spec.
 */
export class CustomManager {
  readonly id = CUSTOM_ID
  readonly color: BackendColor = 'magenta'
  readonly tool = 'scripts'

  constructor(private readonly shell: Shell, private readonly logger?: Logger) {}

  isAvailable(): boolean {
    return true
  }

  /**
   * Without a check script, a package never counts as installed.
   */
  isInstalled(spec: CustomPackageSpec): boolean {
    if (!spec.check) return false
    return this.shell.succeeds(spec.check, spec.shell)
  }

  install(spec: CustomPackageSpec, dryRun = false): CommandResult {
    this.logger?.info(`  Shell: ${spec.shell || this.shell.path}`)
    return this.shell.runScript(spec.install, dryRun, spec.shell)
  }

  remove(spec: CustomPackageSpec, dryRun = false): CommandResult {
    if (!spec.remove) {
      return { success: false, message: 'No remove command specified for this package' }
    }
    return this.shell.runScript(spec.remove, dryRun, spec.shell)
  }

  listInstalled(catalog: SpecCatalog): PackageRecord[] {
    const out: PackageRecord[] = []
    for (const [name, raw] of Object.entries(catalog)) {
      if (this.isInstalled(parseSpec(name, raw))) out.push({ name, version: 'custom' })
    }
    return out
  }

  getDetails(spec: CustomPackageSpec): PackageDetails | undefined {
    if (!this.isInstalled(spec)) return undefined
    return {
      name: spec.name,
      version: 'custom',
      summary: spec.description || `Custom package (${spec.shell || 'default shell'})`,
      requires: [...spec.depends],
      binaries: [],
    }
  }
}
