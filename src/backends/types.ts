import type { CommandResult, PackageDetails, PackageRecord } from '../types.js'

export type BackendColor =
  | 'green'
  | 'yellow'
  | 'red'
  | 'cyan'
  | 'magenta'
  | 'yellowBright'
  | 'blueBright'
  | 'cyanBright'
  | 'magentaBright'

export type SelfInstallPlatform = 'darwin' | 'linux' | 'all'

/**
 * How a declared name is matched against `listInstalled()`.
 * `loose` also accepts the display name, case-insensitively (winget IDs vs. titles).
 */
export type NameMatching = 'exact' | 'loose'

/**
 * Uniform contract every package-manager adapter satisfies.
 */
export interface Backend {
  readonly id: string
  readonly color: BackendColor
  /**
   * Binary whose presence on PATH makes the backend available.
   */
  readonly tool: string
  readonly selfInstall: Readonly<Partial<Record<SelfInstallPlatform, readonly string[]>>>
  readonly nameMatching: NameMatching

  install(names: string[], dryRun?: boolean): CommandResult
  /**
   * A backend without programmatic removal reports success with an advisory message.
   */
  remove(names: string[], dryRun?: boolean): CommandResult
  /**
   * Fails soft: any query error yields `[]`.
   */
  listInstalled(): PackageRecord[]
  getDetails(name: string): PackageDetails | undefined
  /**
   * Update the given names, or everything the backend manages when omitted.
   */
  update(names?: string[], dryRun?: boolean): CommandResult
  isAvailable(): boolean
}
