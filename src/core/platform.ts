import fs from 'fs-extra'

export interface PlatformInfo {
  /**
   * Node's platform tag: `darwin`, `linux`, `win32`, ...
   */
  os: string
  wsl: boolean
}

export type PlatformGate = string | undefined

export interface DetectPlatformOptions {
  platform?: string
  env?: NodeJS.ProcessEnv
  /**
   * For tests: override how the kernel version string is read.
   */
  readProcVersion?: () => string | undefined
}

function readProcVersion(): string | undefined {
  try {
    return fs.readFileSync('/proc/version', 'utf8')
  } catch {
    return undefined
  }
}

export function detectWsl(opts: DetectPlatformOptions = {}): boolean {
  const os = opts.platform ?? process.platform
  if (os !== 'linux') return false
  const env = opts.env ?? process.env
  if (env.WSL_DISTRO_NAME) return true
  const version = (opts.readProcVersion ?? readProcVersion)()
  return version !== undefined && version.toLowerCase().includes('microsoft')
}

export function detectPlatform(opts: DetectPlatformOptions = {}): PlatformInfo {
  return {
    os: opts.platform ?? process.platform,
    wsl: detectWsl(opts),
  }
}

/**
 * Category activation: no gate is always active, `wsl` needs WSL, anything else is an exact OS match.
 */
export function gateIsActive(gate: PlatformGate, platform: PlatformInfo): boolean {
  if (gate === undefined) return true
  if (gate === 'wsl') return platform.wsl
  return gate === platform.os
}

function tagMatches(tag: string, platform: PlatformInfo): boolean {
  if (tag === 'wsl') return platform.wsl
  if (tag === 'darwin') return platform.os === 'darwin'
  if (tag === 'linux') return platform.os === 'linux'
  if (tag === 'windows' || tag === 'win32') return platform.os === 'win32'
  return tag === platform.os
}

/**
 * Entry restriction: absent or empty matches everywhere, otherwise any listed tag may match.
 */
export function platformMatches(platforms: string | readonly string[] | undefined, platform: PlatformInfo): boolean {
  if (platforms === undefined) return true
  const tags = typeof platforms === 'string' ? [platforms] : platforms
  if (tags.length === 0 || (tags.length === 1 && tags[0] === '')) return true
  return tags.some(t => tagMatches(t, platform))
}
