import os from 'os'
import path from 'path'

export const MANIFEST_ENV = 'PKGSYNC_MANIFEST'
export const MANIFEST_FILENAME = 'packages.yaml'

export interface ConfigEnv {
  env?: NodeJS.ProcessEnv
  /**
   * For tests or embedding, override home dir (default: os.homedir()).
   */
  homeDir?: string
}

export function getConfigDir(opts: ConfigEnv = {}): string {
  const env = opts.env ?? process.env
  return env.XDG_CONFIG_HOME || path.join(opts.homeDir ?? os.homedir(), '.config')
}

/**
 * `$PKGSYNC_MANIFEST`, else `packages.yaml` in the XDG config dir.
 */
export function getDefaultManifestPath(opts: ConfigEnv = {}): string {
  const env = opts.env ?? process.env
  const fromEnv = env[MANIFEST_ENV]
  if (fromEnv) return path.resolve(fromEnv)
  return path.join(getConfigDir(opts), MANIFEST_FILENAME)
}

/**
 * An explicit `--manifest` wins over the defaults. Relative paths resolve against cwd.
 */
export function resolveManifestPath(flag: string | undefined, opts: ConfigEnv = {}): string {
  if (flag) return path.resolve(flag)
  return getDefaultManifestPath(opts)
}

export function getEditor(opts: ConfigEnv = {}): string {
  const env = opts.env ?? process.env
  return env.EDITOR || 'vim'
}
