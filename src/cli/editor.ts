import { nodeSpawn } from '../core/spawn.js'
import type { Spawn } from '../core/spawn.js'
import { ConfigError } from '../errors.js'

/**
 * Open `file` in `editor` attached to the terminal and wait for it to exit.
 */
export function openInEditor(editor: string, file: string, spawn: Spawn = nodeSpawn): void {
  const r = spawn(editor, [file], { stdio: 'inherit' })
  if (r.error) {
    throw new ConfigError(`Editor '${editor}' not found`)
  }
  if (r.status !== 0) {
    throw new ConfigError(`Editor '${editor}' exited with code ${r.status ?? 'null'}`)
  }
}
