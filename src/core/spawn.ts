import { spawnSync } from 'node:child_process'

export type SpawnStdio = 'inherit' | 'capture' | 'ignore'

export interface SpawnOptions {
  stdio: SpawnStdio
  env?: NodeJS.ProcessEnv
}

export interface SpawnResult {
  /**
   * Exit code, or null when the child was killed by a signal or never started.
   */
  status: number | null
  stdout: string
  error?: Error
}

export type Spawn = (file: string, args: string[], opts: SpawnOptions) => SpawnResult

export const nodeSpawn: Spawn = (file, args, opts) => {
  const r = spawnSync(file, args, {
    stdio: opts.stdio === 'capture' ? ['ignore', 'pipe', 'ignore'] : opts.stdio,
    env: opts.env,
    encoding: 'utf8',
  })
  return {
    status: r.status,
    stdout: typeof r.stdout === 'string' ? r.stdout : '',
    error: r.error,
  }
}
