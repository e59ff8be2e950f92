import fs from 'fs-extra'
import path from 'path'

import { errorMessage } from '../errors.js'
import type { CommandResult, Logger } from '../types.js'
import { nodeSpawn } from './spawn.js'
import type { Spawn } from './spawn.js'

const KNOWN_SHELLS = new Set(['bash', 'zsh', 'fish', 'sh', 'ksh', 'tcsh'])

const SAFE_ARG = /^[\w@%+=:,./-]+$/

export function quoteArg(arg: string): string {
  if (arg === '') return `''`
  if (SAFE_ARG.test(arg)) return arg
  return `'${arg.replace(/'/g, `'\\''`)}'`
}

function isFile(p: string): boolean {
  return fs.pathExistsSync(p) && fs.statSync(p).isFile()
}

export function formatCommand(cmd: readonly string[]): string {
  return cmd.map(quoteArg).join(' ')
}

export interface ShellOptions {
  logger?: Logger
  env?: NodeJS.ProcessEnv
  spawn?: Spawn
  /**
   * Skip detection and always use this shell.
   */
  shellPath?: string
}

export interface CaptureResult {
  ok: boolean
  stdout: string
}

/**
 * The single route to external processes. Every command runs as `<shell> -l -c <cmd>`
 * so the user's login configuration (PATH, version managers) applies.
 */
export class Shell {
  private readonly spawn: Spawn
  private readonly env: NodeJS.ProcessEnv
  private readonly logger?: Logger
  private detected?: string

  constructor(opts: ShellOptions = {}) {
    this.spawn = opts.spawn ?? nodeSpawn
    this.env = opts.env ?? process.env
    this.logger = opts.logger
    this.detected = opts.shellPath
  }

  get path(): string {
    if (!this.detected) this.detected = this.detect()
    return this.detected
  }

  private detect(): string {
    const envShell = this.env.SHELL
    if (envShell && isFile(envShell)) return envShell

    const ps = this.spawn('ps', ['-p', String(process.ppid), '-o', 'comm='], { stdio: 'capture', env: this.env })
    const candidate = ps.status === 0 ? ps.stdout.trim() : ''
    if (candidate) {
      const resolved = path.isAbsolute(candidate) ? candidate : this.locate(candidate)
      if (resolved && KNOWN_SHELLS.has(path.basename(resolved).replace(/^-/, ''))) return resolved
    }

    return fs.pathExistsSync('/bin/bash') ? '/bin/bash' : 'sh'
  }

  private locate(name: string): string | undefined {
    const r = this.spawn('which', [name.replace(/^-/, '')], { stdio: 'capture', env: this.env })
    const found = r.stdout.trim()
    return r.status === 0 && found ? found : undefined
  }

  /**
   * Whether `tool` resolves on PATH. Never runs the tool itself.
   */
  which(tool: string): boolean {
    return this.spawn('which', [tool], { stdio: 'ignore', env: this.env }).status === 0
  }

  run(cmd: readonly string[], dryRun = false): CommandResult {
    return this.exec(formatCommand(cmd), dryRun)
  }

  /**
   * Run a multi-line script from a custom package spec, optionally in a specific shell.
   */
  runScript(script: string, dryRun = false, shell?: string): CommandResult {
    const sh = shell || this.path
    if (dryRun) {
      this.logger?.info(`  Would run in ${sh}:`)
      for (const line of script.trim().split('\n')) this.logger?.info(`    ${line}`)
      return { success: true }
    }
    this.logger?.info(`  Running in ${sh}...`)
    return this.spawnLogin(sh, script)
  }

  private exec(cmdline: string, dryRun: boolean): CommandResult {
    if (dryRun) {
      this.logger?.info(`  Would run: ${cmdline}`)
      return { success: true }
    }
    this.logger?.info(`  $ ${cmdline}`)
    return this.spawnLogin(this.path, cmdline)
  }

  private spawnLogin(shell: string, cmdline: string): CommandResult {
    const r = this.spawn(shell, ['-l', '-c', cmdline], { stdio: 'inherit', env: this.env })
    if (r.error) return { success: false, message: errorMessage(r.error) }
    if (r.status !== 0) {
      return { success: false, message: `Command exited with ${r.status === null ? 'a signal' : `code ${r.status}`}: ${cmdline}` }
    }
    return { success: true }
  }

  /**
   * Run a query and capture stdout. Never throws; any failure reads as `ok: false`.
   */
  capture(cmd: readonly string[], shell?: string): CaptureResult {
    const cmdline = formatCommand(cmd)
    try {
      const r = this.spawn(shell || this.path, ['-l', '-c', cmdline], { stdio: 'capture', env: this.env })
      return { ok: !r.error && r.status === 0, stdout: r.stdout }
    } catch {
      return { ok: false, stdout: '' }
    }
  }

  /**
   * Exit status of a custom `check` script, output discarded.
   */
  succeeds(script: string, shell?: string): boolean {
    try {
      const r = this.spawn(shell || this.path, ['-l', '-c', script], { stdio: 'ignore', env: this.env })
      return !r.error && r.status === 0
    } catch {
      return false
    }
  }
}
