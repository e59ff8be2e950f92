import { describe, expect, it } from 'vitest'
import fs from 'fs-extra'
import os from 'node:os'
import path from 'node:path'

import { Shell, formatCommand, quoteArg } from '../src/core/shell.js'
import { fakeSpawn, memoryLogger } from './helpers.js'

describe('shell', () => {
  it('quotes only arguments that need it', () => {
    expect(quoteArg('ripgrep')).toBe('ripgrep')
    expect(quoteArg('--accept-package-agreements')).toBe('--accept-package-agreements')
    expect(quoteArg('^numpy$')).toBe(`'^numpy$'`)
    expect(quoteArg(`it's`)).toBe(`'it'\\''s'`)
    expect(quoteArg('')).toBe(`''`)
    expect(formatCommand(['brew', 'install', 'git lfs'])).toBe(`brew install 'git lfs'`)
  })

  it('runs commands through a login shell', () => {
    const { spawn, calls } = fakeSpawn()
    const logger = memoryLogger()
    const shell = new Shell({ spawn, logger, shellPath: '/bin/zsh', env: {} })

    const r = shell.run(['brew', 'install', 'tmux'])

    expect(r).toEqual({ success: true })
    expect(calls).toHaveLength(1)
    expect(calls[0].file).toBe('/bin/zsh')
    expect(calls[0].args).toEqual(['-l', '-c', 'brew install tmux'])
    expect(calls[0].opts.stdio).toBe('inherit')
    expect(logger.lines).toEqual(['info:   $ brew install tmux'])
  })

  it('dry run only prints the command', () => {
    const { spawn, calls } = fakeSpawn()
    const logger = memoryLogger()
    const shell = new Shell({ spawn, logger, shellPath: '/bin/bash', env: {} })

    expect(shell.run(['cargo', 'install', '--locked', 'ripgrep'], true)).toEqual({ success: true })
    expect(calls).toHaveLength(0)
    expect(logger.lines).toEqual(['info:   Would run: cargo install --locked ripgrep'])
  })

  it('dry run of a script prints every line', () => {
    const { spawn, calls } = fakeSpawn()
    const logger = memoryLogger()
    const shell = new Shell({ spawn, logger, shellPath: '/bin/bash', env: {} })

    shell.runScript('echo one\necho two\n', true, 'fish')
    expect(calls).toHaveLength(0)
    expect(logger.lines).toEqual(['info:   Would run in fish:', 'info:     echo one', 'info:     echo two'])
  })

  it('reports a non-zero exit code', () => {
    const { spawn } = fakeSpawn(() => ({ status: 3 }))
    const shell = new Shell({ spawn, shellPath: '/bin/sh', env: {} })
    expect(shell.run(['false'])).toEqual({ success: false, message: 'Command exited with code 3: false' })
  })

  it('reports a spawn error', () => {
    const { spawn } = fakeSpawn(() => ({ status: null, error: new Error('spawn /bin/sh ENOENT') }))
    const shell = new Shell({ spawn, shellPath: '/bin/sh', env: {} })
    expect(shell.run(['true'])).toEqual({ success: false, message: 'spawn /bin/sh ENOENT' })
  })

  it('capture never throws and reads failures as not ok', () => {
    const { spawn } = fakeSpawn(call => (call.args[2] === 'brew list' ? { status: 1, stdout: '' } : { stdout: 'a\nb\n' }))
    const shell = new Shell({ spawn, shellPath: '/bin/sh', env: {} })
    expect(shell.capture(['brew', 'list'])).toEqual({ ok: false, stdout: '' })
    expect(shell.capture(['uv', 'tool', 'list'])).toEqual({ ok: true, stdout: 'a\nb\n' })

    const throwing = new Shell({ spawn: () => { throw new Error('boom') }, shellPath: '/bin/sh', env: {} })
    expect(throwing.capture(['x'])).toEqual({ ok: false, stdout: '' })
    expect(throwing.succeeds('x')).toBe(false)
  })

  it('checks tools with which', () => {
    const { spawn, calls } = fakeSpawn(call => ({ status: call.args[0] === 'uv' ? 0 : 1 }))
    const shell = new Shell({ spawn, shellPath: '/bin/sh', env: {} })
    expect(shell.which('uv')).toBe(true)
    expect(shell.which('cargo')).toBe(false)
    expect(calls.map(c => c.file)).toEqual(['which', 'which'])
  })

  it('ignores a $SHELL that is not a file', () => {
    const { spawn } = fakeSpawn(call => {
      if (call.file === 'ps') return { stdout: 'fish\n' }
      if (call.file === 'which') return { stdout: '/usr/bin/fish\n' }
      return {}
    })
    expect(new Shell({ spawn, env: { SHELL: os.tmpdir() } }).path).toBe('/usr/bin/fish')
  })

  it('uses $SHELL when it names a file', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'pkgsync-shell-'))
    const file = path.join(dir, 'zsh')
    await fs.writeFile(file, '')
    const { spawn, calls } = fakeSpawn()
    try {
      expect(new Shell({ spawn, env: { SHELL: file } }).path).toBe(file)
      expect(calls).toEqual([])
    } finally {
      await fs.remove(dir)
    }
  })

  it('falls back to the parent process shell when $SHELL is unset', () => {
    const { spawn } = fakeSpawn(call => {
      if (call.file === 'ps') return { stdout: '-zsh\n' }
      if (call.file === 'which') return { stdout: '/usr/bin/zsh\n' }
      return {}
    })
    const shell = new Shell({ spawn, env: {} })
    expect(shell.path).toBe('/usr/bin/zsh')
  })
})
