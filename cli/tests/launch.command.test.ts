import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach, vi } from 'vitest'
import fs from 'fs-extra'
import { tmpdir } from 'os'
import { join } from 'path'
import { ownArgs, runCli } from '../src/index.js'

const td = join(tmpdir(), `ide-toolbox-test-${Date.now()}-launch`)
const script = join(td, 'code.real')
const argsFile = join(td, 'args.txt')
const saved = {
  xdg: process.env.XDG_CONFIG_HOME,
  disable: process.env.DISABLE_IDE_AUTO_EXTENSIONS
}
let stderr: string[] = []
let restore = () => {}

beforeAll(async () => {
  process.env.XDG_CONFIG_HOME = join(td, 'config')
  process.env.DISABLE_IDE_AUTO_EXTENSIONS = '1'
  await fs.outputFile(script, '#!/bin/sh\nprintf \'%s\\n\' "$@" > "$(dirname "$0")/args.txt"\nexit 7\n', { mode: 0o755 })
})

afterAll(async () => {
  if (saved.xdg === undefined) delete process.env.XDG_CONFIG_HOME
  else process.env.XDG_CONFIG_HOME = saved.xdg
  if (saved.disable === undefined) delete process.env.DISABLE_IDE_AUTO_EXTENSIONS
  else process.env.DISABLE_IDE_AUTO_EXTENSIONS = saved.disable
  await fs.remove(td)
})

beforeEach(async () => {
  await fs.remove(argsFile)
  stderr = []
  process.exitCode = undefined
  const err = vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
    stderr.push(String(chunk))
    return true
  })
  const exit = vi.spyOn(process, 'exit').mockImplementation(() => {
    throw new Error('process.exit called')
  })
  restore = () => {
    err.mockRestore()
    exit.mockRestore()
  }
})

afterEach(() => {
  restore()
  process.exitCode = undefined
})

describe('launch through the CLI entry', () => {
  it('hands --help after the separator to the real binary and mirrors its exit code', async () => {
    await runCli(['launch', '--ide', 'vscode', '--real', script, '--', '--help', '-x'])

    expect(await fs.readFile(argsFile, 'utf8')).toBe('--help\n-x\n')
    expect(process.exitCode).toBe(7)
    expect(process.exit).not.toHaveBeenCalled()
  })

  it('exits 127 with a hint when the real binary is gone', async () => {
    const missing = join(td, 'gone.real')

    await runCli(['launch', '--ide', 'vscode', '--real', missing, '--', '-h'])

    expect(process.exitCode).toBe(127)
    expect(stderr).toEqual([
      `ide-toolbox: Real binary for 'vscode' not found at ${missing}\n`,
      '  Reinstall the IDE, then re-register its wrapper: ide-toolbox wrap --ide vscode\n'
    ])
    expect(await fs.pathExists(argsFile)).toBe(false)
  })
})

describe('ownArgs', () => {
  it('stops at the first separator', () => {
    expect(ownArgs(['launch', '--ide', 'zed', '--', '--help', '--', '-h'])).toEqual(['launch', '--ide', 'zed'])
    expect(ownArgs(['list', '--help'])).toEqual(['list', '--help'])
  })
})
