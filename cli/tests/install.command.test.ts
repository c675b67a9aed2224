import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach, vi } from 'vitest'
import { runCommand } from 'citty'
import fs from 'fs-extra'
import { tmpdir } from 'os'
import { join } from 'path'
import type { FakeToolchain, FakeToolchainOptions } from './helpers/fakes.js'
import { installCommand } from '../src/commands/install.js'

const shared = vi.hoisted(() => {
  const fakes: FakeToolchain[] = []
  const options: { current: FakeToolchainOptions } = { current: {} }
  return { fakes, options }
})

vi.mock('../src/installers/toolchain.js', async () => {
  const { createFakeToolchain } = await import('./helpers/fakes.js')
  return {
    createShellToolchain: vi.fn(() => {
      const fake = createFakeToolchain(shared.options.current)
      shared.fakes.push(fake)
      return fake
    })
  }
})

// Component lists are always given, so the wizard must never open
vi.mock('@clack/prompts', () => ({
  intro: vi.fn(),
  cancel: vi.fn(),
  isCancel: () => false,
  multiselect: vi.fn(async () => { throw new Error('unexpected prompt') }),
  confirm: vi.fn(async () => false)
}))

const td = join(tmpdir(), `ide-toolbox-test-${Date.now()}-install`)
const contextDir = join(td, 'container')
const emptyContext = join(td, 'empty')
const savedXdg = process.env.XDG_CONFIG_HOME
let output: string[] = []
let restoreOutput = () => {}

beforeAll(async () => {
  process.env.XDG_CONFIG_HOME = join(td, 'config')
  await fs.outputFile(join(td, 'config', 'ide-toolbox', 'config.toml'), 'settle_seconds = 0\ncontainer_name = "tb-test"\n')
  await fs.outputFile(join(contextDir, 'Containerfile'), 'FROM scratch\n')
  await fs.ensureDir(emptyContext)
})

afterAll(async () => {
  if (savedXdg === undefined) delete process.env.XDG_CONFIG_HOME
  else process.env.XDG_CONFIG_HOME = savedXdg
  await fs.remove(td)
})

beforeEach(() => {
  shared.fakes.length = 0
  output = []
  process.exitCode = undefined
  const capture = (chunk: string | Uint8Array) => {
    output.push(String(chunk))
    return true
  }
  const out = vi.spyOn(process.stdout, 'write').mockImplementation(capture)
  const err = vi.spyOn(process.stderr, 'write').mockImplementation(capture)
  restoreOutput = () => {
    out.mockRestore()
    err.mockRestore()
  }
})

afterEach(() => {
  restoreOutput()
  process.exitCode = undefined
})

describe('install command', () => {
  it('installs a case-insensitive selection and exits cleanly', async () => {
    shared.options.current = { installed: ['zed', 'cursor'] }

    await runCommand(installCommand, { rawArgs: ['Zed, CURSOR', '--context', contextDir] })

    expect(process.exitCode).toBeUndefined()
    const fake = shared.fakes[0]
    expect(fake?.builds[0]?.ides).toBe('zed,cursor')
    expect(fake?.calls).toEqual(['build', 'exists tb-test', 'create tb-test', 'export zed', 'export cursor'])
    expect(output.join('')).toContain('Exported: zed, cursor')
  })

  it('treats a partial export as success and names the failure', async () => {
    shared.options.current = { installed: ['zed', 'cursor'], exportFail: ['cursor'] }

    await runCommand(installCommand, { rawArgs: ['zed,cursor', '--context', contextDir] })

    expect(process.exitCode).toBeUndefined()
    expect(output.join('')).toContain('Export failed: cursor')
  })

  it('builds and creates only with --no-export', async () => {
    shared.options.current = { installed: ['zed'] }

    await runCommand(installCommand, { rawArgs: ['zed', '--no-export', '--context', contextDir] })

    expect(process.exitCode).toBeUndefined()
    expect(shared.fakes[0]?.calls).toEqual(['build', 'exists tb-test', 'create tb-test'])
  })

  it('exits 1 with tips when the build fails', async () => {
    shared.options.current = { buildExit: 1 }

    await runCommand(installCommand, { rawArgs: ['zed', '--context', contextDir] })

    expect(process.exitCode).toBe(1)
    const text = output.join('')
    expect(text).toContain('Container build failed (exit code 1)')
    expect(text).toContain('Troubleshooting tips:')
  })

  it('rejects unknown components before touching podman', async () => {
    await runCommand(installCommand, { rawArgs: ['zed,notepad', '--context', contextDir] })

    expect(process.exitCode).toBe(1)
    expect(shared.fakes).toEqual([])
    expect(output.join('')).toContain('Unknown component: notepad')
  })

  it('requires a Containerfile in the build context', async () => {
    await runCommand(installCommand, { rawArgs: ['zed', '--context', emptyContext] })

    expect(process.exitCode).toBe(1)
    expect(shared.fakes).toEqual([])
    expect(output.join('')).toContain(`No Containerfile in build context ${emptyContext}`)
  })

  it('declines browser checks', async () => {
    await runCommand(installCommand, { rawArgs: ['--test-browser'] })

    expect(process.exitCode).toBe(1)
    expect(output.join('')).not.toContain('Troubleshooting tips:')
  })
})
