import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import fs from 'fs-extra'
import * as os from 'os'
import * as path from 'path'
import { registerWrapper, renderWrapper, sidecarPath } from '../src/wrapper/registrar.js'
import { WrapperInstallFailedError } from '../src/errors.js'
import { createMemoryLogger } from './helpers/fakes.js'

const launcher = { node: '/usr/bin/node', cli: '/opt/ide-toolbox/bin.js' }

describe('renderWrapper', () => {
  it('fills known placeholders and leaves unknown ones', () => {
    expect(renderWrapper('{{IDE_ID}} {{REAL_BINARY}} {{OTHER}}', { IDE_ID: 'cursor', REAL_BINARY: '/usr/bin/cursor.real' })).toBe(
      'cursor /usr/bin/cursor.real {{OTHER}}'
    )
  })
})

describe('registerWrapper', () => {
  let tmp: string
  let binDir: string
  let wrapperDir: string
  let binary: string

  beforeEach(async () => {
    tmp = await fs.mkdtemp(path.join(os.tmpdir(), 'ide-toolbox-wrap-'))
    binDir = path.join(tmp, 'bin')
    wrapperDir = path.join(tmp, 'wrappers')
    binary = path.join(binDir, 'code')
    await fs.outputFile(binary, '#!/bin/sh\necho real code\n', { mode: 0o755 })
  })

  afterEach(async () => {
    await fs.remove(tmp)
  })

  it('moves the binary aside and links the original path to a wrapper with the IDE id baked in', async () => {
    const result = await registerWrapper({ ideId: 'vscode', binaryPath: binary, wrapperDir, launcher, logger: createMemoryLogger() })

    const wrapperPath = path.join(wrapperDir, 'code-wrapped')
    expect(result).toEqual({
      status: 'registered',
      registration: { ideId: 'vscode', originalPath: binary, realBinaryPath: `${binary}.real`, wrapperPath }
    })
    expect(await fs.readFile(sidecarPath(binary), 'utf8')).toBe('#!/bin/sh\necho real code\n')
    expect(await fs.readlink(binary)).toBe(wrapperPath)

    const script = await fs.readFile(wrapperPath, 'utf8')
    expect(script).toContain(
      `exec "/usr/bin/node" "/opt/ide-toolbox/bin.js" launch --ide "vscode" --real "${binary}.real" -- "$@"`
    )
    expect(script).toContain('# Wrapper for VS Code generated by')
    expect((await fs.stat(wrapperPath)).mode & 0o777).toBe(0o755)
  })

  it('is idempotent', async () => {
    const logger = createMemoryLogger()
    await registerWrapper({ ideId: 'vscode', binaryPath: binary, wrapperDir, launcher, logger })
    const wrapperPath = path.join(wrapperDir, 'code-wrapped')
    const scriptBefore = await fs.readFile(wrapperPath, 'utf8')

    const second = await registerWrapper({ ideId: 'vscode', binaryPath: binary, wrapperDir, launcher, logger })

    expect(second.status).toBe('already-registered')
    expect(await fs.readlink(binary)).toBe(wrapperPath)
    expect(await fs.readFile(sidecarPath(binary), 'utf8')).toBe('#!/bin/sh\necho real code\n')
    expect(await fs.readFile(wrapperPath, 'utf8')).toBe(scriptBefore)
    expect(await fs.pathExists(`${binary}.real.real`)).toBe(false)
    expect(logger.lines).toContain('info VS Code is already wrapped')
  })

  it('restores the original binary when the wrapper cannot be written', async () => {
    // a regular file where the wrapper directory should be
    const blocked = path.join(tmp, 'not-a-dir')
    await fs.outputFile(blocked, '')

    await expect(
      registerWrapper({ ideId: 'vscode', binaryPath: binary, wrapperDir: blocked, launcher, logger: createMemoryLogger() })
    ).rejects.toBeInstanceOf(WrapperInstallFailedError)

    expect((await fs.lstat(binary)).isSymbolicLink()).toBe(false)
    expect(await fs.readFile(binary, 'utf8')).toBe('#!/bin/sh\necho real code\n')
    expect(await fs.pathExists(sidecarPath(binary))).toBe(false)
  })

  it('puts the binary back and drops the new wrapper when linking fails', async () => {
    const symlink = vi.spyOn(fs, 'symlink').mockImplementationOnce(async () => {
      throw new Error('EPERM: operation not permitted')
    })
    const wrapperPath = path.join(wrapperDir, 'code-wrapped')

    try {
      await expect(
        registerWrapper({ ideId: 'vscode', binaryPath: binary, wrapperDir, launcher, logger: createMemoryLogger() })
      ).rejects.toThrow(`Wrapping 'vscode' failed while trying to link ${binary} to the wrapper; original binary restored`)
    } finally {
      symlink.mockRestore()
    }

    expect((await fs.lstat(binary)).isFile()).toBe(true)
    expect(await fs.readFile(binary, 'utf8')).toBe('#!/bin/sh\necho real code\n')
    expect(await fs.pathExists(wrapperPath)).toBe(false)
    expect(await fs.pathExists(sidecarPath(binary))).toBe(false)
  })

  it('leaves everything untouched when the template is missing', async () => {
    await expect(
      registerWrapper({
        ideId: 'vscode',
        binaryPath: binary,
        wrapperDir,
        launcher,
        logger: createMemoryLogger(),
        templatePath: path.join(tmp, 'missing.sh')
      })
    ).rejects.toThrow()

    expect(await fs.readFile(binary, 'utf8')).toBe('#!/bin/sh\necho real code\n')
    expect(await fs.pathExists(sidecarPath(binary))).toBe(false)
    expect(await fs.pathExists(wrapperDir)).toBe(false)
  })

  it('refuses components that host no extensions', async () => {
    await expect(
      registerWrapper({ ideId: 'zed', binaryPath: binary, wrapperDir, launcher, logger: createMemoryLogger() })
    ).rejects.toThrow("'zed' does not support extension wrapping")
  })
})
