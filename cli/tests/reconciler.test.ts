import { describe, it, expect } from 'vitest'
import {
  missingExtensions,
  parseExtensionList,
  reconcileExtensions,
  resolveExtensionHosts
} from '../src/wrapper/reconciler.js'
import type { CommandResult } from '../src/installers/types.js'
import { createMemoryLogger } from './helpers/fakes.js'

const REQUIRED = ['publisher.alpha', 'publisher.beta', 'Other.Gamma']

function scriptedExec(script: Record<string, CommandResult>) {
  const calls: string[] = []
  const exec = async (cmd: string, args: string[]): Promise<CommandResult> => {
    const line = [cmd, ...args].join(' ')
    calls.push(line)
    return script[line] ?? { exitCode: 0, stdout: '', stderr: '' }
  }
  return { calls, exec }
}

describe('parseExtensionList', () => {
  it('keeps one id per line and drops banners', () => {
    expect(parseExtensionList('Extensions installed on WSL:\npublisher.alpha\n\n  other.gamma  \n')).toEqual([
      'publisher.alpha',
      'other.gamma'
    ])
  })
})

describe('missingExtensions', () => {
  it('compares ids without regard to case', () => {
    expect(missingExtensions(['PUBLISHER.ALPHA', 'other.gamma'], REQUIRED)).toEqual(['publisher.beta'])
  })
})

describe('reconcileExtensions', () => {
  it('installs nothing when every required extension is present', async () => {
    const { calls, exec } = scriptedExec({
      '/usr/bin/code.real --list-extensions': { exitCode: 0, stdout: 'publisher.alpha\npublisher.beta\nother.gamma\n', stderr: '' }
    })
    const logger = createMemoryLogger()

    const reports = await reconcileExtensions({
      hosts: [{ ideId: 'vscode', binary: '/usr/bin/code.real' }],
      required: REQUIRED,
      logger,
      exec
    })

    expect(reports).toEqual([{ ideId: 'vscode', listed: true, missing: [], installs: [] }])
    expect(calls).toEqual(['/usr/bin/code.real --list-extensions'])
    expect(logger.lines).toContain('info vscode: 0 missing')
  })

  it('installs the missing ones and keeps going past failures', async () => {
    const { calls, exec } = scriptedExec({
      '/usr/bin/cursor.real --list-extensions': { exitCode: 0, stdout: 'publisher.alpha\n', stderr: '' },
      '/usr/bin/cursor.real --install-extension publisher.beta --force': {
        exitCode: 1,
        stdout: '',
        stderr: "Extension 'publisher.beta' not found.\n"
      },
      '/usr/bin/cursor.real --install-extension Other.Gamma --force': {
        exitCode: 0,
        stdout: "Extension 'other.gamma' is already installed.\n",
        stderr: ''
      },
      '/usr/bin/code.real --list-extensions': { exitCode: 0, stdout: '', stderr: '' }
    })
    const logger = createMemoryLogger()

    const reports = await reconcileExtensions({
      hosts: [
        { ideId: 'cursor', binary: '/usr/bin/cursor.real' },
        { ideId: 'vscode', binary: '/usr/bin/code.real' }
      ],
      required: REQUIRED,
      logger,
      exec
    })

    expect(reports[0]).toEqual({
      ideId: 'cursor',
      listed: true,
      missing: ['publisher.beta', 'Other.Gamma'],
      installs: [
        { extensionId: 'publisher.beta', status: 'failed', detail: "Extension 'publisher.beta' not found." },
        { extensionId: 'Other.Gamma', status: 'already-installed' }
      ]
    })
    expect(reports[1]?.installs.map((i) => i.status)).toEqual(['installed', 'installed', 'installed'])
    expect(calls).toHaveLength(7)
    expect(logger.lines).toContain("err cursor: failed to install publisher.beta: Extension 'publisher.beta' not found.")
  })

  it('skips a host whose extensions cannot be listed', async () => {
    const { calls, exec } = scriptedExec({
      '/usr/bin/windsurf --list-extensions': { exitCode: 2, stdout: '', stderr: 'boom' }
    })

    const reports = await reconcileExtensions({
      hosts: [{ ideId: 'windsurf', binary: '/usr/bin/windsurf' }],
      required: REQUIRED,
      logger: createMemoryLogger(),
      exec
    })

    expect(reports).toEqual([{ ideId: 'windsurf', listed: false, missing: [], installs: [] }])
    expect(calls).toEqual(['/usr/bin/windsurf --list-extensions'])
  })

  it('logs when there is nothing to reconcile', async () => {
    const logger = createMemoryLogger()
    expect(await reconcileExtensions({ hosts: [], required: REQUIRED, logger })).toEqual([])
    expect(logger.lines).toEqual(['info No extension-capable IDEs found'])
  })
})

describe('resolveExtensionHosts', () => {
  it('prefers the real binary of a wrapped IDE over the wrapper on PATH', async () => {
    const onPath: Record<string, string> = { code: '/usr/bin/code', cursor: '/usr/local/bin/cursor' }
    const files = new Set(['/usr/bin/code.real'])

    const hosts = await resolveExtensionHosts(
      async (cmd) => onPath[cmd],
      async (p) => files.has(p)
    )

    expect(hosts).toEqual([
      { ideId: 'vscode', binary: '/usr/bin/code.real' },
      { ideId: 'cursor', binary: '/usr/local/bin/cursor' }
    ])
  })

  it('finds a real binary in the usual places when the command is not on PATH', async () => {
    const hosts = await resolveExtensionHosts(
      async () => undefined,
      async (p) => p === '/usr/local/bin/windsurf.real'
    )
    expect(hosts).toEqual([{ ideId: 'windsurf', binary: '/usr/local/bin/windsurf.real' }])
  })
})
