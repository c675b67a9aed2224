import fs from 'fs-extra'
import type { Logger } from '../installers/types.js'
import { extensionHosts } from '../catalog/components.js'
import { captureCommand, resolveCmd, type CommandExecutor } from '../installers/utils.js'
import { sidecarPath } from './registrar.js'

export interface ExtensionHost {
  ideId: string
  binary: string
}

export type InstallStatus = 'installed' | 'already-installed' | 'failed'

export interface HostReport {
  ideId: string
  listed: boolean
  missing: string[]
  installs: { extensionId: string; status: InstallStatus; detail?: string }[]
}

/**
 * Every extension host installed on this system, pointing at the real
 * binary when it is wrapped so reconciling never re-enters a wrapper.
 */
export async function resolveExtensionHosts(
  lookup: (cmd: string) => Promise<string | undefined> = resolveCmd,
  exists: (p: string) => Promise<boolean> = (p) => fs.pathExists(p)
): Promise<ExtensionHost[]> {
  const hosts: ExtensionHost[] = []
  for (const entry of extensionHosts()) {
    const command = entry.extensionHost?.command
    if (!command) continue
    const onPath = await lookup(command)
    const candidates = [
      ...(onPath ? [sidecarPath(onPath)] : []),
      `/usr/bin/${command}.real`,
      `/usr/local/bin/${command}.real`
    ]
    let binary: string | undefined
    for (const candidate of candidates) {
      if (await exists(candidate)) {
        binary = candidate
        break
      }
    }
    if (!binary) binary = onPath
    if (binary) hosts.push({ ideId: entry.id, binary })
  }
  return hosts
}

export function parseExtensionList(output: string): string[] {
  return output.split('\n').map((l) => l.trim()).filter((l) => l.length > 0 && !l.includes(' '))
}

export function missingExtensions(installed: readonly string[], required: readonly string[]): string[] {
  const have = new Set(installed.map((e) => e.toLowerCase()))
  return required.filter((e) => !have.has(e.toLowerCase()))
}

function classify(exitCode: number, output: string): InstallStatus {
  if (exitCode !== 0) return 'failed'
  return /already installed/i.test(output) ? 'already-installed' : 'installed'
}

/**
 * Install whatever required extensions each host lacks. One host or one
 * extension failing never stops the rest; the next launch retries.
 */
export async function reconcileExtensions(opts: {
  hosts: ExtensionHost[]
  required: readonly string[]
  logger: Logger
  exec?: CommandExecutor
}): Promise<HostReport[]> {
  const exec = opts.exec ?? captureCommand
  const { logger } = opts
  const reports: HostReport[] = []

  if (opts.hosts.length === 0) logger.info('No extension-capable IDEs found')

  for (const host of opts.hosts) {
    const report: HostReport = { ideId: host.ideId, listed: false, missing: [], installs: [] }
    reports.push(report)

    const listed = await exec(host.binary, ['--list-extensions'])
    if (listed.exitCode !== 0) {
      logger.warn(`${host.ideId}: could not list extensions (exit ${listed.exitCode}); will retry on next launch`)
      continue
    }
    report.listed = true
    report.missing = missingExtensions(parseExtensionList(listed.stdout), opts.required)
    logger.info(`${host.ideId}: ${report.missing.length} missing`)

    for (const extensionId of report.missing) {
      const res = await exec(host.binary, ['--install-extension', extensionId, '--force'])
      const status = classify(res.exitCode, res.stdout + res.stderr)
      if (status === 'failed') {
        const detail = res.stderr.trim() || `exit ${res.exitCode}`
        report.installs.push({ extensionId, status, detail })
        logger.err(`${host.ideId}: failed to install ${extensionId}: ${detail}`)
      } else {
        report.installs.push({ extensionId, status })
        logger.ok(`${host.ideId}: ${extensionId} ${status === 'installed' ? 'installed' : 'already installed'}`)
      }
    }
  }
  return reports
}
