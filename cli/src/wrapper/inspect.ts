import fs from 'fs-extra'
import * as path from 'path'
import { extensionHosts } from '../catalog/components.js'
import { LOG_PURPOSE, isActivationDisabled } from '../config.js'
import { resolveCmd } from '../installers/utils.js'
import { listLogs } from './logs.js'
import { sidecarPath, wrapperPathFor } from './registrar.js'

export interface WrapperStatus {
  ideId: string
  command: string
  onPath?: string
  linkTarget?: string
  wrapped: boolean
  realBinary?: string
  wrapperExists: boolean
  wrapperExecutable: boolean
}

export interface DoctorReport {
  wrappers: WrapperStatus[]
  activationDisabled: boolean
  logs: string[]
}

async function isExecutable(p: string): Promise<boolean> {
  try {
    await fs.access(p, fs.constants.X_OK)
    return true
  } catch {
    return false
  }
}

export async function inspectWrappers(opts: {
  wrapperDir: string
  logDir: string
  env: NodeJS.ProcessEnv
  lookup?: (cmd: string) => Promise<string | undefined>
}): Promise<DoctorReport> {
  const lookup = opts.lookup ?? resolveCmd
  const wrappers: WrapperStatus[] = []

  for (const entry of extensionHosts()) {
    const command = entry.extensionHost?.command ?? entry.id
    const wrapperPath = wrapperPathFor(entry, opts.wrapperDir)
    const status: WrapperStatus = {
      ideId: entry.id,
      command,
      wrapped: false,
      wrapperExists: await fs.pathExists(wrapperPath),
      wrapperExecutable: await isExecutable(wrapperPath)
    }
    const onPath = await lookup(command)
    if (onPath) {
      status.onPath = onPath
      const stat = await fs.lstat(onPath).catch(() => undefined)
      if (stat?.isSymbolicLink()) {
        const target = path.resolve(path.dirname(onPath), await fs.readlink(onPath))
        status.linkTarget = target
        status.wrapped = target === path.resolve(wrapperPath)
      }
      const real = sidecarPath(onPath)
      if (await fs.pathExists(real)) status.realBinary = real
    }
    wrappers.push(status)
  }

  return {
    wrappers,
    activationDisabled: isActivationDisabled(opts.env),
    logs: await listLogs(opts.logDir, LOG_PURPOSE)
  }
}

/** Wrapped but the real binary is gone: launching will fail. */
export function brokenWrappers(report: DoctorReport): WrapperStatus[] {
  return report.wrappers.filter((w) => w.wrapped && !w.realBinary)
}
