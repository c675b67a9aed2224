import fs from 'fs-extra'
import * as path from 'path'
import type { ComponentEntry, Logger } from '../installers/types.js'
import { extensionHosts, getComponent } from '../catalog/components.js'
import { WrapperInstallFailedError } from '../errors.js'
import { resolveCmd } from '../installers/utils.js'
import { wrapperTemplatePath } from '../paths.js'

export interface WrapperRegistration {
  ideId: string
  originalPath: string
  realBinaryPath: string
  wrapperPath: string
}

export type RegisterResult =
  | { status: 'registered'; registration: WrapperRegistration }
  | { status: 'already-registered'; registration: WrapperRegistration }
  | { status: 'not-installed'; ideId: string }

export interface Launcher {
  node: string
  cli: string
}

export interface RegisterOptions {
  ideId: string
  binaryPath?: string
  wrapperDir: string
  launcher: Launcher
  logger: Logger
  templatePath?: string
}

export function sidecarPath(binaryPath: string): string {
  return `${binaryPath}.real`
}

export function wrapperPathFor(entry: ComponentEntry, wrapperDir: string): string {
  const command = entry.extensionHost?.command ?? entry.id
  return path.join(wrapperDir, `${command}-wrapped`)
}

export function renderWrapper(template: string, values: Record<string, string>): string {
  return template.replace(/\{\{([A-Z_]+)\}\}/g, (match, key: string) => values[key] ?? match)
}

async function isSymlinkTo(linkPath: string, target: string): Promise<boolean> {
  try {
    const stat = await fs.lstat(linkPath)
    if (!stat.isSymbolicLink()) return false
    const dest = await fs.readlink(linkPath)
    return path.resolve(path.dirname(linkPath), dest) === path.resolve(target)
  } catch {
    return false
  }
}

/**
 * Move the IDE binary aside, install a wrapper with the IDE id baked in and
 * point the original path at it. A failure at any step restores the
 * original binary.
 */
export async function registerWrapper(opts: RegisterOptions): Promise<RegisterResult> {
  const entry = getComponent(opts.ideId)
  if (!entry.extensionHost) throw new Error(`'${entry.id}' does not support extension wrapping`)

  const binaryPath = opts.binaryPath ?? (await resolveCmd(entry.extensionHost.command))
  if (!binaryPath) {
    opts.logger.warn(`${entry.displayName} not found on PATH; skipping wrapper`)
    return { status: 'not-installed', ideId: entry.id }
  }

  const registration: WrapperRegistration = {
    ideId: entry.id,
    originalPath: binaryPath,
    realBinaryPath: sidecarPath(binaryPath),
    wrapperPath: wrapperPathFor(entry, opts.wrapperDir)
  }

  if (
    (await isSymlinkTo(binaryPath, registration.wrapperPath)) ||
    (await fs.pathExists(registration.realBinaryPath))
  ) {
    opts.logger.info(`${entry.displayName} is already wrapped`)
    return { status: 'already-registered', registration }
  }

  const template = await fs.readFile(opts.templatePath ?? wrapperTemplatePath, 'utf8')
  const script = renderWrapper(template, {
    DISPLAY_NAME: entry.displayName,
    IDE_ID: entry.id,
    REAL_BINARY: registration.realBinaryPath,
    NODE: opts.launcher.node,
    CLI: opts.launcher.cli
  })

  let movedAside = false
  let wroteWrapper = false
  let linked = false
  let step = 'move the original binary aside'
  try {
    await fs.move(binaryPath, registration.realBinaryPath)
    movedAside = true

    step = `write the wrapper at ${registration.wrapperPath}`
    const hadWrapper = await fs.pathExists(registration.wrapperPath)
    await fs.outputFile(registration.wrapperPath, script, { encoding: 'utf8', mode: 0o755 })
    await fs.chmod(registration.wrapperPath, 0o755)
    wroteWrapper = !hadWrapper

    step = `link ${binaryPath} to the wrapper`
    await fs.symlink(registration.wrapperPath, binaryPath)
    linked = true
  } catch (error) {
    await rollback(registration, { movedAside, wroteWrapper, linked }, opts.logger)
    throw new WrapperInstallFailedError(entry.id, step, error)
  }

  opts.logger.ok(`Wrapped ${entry.displayName}: ${binaryPath} -> ${registration.wrapperPath}`)
  return { status: 'registered', registration }
}

async function rollback(
  reg: WrapperRegistration,
  done: { movedAside: boolean; wroteWrapper: boolean; linked: boolean },
  logger: Logger
): Promise<void> {
  try {
    if (done.linked || (await isSymlinkTo(reg.originalPath, reg.wrapperPath))) await fs.remove(reg.originalPath)
    if (done.wroteWrapper) await fs.remove(reg.wrapperPath)
    if (done.movedAside) await fs.move(reg.realBinaryPath, reg.originalPath)
  } catch (error) {
    logger.err(`Rollback incomplete, restore ${reg.realBinaryPath} to ${reg.originalPath} by hand: ${String(error)}`)
  }
}

export async function registerAllWrappers(opts: Omit<RegisterOptions, 'ideId' | 'binaryPath'>): Promise<RegisterResult[]> {
  const results: RegisterResult[] = []
  for (const entry of extensionHosts()) {
    results.push(await registerWrapper({ ...opts, ideId: entry.id }))
  }
  return results
}
