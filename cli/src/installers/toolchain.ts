import fs from 'fs-extra'
import * as os from 'os'
import type { CommandResult, ExportTarget, Logger } from './types.js'
import { captureCommand, runCommand, type CommandExecutor } from './utils.js'
import { packageRoot } from '../paths.js'

export interface BuildRequest {
  contextDir: string
  imageName: string
  ides: string
  lsp: string
  quiet: boolean
}

export interface CreateRequest {
  name: string
  image: string
  volumes: string[]
  additionalFlags: string[]
}

/** podman + distrobox, as seen by the orchestrator. */
export interface Toolchain {
  build(req: BuildRequest): Promise<number>
  /** `npm pack` this CLI into `destDir`; stdout ends with the tarball name. */
  packCli(destDir: string): Promise<CommandResult>
  listContainers(): Promise<string[]>
  exists(name: string): Promise<boolean>
  remove(name: string): Promise<CommandResult>
  create(req: CreateRequest): Promise<CommandResult>
  enter(name: string, command: string[]): Promise<CommandResult>
  exportComponent(name: string, target: ExportTarget, exportPath: string): Promise<CommandResult>
  dockerSocket(): Promise<string | undefined>
  podmanSocket(): Promise<{ source: string; target: string } | undefined>
}

export function buildArgs(req: BuildRequest): string[] {
  const args = ['build', req.contextDir, '--build-arg', `IDE=${req.ides}`]
  if (req.lsp) args.push('--build-arg', `LSP=${req.lsp}`)
  args.push('-t', req.imageName)
  if (req.quiet) args.push('--quiet')
  return args
}

export function createArgs(req: CreateRequest): string[] {
  const args = ['create', '-n', req.name, '-i', req.image]
  for (const volume of req.volumes) args.push('--volume', volume)
  for (const flag of req.additionalFlags) args.push('--additional-flags', flag)
  args.push('--yes')
  return args
}

export function exportArgs(target: ExportTarget, exportPath: string): string[] {
  return target.type === 'app'
    ? ['distrobox-export', '--app', target.app]
    : ['distrobox-export', '--bin', target.path, '--export-path', exportPath]
}

/**
 * Container names from `distrobox list`, whose table looks like
 * `ID | NAME | STATUS | IMAGE`.
 */
export function parseContainerList(output: string): string[] {
  const names: string[] = []
  for (const line of output.split('\n')) {
    const cols = line.split('|').map((c) => c.trim())
    if (cols.length < 2) continue
    const name = cols[1]
    if (!name || name.toUpperCase() === 'NAME') continue
    names.push(name)
  }
  return names
}

export function createShellToolchain(opts: {
  logger: Logger
  verbose: boolean
  exec?: CommandExecutor
  uid?: number
}): Toolchain {
  const exec = opts.exec ?? captureCommand
  const logger = opts.logger

  const run = async (cmd: string, args: string[]): Promise<CommandResult> => {
    logger.debug(`$ ${cmd} ${args.join(' ')}`)
    const res = await exec(cmd, args)
    if (opts.verbose && res.stdout.trim()) logger.debug(res.stdout.trimEnd())
    return res
  }

  const listContainers = async () => {
    const res = await run('distrobox', ['list', '--no-color'])
    return res.exitCode === 0 ? parseContainerList(res.stdout) : []
  }

  const enter = (name: string, command: string[]) =>
    run('distrobox', ['enter', name, '--', ...command])

  return {
    async build(req) {
      const args = buildArgs(req)
      if (req.quiet) {
        const res = await run('podman', args)
        if (res.exitCode !== 0 && res.stderr.trim()) logger.err(res.stderr.trimEnd())
        return res.exitCode
      }
      return runCommand('podman', args, { logger })
    },
    packCli: (destDir) => run('npm', ['pack', packageRoot, '--pack-destination', destDir]),
    listContainers,
    async exists(name) {
      return (await listContainers()).includes(name)
    },
    remove: (name) => run('distrobox', ['rm', name, '--force']),
    create: (req) => run('distrobox', createArgs(req)),
    enter,
    exportComponent: (name, target, exportPath) => enter(name, exportArgs(target, exportPath)),
    async dockerSocket() {
      const sock = '/var/run/docker.sock'
      return (await fs.pathExists(sock)) ? sock : undefined
    },
    async podmanSocket() {
      const system = '/run/podman/podman.sock'
      // A dangling symlink is still mounted as-is.
      if (await fs.lstat(system).then(() => true, () => false)) {
        const source = await fs.realpath(system).catch(() => system)
        return { source, target: system }
      }
      const uid = opts.uid ?? os.userInfo().uid
      const user = `/run/user/${uid}/podman/podman.sock`
      if (await fs.pathExists(user)) return { source: user, target: system }
      return undefined
    }
  }
}
