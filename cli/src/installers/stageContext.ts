import fs from 'fs-extra'
import * as os from 'os'
import * as path from 'path'
import type { InstallerContext } from './types.js'
import { ToolboxError } from '../errors.js'

export const CLI_TARBALL = 'ide-toolbox.tgz'

export interface StagedContext {
  dir: string
  cleanup: () => Promise<void>
}

/**
 * A Containerfile that installs ide-toolbox needs the packed CLI beside it.
 * When the context asks for it and lacks it, build from a temporary copy
 * with a fresh tarball so the source context stays untouched.
 */
export async function stageBuildContext(ctx: InstallerContext): Promise<StagedContext> {
  const source = ctx.run.buildContext
  const unstaged: StagedContext = { dir: source, cleanup: async () => {} }

  const containerfile = path.join(source, 'Containerfile')
  if (!(await fs.pathExists(containerfile))) return unstaged
  if (!(await fs.readFile(containerfile, 'utf8')).includes(CLI_TARBALL)) return unstaged
  if (await fs.pathExists(path.join(source, CLI_TARBALL))) return unstaged

  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'ide-toolbox-context-'))
  const cleanup = () => fs.remove(dir)
  try {
    await fs.copy(source, dir)
    ctx.logger.info('Packing ide-toolbox into the build context')
    const packed = await ctx.toolchain.packCli(dir)
    const name = packed.stdout.trim().split('\n').pop()?.trim()
    if (packed.exitCode !== 0 || !name) {
      const detail = packed.stderr.trim().split('\n').pop() || `npm pack exited with ${packed.exitCode}`
      throw new ToolboxError('BuildFailed', `Could not pack ide-toolbox for the image: ${detail}`, [
        'Build the CLI first: npm run build',
        `Or put ${CLI_TARBALL} (from \`npm pack -w cli\`) into ${source}`
      ])
    }
    if (name !== CLI_TARBALL) await fs.move(path.join(dir, name), path.join(dir, CLI_TARBALL), { overwrite: true })
  } catch (error) {
    await cleanup()
    throw error
  }
  return { dir, cleanup }
}
