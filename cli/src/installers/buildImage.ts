import type { InstallerContext } from './types.js'
import { buildArgFor } from '../catalog/selection.js'
import { BuildFailedError } from '../errors.js'
import { stageBuildContext } from './stageContext.js'

export async function buildImage(ctx: InstallerContext): Promise<void> {
  const { run, logger } = ctx
  const ides = buildArgFor(run.selection)
  const lsp = run.languageServers.join(',')

  logger.info(`Building container with IDEs: ${ides}`)
  if (lsp) logger.info(`Language servers: ${lsp}`)
  ctx.emit({ phase: 'build', outcome: 'started' })

  let exitCode: number
  try {
    const staged = await stageBuildContext(ctx)
    try {
      exitCode = await ctx.toolchain.build({
        contextDir: staged.dir,
        imageName: run.imageName,
        ides,
        lsp,
        quiet: !run.verbose
      })
    } finally {
      await staged.cleanup()
    }
  } catch (error) {
    ctx.emit({ phase: 'build', outcome: 'failed', reason: error instanceof Error ? error.message : String(error) })
    logger.err('Container build failed')
    throw error
  }

  if (exitCode !== 0) {
    ctx.emit({ phase: 'build', outcome: 'failed', reason: `exit code ${exitCode}` })
    logger.err('Container build failed')
    throw new BuildFailedError(exitCode, `ide-toolbox install ${ides}${lsp ? ` LSP:${lsp}` : ''}`)
  }

  ctx.emit({ phase: 'build', outcome: 'succeeded' })
  logger.ok('Container built successfully')
}
