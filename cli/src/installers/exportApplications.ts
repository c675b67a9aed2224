import type { ComponentEntry, InstallerContext, Outcome } from './types.js'
import { cliExportPath, getComponent } from '../catalog/components.js'

async function waitForContainer(ctx: InstallerContext): Promise<boolean> {
  const { run, logger } = ctx
  logger.info('Waiting for container to be ready...')
  for (let attempt = 1; attempt <= ctx.readyAttempts; attempt++) {
    await ctx.sleep(ctx.settleMs)
    const res = await ctx.toolchain.enter(run.containerName, ['true'])
    if (res.exitCode === 0) return true
    logger.debug(`Container not ready (attempt ${attempt}/${ctx.readyAttempts})`)
  }
  return false
}

async function isPresent(ctx: InstallerContext, entry: ComponentEntry): Promise<boolean> {
  for (const probe of entry.probes) {
    const res = await ctx.toolchain.enter(ctx.run.containerName, ['which', probe])
    if (res.exitCode === 0) return true
  }
  return false
}

async function exportOne(ctx: InstallerContext, entry: ComponentEntry): Promise<Outcome> {
  if (!(await isPresent(ctx, entry))) {
    if (ctx.run.selection.all) {
      ctx.logger.info(`${entry.displayName} not installed, skipping`)
      return { kind: 'skipped', reason: 'not installed' }
    }
    ctx.logger.warn(`${entry.displayName} not found in container, skipping export`)
    return { kind: 'failed', reason: 'not found in container' }
  }

  ctx.logger.info(`Exporting ${entry.displayName}...`)
  const res = await ctx.toolchain.exportComponent(ctx.run.containerName, entry.exportTarget, cliExportPath(ctx.homeDir))
  if (res.exitCode !== 0) {
    const reason = res.stderr.trim().split('\n').pop() || `distrobox-export exited with ${res.exitCode}`
    ctx.logger.err(`Failed to export ${entry.displayName}`)
    return { kind: 'failed', reason }
  }
  ctx.logger.ok(`${entry.displayName} exported successfully`)
  return { kind: 'success' }
}

export async function debugContainerState(ctx: InstallerContext): Promise<void> {
  const { logger, toolchain, run } = ctx
  logger.info('=== DEBUG: Container State Diagnostics ===')
  logger.info(`Containers: ${(await toolchain.listContainers()).join(', ') || 'none'}`)
  const probe = await toolchain.enter(run.containerName, ['echo', 'Container accessible'])
  if (probe.exitCode === 0) logger.ok('Container is accessible')
  else logger.err('Cannot access container')
  const apps = await toolchain.enter(run.containerName, ['ls', '/usr/share/applications'])
  if (apps.exitCode === 0) logger.info(`Desktop entries: ${apps.stdout.split('\n').filter(Boolean).join(' ')}`)
  logger.info('=== END DEBUG ===')
}

/**
 * Export every selected component. Failures are recorded per component and
 * never abort the phase.
 */
export async function exportApplications(ctx: InstallerContext): Promise<Record<string, Outcome>> {
  const { run, logger } = ctx
  const outcomes: Record<string, Outcome> = {}

  logger.info('Exporting applications to host system...')
  if (!(await waitForContainer(ctx))) {
    logger.warn(`Container '${run.containerName}' did not respond; attempting exports anyway`)
  }

  for (const id of run.selection.ids) {
    const entry = getComponent(id)
    ctx.emit({ phase: 'export', componentId: id, outcome: 'started' })
    let outcome: Outcome
    try {
      outcome = await exportOne(ctx, entry)
    } catch (error) {
      outcome = { kind: 'failed', reason: error instanceof Error ? error.message : String(error) }
    }
    outcomes[id] = outcome
    ctx.emit({
      phase: 'export',
      componentId: id,
      outcome: outcome.kind === 'success' ? 'succeeded' : outcome.kind,
      ...(outcome.kind === 'success' ? {} : { reason: outcome.reason })
    })
  }

  const failed = Object.entries(outcomes).filter(([, o]) => o.kind === 'failed').map(([id]) => id)
  const exported = Object.values(outcomes).filter((o) => o.kind === 'success').length
  logger.ok(`Exported ${exported} IDE(s)`)
  if (failed.length > 0) {
    logger.warn(`Some exports failed: ${failed.join(', ')}`)
    if (run.debug) {
      logger.info('=== DEBUG: Export failure details ===')
      for (const id of failed) {
        const entry = getComponent(id)
        const res = await ctx.toolchain.enter(run.containerName, ['which', ...entry.probes])
        logger.info(`${id}: ${res.stdout.trim() || `${entry.probes.join('/')} command not found`}`)
      }
      logger.info('=== END DEBUG ===')
    }
  }
  return outcomes
}
