import * as os from 'os'
import type { InstallationRun, InstallerContext, Logger, Outcome, ProgressEvent, RunReport, RunState } from './types.js'
import type { Toolchain } from './toolchain.js'
import { buildImage } from './buildImage.js'
import { createContainer } from './createContainer.js'
import { debugContainerState, exportApplications } from './exportApplications.js'
import { sleep as realSleep } from './utils.js'

export interface InstallerDeps {
  toolchain: Toolchain
  logger: Logger
  confirmRecreate: () => Promise<boolean>
  sleep?: (ms: number) => Promise<void>
  onEvent?: (event: ProgressEvent) => void
  onState?: (state: RunState) => void
  settleMs?: number
  readyAttempts?: number
  homeDir?: string
}

/**
 * Build → create → export. Build and create failures end the run in
 * `Failed`; export failures are collected and the run still reaches `Done`.
 */
export async function runInstaller(run: InstallationRun, deps: InstallerDeps): Promise<RunReport> {
  let state: RunState = 'Idle'
  const enter = (next: RunState) => {
    state = next
    deps.onState?.(next)
  }

  const ctx: InstallerContext = {
    run,
    toolchain: deps.toolchain,
    logger: deps.logger,
    homeDir: deps.homeDir ?? os.homedir(),
    settleMs: deps.settleMs ?? 3000,
    readyAttempts: deps.readyAttempts ?? 5,
    sleep: deps.sleep ?? realSleep,
    confirmRecreate: deps.confirmRecreate,
    emit: (event) => deps.onEvent?.(event)
  }

  let reusedContainer = false
  let outcomes: Record<string, Outcome> = {}

  try {
    enter('Building')
    await buildImage(ctx)

    enter('CreatingContainer')
    reusedContainer = (await createContainer(ctx)) === 'reused'

    if (run.debug) await debugContainerState(ctx)

    if (run.skipExport) {
      ctx.logger.info('Skipping application export (--no-export flag)')
    } else {
      enter('Exporting')
      outcomes = await exportApplications(ctx)
    }
    enter('Done')
  } catch (error) {
    enter('Failed')
    return {
      state,
      status: 'failed',
      outcomes,
      failed: [],
      exitCode: 1,
      reusedContainer,
      error: error instanceof Error ? error : new Error(String(error))
    }
  }

  const failed = run.selection.ids.filter((id) => outcomes[id]?.kind === 'failed')
  if (!run.skipExport) {
    if (failed.length === 0) ctx.logger.ok('Application export completed successfully')
    else ctx.logger.warn('Application export completed with some failures')
  }

  return {
    state,
    status: failed.length === 0 ? 'success' : 'partial',
    outcomes,
    failed,
    exitCode: 0,
    reusedContainer
  }
}
