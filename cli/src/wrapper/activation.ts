import * as path from 'path'
import type { Logger } from '../installers/types.js'
import { LOG_PURPOSE, isActivationDisabled } from '../config.js'
import { createFileLogger } from '../logger.js'
import { sleep as realSleep } from '../installers/utils.js'
import type { CommandExecutor } from '../installers/utils.js'
import { logFileName, pruneLogs } from './logs.js'
import { reconcileExtensions, resolveExtensionHosts, type ExtensionHost, type HostReport } from './reconciler.js'

export interface ActivationOptions {
  ideId: string
  env: NodeJS.ProcessEnv
  delayMs: number
  logDir: string
  retention: number
  required: readonly string[]
}

export interface ActivationDeps {
  sleep?: (ms: number) => Promise<void>
  now?: () => Date
  resolveHosts?: () => Promise<ExtensionHost[]>
  exec?: CommandExecutor
  createLogger?: (file: string) => Logger
}

export type ActivationResult =
  | { ran: false; reason: 'disabled' }
  | { ran: true; logFile: string; reports: HostReport[]; pruned: string[] }

/**
 * Body of the detached task a wrapper schedules: wait for the IDE to settle,
 * reconcile extensions for every host, keep the newest logs only.
 */
export async function runActivation(opts: ActivationOptions, deps: ActivationDeps = {}): Promise<ActivationResult> {
  if (isActivationDisabled(opts.env)) return { ran: false, reason: 'disabled' }

  await (deps.sleep ?? realSleep)(opts.delayMs)

  const now = deps.now ?? (() => new Date())
  const logFile = path.join(opts.logDir, logFileName(LOG_PURPOSE, opts.ideId, now()))
  const logger = (deps.createLogger ?? ((file: string) => createFileLogger(file, now)))(logFile)
  logger.info(`Extension setup triggered by ${opts.ideId} (pid ${process.pid})`)

  const hosts = await (deps.resolveHosts ?? (() => resolveExtensionHosts()))()
  const reports = await reconcileExtensions({ hosts, required: opts.required, logger, exec: deps.exec })

  const failures = reports.flatMap((r) => r.installs.filter((i) => i.status === 'failed'))
  if (failures.length > 0) logger.warn(`${failures.length} extension install(s) failed; they will be retried on next launch`)
  logger.info('Extension setup finished')

  const pruned = await pruneLogs(opts.logDir, LOG_PURPOSE, opts.ideId, opts.retention)
  return { ran: true, logFile, reports, pruned }
}
