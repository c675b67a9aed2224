import fs from 'fs-extra'
import { spawn, type SpawnOptions } from 'node:child_process'
import { RECONCILING_ENV, isActivationDisabled } from '../config.js'
import { RealBinaryMissingError } from '../errors.js'

export interface LaunchOptions {
  ideId: string
  realBinaryPath: string
  args: string[]
  env: NodeJS.ProcessEnv
  /** node + CLI entry used to start the background task */
  node: string
  cli: string
  delaySeconds: number
}

/** The part of a ChildProcess the launcher relies on. */
export interface ProcessHandle {
  on(event: 'error', listener: (error: Error) => void): unknown
  on(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown
  unref(): void
  kill(signal?: NodeJS.Signals): boolean
}

export interface SignalSource {
  on(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown
  off(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown
}

export interface LaunchDeps {
  spawn?: (cmd: string, args: string[], options: SpawnOptions) => ProcessHandle
  exists?: (p: string) => Promise<boolean>
  onWarning?: (msg: string) => void
  signals?: SignalSource
}

export interface LaunchResult {
  code: number | null
  signal: NodeJS.Signals | null
  activationScheduled: boolean
}

// The terminal delivers these to the whole foreground group, the IDE included.
const TERMINAL_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGQUIT']
const FORWARDED_SIGNALS: NodeJS.Signals[] = ['SIGTERM', 'SIGHUP']

export function activationArgs(cli: string, ideId: string, delaySeconds: number): string[] {
  return [cli, 'reconcile', '--ide', ideId, '--delay', String(delaySeconds)]
}

/**
 * Start the detached reconcile task. It gets its own process group and no
 * stdio so it outlives the wrapper and the terminal.
 */
function scheduleActivation(
  opts: LaunchOptions,
  doSpawn: NonNullable<LaunchDeps['spawn']>,
  warn: (msg: string) => void
): void {
  const child = doSpawn(opts.node, activationArgs(opts.cli, opts.ideId, opts.delaySeconds), {
    detached: true,
    stdio: 'ignore',
    env: { ...opts.env, [RECONCILING_ENV]: '1' }
  })
  child.on('error', (error) => warn(`ide-toolbox: extension setup did not start: ${error.message}`))
  child.unref()
}

export async function launchWrapped(opts: LaunchOptions, deps: LaunchDeps = {}): Promise<LaunchResult> {
  const doSpawn = deps.spawn ?? spawn
  const exists = deps.exists ?? ((p: string) => fs.pathExists(p))
  const warn = deps.onWarning ?? ((msg: string) => process.stderr.write(`${msg}\n`))

  if (!opts.realBinaryPath || !(await exists(opts.realBinaryPath))) {
    throw new RealBinaryMissingError(opts.ideId, opts.realBinaryPath || '(empty path)')
  }

  let activationScheduled = false
  if (!isActivationDisabled(opts.env) && opts.env[RECONCILING_ENV] !== '1') {
    try {
      scheduleActivation(opts, doSpawn, warn)
      activationScheduled = true
    } catch (error) {
      warn(`ide-toolbox: could not schedule extension setup: ${String(error)}`)
    }
  }

  const signals: SignalSource = deps.signals ?? process
  const child = doSpawn(opts.realBinaryPath, opts.args, { stdio: 'inherit', env: opts.env })
  const forward = (signal: NodeJS.Signals) => { child.kill(signal) }
  const ignore = () => {}
  for (const signal of FORWARDED_SIGNALS) signals.on(signal, forward)
  for (const signal of TERMINAL_SIGNALS) signals.on(signal, ignore)

  try {
    return await new Promise<LaunchResult>((resolve, reject) => {
      child.on('error', reject)
      child.on('exit', (code, signal) => resolve({ code, signal, activationScheduled }))
    })
  } finally {
    for (const signal of FORWARDED_SIGNALS) signals.off(signal, forward)
    for (const signal of TERMINAL_SIGNALS) signals.off(signal, ignore)
  }
}
