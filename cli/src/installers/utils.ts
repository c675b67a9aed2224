import { $, which } from 'zx'
import { spawn } from 'node:child_process'
import type { CommandResult, Logger } from './types.js'

// zx `$` captures output for commands whose result we branch on;
// commands whose output belongs to the user go through spawn with
// inherited stdio.

export type CommandExecutor = (cmd: string, args: string[]) => Promise<CommandResult>

export async function resolveCmd(cmd: string): Promise<string | undefined> {
  try {
    return await which(cmd)
  } catch {
    return undefined
  }
}

export const captureCommand: CommandExecutor = async (cmd, args) => {
  const out = await $({ nothrow: true, quiet: true })`${cmd} ${args}`
  return {
    exitCode: out.exitCode ?? 1,
    stdout: out.stdout,
    stderr: out.stderr
  }
}

/** Run with inherited stdio; resolves with the exit code instead of throwing. */
export async function runCommand(
  cmd: string,
  args: string[],
  options: { logger?: Logger; cwd?: string } = {}
): Promise<number> {
  options.logger?.debug(`$ ${formatCommand(cmd, args)}`)
  const proc = spawn(cmd, args, {
    stdio: 'inherit',
    cwd: options.cwd || process.cwd(),
    shell: false
  })
  return await new Promise<number>((resolve, reject) => {
    proc.on('error', reject)
    proc.on('exit', (code) => resolve(code ?? 1))
  })
}

export function formatCommand(cmd: string, args: string[]): string {
  return [cmd, ...args].map((a) => (a.includes(' ') ? `"${a}"` : a)).join(' ')
}

export function timestamp(date: Date = new Date()): string {
  return date.toISOString().replace(/[:.]/g, '-').slice(0, -5)
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}
