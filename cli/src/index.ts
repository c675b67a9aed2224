import { defineCommand, runCommand, runMain } from 'citty'
import { readFileSync } from 'fs'
import { fileURLToPath } from 'url'
import { dirname, join } from 'path'
import { installCommand } from './commands/install.js'
import { listCommand } from './commands/list.js'
import { wrapCommand } from './commands/wrap.js'
import { launchCommand } from './commands/launch.js'
import { reconcileCommand } from './commands/reconcile.js'
import { doctorCommand } from './commands/doctor.js'

const __dirname = dirname(fileURLToPath(import.meta.url))
const packageJson: { version: string } = JSON.parse(
  readFileSync(join(__dirname, '../package.json'), 'utf-8')
)

export const root = defineCommand({
  meta: {
    name: 'ide-toolbox',
    version: packageJson.version,
    description: 'Provision a distrobox developer toolbox with IDEs and host launchers'
  },
  subCommands: {
    install: installCommand,
    list: listCommand,
    wrap: wrapCommand,
    launch: launchCommand,
    reconcile: reconcileCommand,
    doctor: doctorCommand
  }
})

/** Arguments addressed to ide-toolbox itself: everything before the first `--`. */
export function ownArgs(rawArgs: string[]): string[] {
  const idx = rawArgs.indexOf('--')
  return idx === -1 ? rawArgs : rawArgs.slice(0, idx)
}

/**
 * `runMain` treats `--help` anywhere in argv as a request for our usage,
 * which would swallow `code --help` behind a wrapper. Past a `--`, only the
 * arguments before it decide that.
 */
export async function runCli(rawArgs: string[] = process.argv.slice(2)): Promise<void> {
  const own = ownArgs(rawArgs)
  if (own.length === rawArgs.length || own.includes('--help') || own.includes('-h')) {
    await runMain(root, { rawArgs })
    return
  }
  try {
    await runCommand(root, { rawArgs })
  } catch (error) {
    process.stderr.write(`ide-toolbox: ${error instanceof Error ? error.message : String(error)}\n`)
    process.exitCode = 1
  }
}
