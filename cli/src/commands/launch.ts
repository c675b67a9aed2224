import { defineCommand } from 'citty'
import { loadConfig } from '../config.js'
import { ToolboxError } from '../errors.js'
import { cliEntryPath } from '../paths.js'
import { launchWrapped } from '../wrapper/launch.js'

/** Arguments after the first `--` belong to the wrapped IDE. */
export function passthroughArgs(rawArgs: string[]): string[] {
  const idx = rawArgs.indexOf('--')
  return idx === -1 ? [] : rawArgs.slice(idx + 1)
}

export const launchCommand = defineCommand({
  meta: {
    name: 'launch',
    description: 'Run a wrapped IDE and schedule extension setup (called by generated wrappers)'
  },
  args: {
    ide: { type: 'string', required: true, description: 'Canonical IDE id baked into the wrapper' },
    real: { type: 'string', required: true, description: 'Path of the real IDE binary' }
  },
  async run({ args, rawArgs }) {
    try {
      const config = await loadConfig()
      const result = await launchWrapped({
        ideId: String(args.ide),
        realBinaryPath: String(args.real ?? ''),
        args: passthroughArgs(rawArgs),
        env: process.env,
        node: process.execPath,
        cli: cliEntryPath,
        delaySeconds: config.activationDelaySeconds
      })
      if (result.signal) {
        process.kill(process.pid, result.signal)
        return
      }
      process.exitCode = result.code ?? 1
    } catch (error) {
      if (error instanceof ToolboxError) {
        process.stderr.write(`ide-toolbox: ${error.message}\n`)
        for (const hint of error.hints) process.stderr.write(`  ${hint}\n`)
        process.exitCode = 127
        return
      }
      throw error
    }
  }
})
