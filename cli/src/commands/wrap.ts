import { defineCommand } from 'citty'
import { resolveComponent } from '../catalog/components.js'
import { loadConfig } from '../config.js'
import { ToolboxError } from '../errors.js'
import { createConsoleLogger } from '../logger.js'
import { cliEntryPath } from '../paths.js'
import { registerAllWrappers, registerWrapper, type RegisterResult } from '../wrapper/registrar.js'

export const wrapCommand = defineCommand({
  meta: {
    name: 'wrap',
    description: 'Install the extension-setup wrapper in front of GUI IDE binaries'
  },
  args: {
    ide: { type: 'string', description: 'IDE to wrap (default: every installed VS Code-family IDE)' },
    binary: { type: 'string', description: 'Path of the IDE binary (default: looked up on PATH)' },
    'wrapper-dir': { type: 'string', description: 'Where wrappers are written' }
  },
  async run({ args }) {
    const logger = createConsoleLogger()
    const config = await loadConfig()
    const launcher = { node: process.execPath, cli: cliEntryPath }
    const wrapperDir = args['wrapper-dir'] ? String(args['wrapper-dir']) : config.wrapperDir

    let results: RegisterResult[]
    try {
      if (args.ide) {
        const entry = resolveComponent(String(args.ide).toLowerCase())
        if (!entry?.extensionHost) throw new Error(`Not a wrappable IDE: ${args.ide}`)
        results = [await registerWrapper({
          ideId: entry.id,
          binaryPath: args.binary ? String(args.binary) : undefined,
          wrapperDir,
          launcher,
          logger
        })]
      } else {
        results = await registerAllWrappers({ wrapperDir, launcher, logger })
      }
    } catch (error) {
      logger.err(error instanceof Error ? error.message : String(error))
      if (error instanceof ToolboxError) for (const hint of error.hints) logger.info(hint)
      process.exitCode = 1
      return
    }

    const wrapped = results.filter((r) => r.status !== 'not-installed').length
    logger.info(`${wrapped} IDE(s) wrapped`)
  }
})
