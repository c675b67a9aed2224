import { defineCommand } from 'citty'
import { loadConfig } from '../config.js'
import { createConsoleLogger } from '../logger.js'
import { brokenWrappers, inspectWrappers } from '../wrapper/inspect.js'

export const doctorCommand = defineCommand({
  meta: { name: 'doctor', description: 'Check IDE wrappers and extension setup logs' },
  async run() {
    const logger = createConsoleLogger()
    const config = await loadConfig()
    const report = await inspectWrappers({ wrapperDir: config.wrapperDir, logDir: config.logDir, env: process.env })

    for (const w of report.wrappers) {
      if (!w.onPath) {
        logger.info(`${w.command}: not installed`)
        continue
      }
      if (w.wrapped) logger.ok(`${w.command}: wrapped (${w.onPath} -> ${w.linkTarget})`)
      else logger.warn(`${w.command}: not wrapped${w.linkTarget ? ` (symlink to ${w.linkTarget})` : ''}`)
      if (w.realBinary) logger.ok(`${w.command}: real binary at ${w.realBinary}`)
      else if (w.wrapped) logger.err(`${w.command}: real binary (.real) not found`)
      if (w.wrapped && !w.wrapperExecutable) logger.err(`${w.command}: wrapper is missing or not executable`)
    }

    if (report.activationDisabled) logger.warn('DISABLE_IDE_AUTO_EXTENSIONS is set; automatic extension setup is off')
    else logger.ok('Automatic extension setup is enabled')

    if (report.logs.length) {
      logger.ok(`${report.logs.length} extension setup log(s) in ${config.logDir}`)
      logger.info(`Latest: ${report.logs[0]}`)
    }
    else logger.warn('No extension setup logs yet; launch an IDE and wait a few seconds, or run: ide-toolbox reconcile')

    const broken = brokenWrappers(report)
    if (broken.length > 0) {
      for (const w of broken) logger.info(`Fix ${w.command}: reinstall it, then run: ide-toolbox wrap --ide ${w.ideId}`)
      process.exitCode = 1
    }
  }
})
