import { defineCommand } from 'citty'
import { loadConfig } from '../config.js'
import { createConsoleLogger } from '../logger.js'
import { runActivation } from '../wrapper/activation.js'

export const reconcileCommand = defineCommand({
  meta: {
    name: 'reconcile',
    description: 'Install missing required extensions into every wrapped IDE'
  },
  args: {
    ide: { type: 'string', default: 'manual', description: 'IDE that triggered this run (used in the log name)' },
    delay: { type: 'string', default: '0', description: 'Seconds to wait before reconciling' }
  },
  async run({ args }) {
    const logger = createConsoleLogger()
    const delay = Number(args.delay)
    if (!Number.isFinite(delay) || delay < 0) throw new Error(`Invalid --delay value: ${args.delay}`)

    const config = await loadConfig()
    const result = await runActivation({
      ideId: String(args.ide),
      env: process.env,
      delayMs: delay * 1000,
      logDir: config.logDir,
      retention: config.logRetention,
      required: config.extensions
    })

    if (!result.ran) {
      logger.info('Automatic extension setup is disabled (DISABLE_IDE_AUTO_EXTENSIONS)')
      return
    }
    for (const report of result.reports) {
      const failed = report.installs.filter((i) => i.status === 'failed').length
      if (!report.listed) logger.warn(`${report.ideId}: could not list extensions`)
      else if (failed > 0) logger.warn(`${report.ideId}: ${report.missing.length} missing, ${failed} failed`)
      else logger.ok(`${report.ideId}: ${report.missing.length} missing`)
    }
    logger.info(`Log: ${result.logFile}`)
  }
})
