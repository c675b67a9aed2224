import { chalk } from 'zx'
import fs from 'fs-extra'
import type { Logger } from './installers/types.js'

export function createConsoleLogger(options: { verbose?: boolean } = {}): Logger {
  const out = (line: string) => process.stdout.write(line + '\n')
  const err = (line: string) => process.stderr.write(line + '\n')
  return {
    log: (msg) => out(msg),
    info: (msg) => out(`${chalk.blue('[INFO]')} ${msg}`),
    ok: (msg) => out(`${chalk.green('[SUCCESS]')} ${msg}`),
    warn: (msg) => out(`${chalk.yellow('[WARNING]')} ${msg}`),
    err: (msg) => err(`${chalk.red('[ERROR]')} ${msg}`),
    debug: (msg) => { if (options.verbose) out(chalk.gray(`[DEBUG] ${msg}`)) }
  }
}

/**
 * Plain-text logger for the detached activation task, which has no
 * terminal. Lines are appended synchronously so nothing is lost when the
 * process exits right after the last write.
 */
export function createFileLogger(file: string, now: () => Date = () => new Date()): Logger {
  fs.ensureFileSync(file)
  const write = (level: string, msg: string) => {
    fs.appendFileSync(file, `${now().toISOString()} ${level.padEnd(5)} ${msg}\n`, 'utf8')
  }
  return {
    log: (msg) => write('', msg),
    info: (msg) => write('INFO', msg),
    ok: (msg) => write('OK', msg),
    warn: (msg) => write('WARN', msg),
    err: (msg) => write('ERROR', msg),
    debug: (msg) => write('DEBUG', msg)
  }
}
