import { accessSync } from 'fs'
import { dirname, resolve } from 'path'
import { fileURLToPath } from 'url'

const __dirname = dirname(fileURLToPath(import.meta.url))

function findRoot(marker: string) {
  // Walk up to 6 levels looking for the marker file
  let cur = __dirname
  for (let i = 0; i < 6; i++) {
    try {
      accessSync(resolve(cur, marker))
      return cur
    } catch {
      cur = resolve(cur, '..')
    }
  }
  return resolve(__dirname, '..', '..')
}

/** The `ide-toolbox` package directory; templates and the build context ship inside it. */
export const packageRoot = findRoot('templates/ide-wrapper.sh')
export const wrapperTemplatePath = resolve(packageRoot, 'templates', 'ide-wrapper.sh')
export const defaultBuildContext = resolve(packageRoot, 'container')

/** The compiled CLI entry generated wrappers call back into. */
export const cliEntryPath = resolve(__dirname, 'bin.js')
