import { defineCommand } from 'citty'
import * as p from '@clack/prompts'
import fs from 'fs-extra'
import { resolve } from 'path'
import { COMPONENTS, LANGUAGE_SERVERS } from '../catalog/components.js'
import {
  languageServerWarning,
  parseLanguageServers,
  parseSelection,
  splitPositionals
} from '../catalog/selection.js'
import { loadConfig } from '../config.js'
import { ToolboxError } from '../errors.js'
import { createConsoleLogger } from '../logger.js'
import { runInstaller } from '../installers/main.js'
import { createShellToolchain } from '../installers/toolchain.js'
import type { InstallationRun, Logger, RunReport } from '../installers/types.js'
import { defaultBuildContext } from '../paths.js'

export const installCommand = defineCommand({
  meta: {
    name: 'install',
    description: 'Build the toolbox image, create the distrobox and export IDEs to the host'
  },
  args: {
    components: { type: 'positional', required: false, description: 'Comma-separated IDEs (default: all), optionally followed by LSP:server,...' },
    force: { type: 'boolean', alias: 'f', description: 'Recreate an existing container without asking' },
    export: { type: 'boolean', default: true, description: 'Export applications to the host (--no-export to skip)' },
    'skip-export': { type: 'boolean', alias: 'n', description: 'Same as --no-export' },
    verbose: { type: 'boolean', alias: 'v', description: 'Verbose output' },
    debug: { type: 'boolean', alias: 'd', description: 'Detailed diagnostics (implies --verbose)' },
    interactive: { type: 'boolean', alias: 'i', description: 'Pick IDEs from a menu even if some were given' },
    'mount-containers': { type: 'boolean', description: 'Mount host Docker/Podman sockets (may interfere with export)' },
    container: { type: 'string', description: 'Container name' },
    image: { type: 'string', description: 'Image name' },
    context: { type: 'string', description: 'Build context directory containing the Containerfile' },
    'test-browser': { type: 'boolean', description: 'Not handled by this tool' },
    'fix-browser': { type: 'boolean', description: 'Not handled by this tool' }
  },
  async run({ args }) {
    const verbose = Boolean(args.verbose || args.debug)
    const logger = createConsoleLogger({ verbose })
    if (args['test-browser'] || args['fix-browser']) {
      logger.err('Browser integration checks are not handled by ide-toolbox')
      logger.info('Test manually: distrobox enter <container> -- xdg-open https://example.com')
      process.exitCode = 1
      return
    }

    let selectionLabel = 'all'
    let succeeded = false
    let aborted = false

    try {
      const config = await loadConfig()
      const positionals = splitPositionals(args._.map(String))
      let rawComponents = positionals.components
      let rawLsp = positionals.lsp

      if (args.interactive || (!rawComponents && process.stdout.isTTY)) {
        const picked = await promptSelection()
        if (!picked) {
          p.cancel('Install aborted')
          aborted = true
          return
        }
        rawComponents = picked.components
        rawLsp = picked.lsp ?? rawLsp
      }

      const selection = parseSelection(rawComponents ?? 'all')
      const languageServers = parseLanguageServers(rawLsp)
      selectionLabel = selection.all ? 'all' : selection.ids.join(',')
      const lspWarning = languageServerWarning(selection, languageServers)
      if (lspWarning) logger.warn(lspWarning)

      const run: InstallationRun = {
        selection,
        languageServers,
        force: Boolean(args.force),
        skipExport: Boolean(args['skip-export']) || args.export === false,
        verbose,
        debug: Boolean(args.debug),
        mountContainers: Boolean(args['mount-containers']),
        containerName: args.container ? String(args.container) : config.containerName,
        imageName: args.image ? String(args.image) : config.imageName,
        buildContext: resolve(args.context ? String(args.context) : config.buildContext ?? defaultBuildContext)
      }

      if (!(await fs.pathExists(resolve(run.buildContext, 'Containerfile')))) {
        throw new ToolboxError('ConfigError', `No Containerfile in build context ${run.buildContext}`, [
          'Point --context at the directory containing the Containerfile'
        ])
      }

      printPlan(logger, run)
      const report = await runInstaller(run, {
        toolchain: createShellToolchain({ logger, verbose }),
        logger,
        confirmRecreate: () => confirmRecreate(run.containerName),
        settleMs: config.settleSeconds * 1000,
        onEvent: (event) => logger.debug(`event ${JSON.stringify(event)}`)
      })

      if (report.error) throw report.error
      printCompletion(logger, run, report)
      succeeded = report.exitCode === 0
    } catch (error) {
      reportError(logger, error)
    } finally {
      if (!succeeded) {
        process.exitCode = 1
        if (!aborted) printTroubleshooting(logger, selectionLabel)
      }
    }
  }
})

async function promptSelection(): Promise<{ components: string; lsp?: string } | null> {
  p.intro('ide-toolbox · Install')
  const gui = await p.multiselect({
    message: 'Select GUI IDEs to install',
    options: COMPONENTS.filter((c) => c.kind === 'gui').map((c) => ({ value: c.id, label: c.displayName })),
    initialValues: ['zed'],
    required: false
  })
  if (p.isCancel(gui)) return null
  const cli = await p.multiselect({
    message: 'Select CLI IDEs to install',
    options: COMPONENTS.filter((c) => c.kind === 'cli').map((c) => ({ value: c.id, label: c.displayName })),
    initialValues: ['neovim'],
    required: false
  })
  if (p.isCancel(cli)) return null

  const picked = [...gui, ...cli]
  if (picked.length === 0) return { components: '' }

  let lsp: string | undefined
  const lspCapable = COMPONENTS.filter((c) => c.usesLanguageServers).map((c) => c.id)
  if (picked.some((id) => lspCapable.includes(id))) {
    const servers = await p.multiselect({
      message: 'Language servers for Neovim/Helix (optional)',
      options: LANGUAGE_SERVERS.map((s) => ({ value: s, label: s })),
      required: false
    })
    if (p.isCancel(servers)) return null
    if (servers.length > 0) lsp = `LSP:${servers.join(',')}`
  }
  return { components: picked.join(','), lsp }
}

async function confirmRecreate(name: string): Promise<boolean> {
  if (!process.stdin.isTTY) return false
  const answer = await p.confirm({ message: `Container '${name}' exists. Recreate it?`, initialValue: false })
  return !p.isCancel(answer) && answer
}

function printPlan(logger: Logger, run: InstallationRun) {
  logger.info(`Installing IDEs: ${run.selection.all ? 'all' : run.selection.ids.join(', ')}`)
  if (run.languageServers.length) logger.info(`Language servers: ${run.languageServers.join(', ')}`)
  if (run.force) logger.info('Force mode enabled - will recreate existing containers')
  if (run.skipExport) logger.info('Export disabled - will build and create container only')
  if (run.debug) logger.info('Debug mode enabled - detailed diagnostics will be shown')
}

function printCompletion(logger: Logger, run: InstallationRun, report: RunReport) {
  const lines: string[] = []
  lines.push('')
  lines.push('ide-toolbox: Installation summary')
  lines.push('──────────────────────────────────')
  lines.push(`Container: ${run.containerName}${report.reusedContainer ? ' (existing container kept)' : ''}`)
  lines.push(`Image: ${run.imageName}`)
  const exported = Object.entries(report.outcomes).filter(([, o]) => o.kind === 'success').map(([id]) => id)
  if (!run.skipExport) lines.push(`Exported: ${exported.join(', ') || 'none'}`)
  if (report.status === 'partial') lines.push(`Export failed: ${report.failed.join(', ')}`)
  lines.push('')
  lines.push('Useful commands:')
  lines.push(`  - Enter the container:   distrobox enter ${run.containerName}`)
  lines.push(`  - Reinstall or update:   ide-toolbox install --force ${run.selection.all ? 'all' : run.selection.ids.join(',')}`)
  if (report.status === 'partial') {
    lines.push(`  - Export by hand:        distrobox enter ${run.containerName} -- distrobox-export --app <app_name>`)
  }
  lines.push('')
  logger.log(lines.join('\n'))
  if (report.status === 'success') logger.ok('IDE installation complete')
  else logger.warn('IDE installation complete with export failures')
}

function reportError(logger: Logger, error: unknown) {
  if (error instanceof ToolboxError) {
    logger.err(error.message)
    for (const hint of error.hints) logger.info(hint)
    return
  }
  logger.err(error instanceof Error ? error.message : String(error))
}

function printTroubleshooting(logger: Logger, selection: string) {
  logger.log([
    '',
    'Troubleshooting tips:',
    `  • Run with --verbose for more details: ide-toolbox install --verbose ${selection}`,
    '  • Check container status: distrobox list',
    `  • Try --force to recreate everything: ide-toolbox install --force ${selection}`,
    '  • Manual export: distrobox enter <container> -- distrobox-export --app <app_name>'
  ].join('\n'))
}
