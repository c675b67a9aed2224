import type { ComponentEntry } from '../installers/types.js'

const CLI_EXPORT_PATH = '~/.local/bin'

const ENTRIES: ComponentEntry[] = [
  {
    id: 'zed',
    displayName: 'Zed',
    kind: 'gui',
    usesLanguageServers: false,
    aliases: [],
    installProcedure: 'install_zed',
    probes: ['zed'],
    exportTarget: { type: 'app', app: 'zed' }
  },
  {
    id: 'vscode',
    displayName: 'VS Code',
    kind: 'gui',
    usesLanguageServers: false,
    aliases: ['code'],
    installProcedure: 'install_vscode',
    probes: ['code'],
    exportTarget: { type: 'app', app: 'code' },
    extensionHost: { command: 'code' }
  },
  {
    id: 'windsurf',
    displayName: 'Windsurf',
    kind: 'gui',
    usesLanguageServers: false,
    aliases: [],
    installProcedure: 'install_windsurf',
    probes: ['windsurf'],
    exportTarget: { type: 'app', app: 'windsurf' },
    extensionHost: { command: 'windsurf' }
  },
  {
    id: 'cursor',
    displayName: 'Cursor',
    kind: 'gui',
    usesLanguageServers: false,
    aliases: [],
    installProcedure: 'install_cursor',
    probes: ['cursor'],
    exportTarget: { type: 'app', app: 'cursor' },
    extensionHost: { command: 'cursor' }
  },
  {
    id: 'jetbrains',
    displayName: 'JetBrains Toolbox',
    kind: 'gui',
    usesLanguageServers: false,
    aliases: ['toolbox', 'jetbrains-toolbox'],
    installProcedure: 'install_jetbrains',
    probes: ['jetbrains-toolbox'],
    exportTarget: { type: 'app', app: 'jetbrains-toolbox' }
  },
  {
    id: 'neovim',
    displayName: 'Neovim',
    kind: 'cli',
    usesLanguageServers: true,
    aliases: ['nvim'],
    installProcedure: 'install_neovim',
    probes: ['nvim'],
    exportTarget: { type: 'bin', path: '/usr/bin/nvim' }
  },
  {
    id: 'emacs',
    displayName: 'Emacs',
    kind: 'cli',
    usesLanguageServers: false,
    aliases: [],
    installProcedure: 'install_emacs',
    probes: ['emacs'],
    exportTarget: { type: 'bin', path: '/usr/bin/emacs' }
  },
  {
    id: 'helix',
    displayName: 'Helix',
    kind: 'cli',
    usesLanguageServers: true,
    aliases: ['hx'],
    installProcedure: 'install_helix',
    probes: ['hx', 'helix'],
    exportTarget: { type: 'bin', path: '/usr/bin/hx' }
  }
]

export const COMPONENTS: readonly ComponentEntry[] = Object.freeze(ENTRIES.map((entry) => Object.freeze(entry)))

export const LANGUAGE_SERVERS: readonly string[] = Object.freeze([
  'typescript', 'python', 'rust', 'go', 'clang', 'lua', 'bash',
  'html', 'css', 'json', 'yaml', 'docker', 'markdown'
])

const byToken = new Map<string, ComponentEntry>()
for (const entry of COMPONENTS) {
  byToken.set(entry.id, entry)
  for (const alias of entry.aliases) byToken.set(alias, entry)
}

/** Resolve a lowercase token (alias or id) to its catalog entry. */
export function resolveComponent(token: string): ComponentEntry | undefined {
  return byToken.get(token)
}

export function getComponent(id: string): ComponentEntry {
  const entry = byToken.get(id)
  if (!entry) throw new Error(`Component not in catalog: ${id}`)
  return entry
}

export function componentIds(): string[] {
  return COMPONENTS.map((c) => c.id)
}

export function extensionHosts(): ComponentEntry[] {
  return COMPONENTS.filter((c) => c.extensionHost !== undefined)
}

export function cliExportPath(homeDir: string): string {
  return CLI_EXPORT_PATH.replace(/^~/, homeDir)
}
