import { defineCommand } from 'citty'
import { COMPONENTS, LANGUAGE_SERVERS } from '../catalog/components.js'

export const listCommand = defineCommand({
  meta: { name: 'list', description: 'Show available IDEs and language servers' },
  run() {
    const row = (id: string, label: string) => `  ${id.padEnd(12)}- ${label}`
    const lines: string[] = []
    lines.push('GUI IDEs:')
    for (const c of COMPONENTS.filter((c) => c.kind === 'gui')) {
      lines.push(row(c.id, c.displayName + (c.aliases.length ? ` (also: ${c.aliases.join(', ')})` : '')))
    }
    lines.push('', 'CLI IDEs:')
    for (const c of COMPONENTS.filter((c) => c.kind === 'cli')) {
      lines.push(row(c.id, c.displayName + (c.aliases.length ? ` (also: ${c.aliases.join(', ')})` : '')))
    }
    lines.push(row('all', 'Every IDE above (default)'))
    lines.push('', 'Language servers (neovim/helix):')
    lines.push(`  ${LANGUAGE_SERVERS.join(', ')}, all`)
    lines.push('', 'Examples:')
    lines.push('  ide-toolbox install zed')
    lines.push('  ide-toolbox install vscode,cursor')
    lines.push('  ide-toolbox install neovim LSP:typescript,python')
    lines.push('  ide-toolbox install --force all')
    process.stdout.write(lines.join('\n') + '\n')
  }
})
