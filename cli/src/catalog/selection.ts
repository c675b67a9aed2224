import { COMPONENTS, LANGUAGE_SERVERS, componentIds, resolveComponent } from './components.js'
import { EmptySelectionError, UnknownComponentError } from '../errors.js'
import type { Selection } from '../installers/types.js'

const ALL = 'all'
const LSP_PREFIX = /^lsp:/i

function tokenize(raw: string): string[] {
  return raw.split(',').map((t) => t.trim()).filter((t) => t.length > 0)
}

/**
 * Parse a comma-separated component list. Tokens are trimmed and
 * case-folded, aliases map to canonical ids, duplicates keep their first
 * position. Every unknown token is reported in one error.
 */
export function parseSelection(raw: string): Selection {
  const ids: string[] = []
  const unknown: string[] = []
  let all = false

  for (const token of tokenize(raw)) {
    const lowered = token.toLowerCase()
    if (lowered === ALL) {
      all = true
      continue
    }
    const entry = resolveComponent(lowered)
    if (!entry) {
      unknown.push(token)
      continue
    }
    if (!ids.includes(entry.id)) ids.push(entry.id)
  }

  if (unknown.length > 0) throw new UnknownComponentError(unknown, 'component', componentIds())
  if (all) return { ids: componentIds(), all: true }
  if (ids.length === 0) throw new EmptySelectionError()
  return { ids, all: false }
}

/** Parse `LSP:a,b` (prefix optional). An empty list is valid. */
export function parseLanguageServers(raw: string | undefined): string[] {
  if (!raw) return []
  const servers: string[] = []
  const unknown: string[] = []

  for (const token of tokenize(raw.replace(LSP_PREFIX, ''))) {
    const lowered = token.toLowerCase()
    if (lowered === ALL) return [...LANGUAGE_SERVERS]
    if (!LANGUAGE_SERVERS.includes(lowered)) {
      unknown.push(token)
      continue
    }
    if (!servers.includes(lowered)) servers.push(lowered)
  }

  if (unknown.length > 0) throw new UnknownComponentError(unknown, 'language server', LANGUAGE_SERVERS)
  return servers
}

export function isLanguageServerArg(token: string): boolean {
  return LSP_PREFIX.test(token)
}

/** Separate the component list from the `LSP:` token among positional args. */
export function splitPositionals(positionals: readonly string[]): { components?: string; lsp?: string } {
  let components: string | undefined
  let lsp: string | undefined
  for (const token of positionals) {
    if (isLanguageServerArg(token)) lsp = token
    else components = components === undefined ? token : `${components},${token}`
  }
  return { components, lsp }
}

export function languageServerWarning(selection: Selection, servers: readonly string[]): string | undefined {
  if (servers.length === 0) return undefined
  const consumers = COMPONENTS.filter((c) => c.usesLanguageServers && selection.ids.includes(c.id))
  if (consumers.length > 0) return undefined
  const names = COMPONENTS.filter((c) => c.usesLanguageServers).map((c) => c.id).join('/')
  return `Language servers (${servers.join(', ')}) only apply to ${names}; none of them is selected`
}

/** The value passed to the image build as `IDE=`. */
export function buildArgFor(selection: Selection): string {
  return selection.all ? ALL : selection.ids.join(',')
}
