import type { Toolchain } from './toolchain.js'

export type ComponentKind = 'gui' | 'cli'
export type RunState = 'Idle' | 'Building' | 'CreatingContainer' | 'Exporting' | 'Done' | 'Failed'
export type RunStatus = 'success' | 'partial' | 'failed'
export type Phase = 'build' | 'create' | 'export'
export type EventOutcome = 'started' | 'succeeded' | 'skipped' | 'failed'

export type ExportTarget =
  | { type: 'app'; app: string }
  | { type: 'bin'; path: string }

export interface ComponentEntry {
  id: string
  displayName: string
  kind: ComponentKind
  usesLanguageServers: boolean
  aliases: readonly string[]
  installProcedure: string
  probes: readonly string[]
  exportTarget: ExportTarget
  extensionHost?: { command: string }
}

export interface Selection {
  ids: string[]
  all: boolean
}

export interface InstallationRun {
  selection: Selection
  languageServers: string[]
  force: boolean
  skipExport: boolean
  verbose: boolean
  debug: boolean
  mountContainers: boolean
  containerName: string
  imageName: string
  buildContext: string
}

export type Outcome =
  | { kind: 'success' }
  | { kind: 'skipped'; reason: string }
  | { kind: 'failed'; reason: string }

export interface ProgressEvent {
  phase: Phase
  componentId?: string
  outcome: EventOutcome
  reason?: string
}

export interface RunReport {
  state: RunState
  status: RunStatus
  outcomes: Record<string, Outcome>
  failed: string[]
  exitCode: number
  reusedContainer: boolean
  error?: Error
}

export interface CommandResult {
  exitCode: number
  stdout: string
  stderr: string
}

export interface Logger {
  log: (msg: string) => void
  info: (msg: string) => void
  ok: (msg: string) => void
  warn: (msg: string) => void
  err: (msg: string) => void
  debug: (msg: string) => void
}

export interface InstallerContext {
  run: InstallationRun
  toolchain: Toolchain
  logger: Logger
  homeDir: string
  settleMs: number
  readyAttempts: number
  sleep: (ms: number) => Promise<void>
  confirmRecreate: () => Promise<boolean>
  emit: (event: ProgressEvent) => void
}
