export type ErrorCode =
  | 'UnknownComponent'
  | 'EmptySelection'
  | 'BuildFailed'
  | 'ContainerCreateFailed'
  | 'RealBinaryMissing'
  | 'WrapperInstallFailed'
  | 'ConfigError'

/**
 * Base for every error the toolbox raises on purpose. `hints` are concrete
 * next steps printed under the message.
 */
export class ToolboxError extends Error {
  readonly code: ErrorCode
  readonly hints: string[]

  constructor(code: ErrorCode, message: string, hints: string[] = [], options?: { cause?: unknown }) {
    super(message, options)
    this.name = `${code}Error`
    this.code = code
    this.hints = hints
  }
}

export class UnknownComponentError extends ToolboxError {
  readonly tokens: string[]

  constructor(tokens: string[], kind: 'component' | 'language server', known: readonly string[]) {
    const label = kind === 'component' ? 'Unknown component' : 'Unknown language server'
    super(
      'UnknownComponent',
      `${label}${tokens.length > 1 ? 's' : ''}: ${tokens.join(', ')}`,
      [`Available: ${known.join(', ')}`, 'Run `ide-toolbox list` to see aliases']
    )
    this.tokens = tokens
  }
}

export class EmptySelectionError extends ToolboxError {
  constructor() {
    super('EmptySelection', 'No components selected', [
      'Pass a comma-separated list, e.g. `ide-toolbox install zed,cursor`',
      'Or run `ide-toolbox install --interactive`'
    ])
  }
}

export class BuildFailedError extends ToolboxError {
  readonly exitCode: number

  constructor(exitCode: number, rerun: string) {
    super('BuildFailed', `Container build failed (exit code ${exitCode})`, [
      `Run with --verbose for the full build output: ${rerun} --verbose`
    ])
    this.exitCode = exitCode
  }
}

export class ContainerCreateFailedError extends ToolboxError {
  constructor(containerName: string, detail: string) {
    super('ContainerCreateFailed', `Failed to create distrobox container '${containerName}': ${detail}`, [
      'Check container status: distrobox list',
      `Recreate from scratch: ide-toolbox install --force`
    ])
  }
}

export class RealBinaryMissingError extends ToolboxError {
  constructor(ideId: string, realBinaryPath: string) {
    super('RealBinaryMissing', `Real binary for '${ideId}' not found at ${realBinaryPath}`, [
      `Reinstall the IDE, then re-register its wrapper: ide-toolbox wrap --ide ${ideId}`
    ])
  }
}

export class WrapperInstallFailedError extends ToolboxError {
  constructor(ideId: string, step: string, cause: unknown) {
    super('WrapperInstallFailed', `Wrapping '${ideId}' failed while trying to ${step}; original binary restored`, [
      'Re-run with sufficient permissions (the wrapper directory usually needs root)'
    ], { cause })
  }
}

export class ConfigError extends ToolboxError {
  constructor(message: string, file: string) {
    super('ConfigError', message, [`Fix or remove ${file}`])
  }
}
