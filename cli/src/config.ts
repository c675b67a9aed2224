import fs from 'fs-extra'
import * as os from 'os'
import * as path from 'path'
import * as TOML from 'toml'
import { ConfigError } from './errors.js'

export const DISABLE_ENV = 'DISABLE_IDE_AUTO_EXTENSIONS'
export const RECONCILING_ENV = 'IDE_TOOLBOX_RECONCILING'
export const LOG_PURPOSE = 'ide-extension-setup'

export const REQUIRED_EXTENSIONS: readonly string[] = Object.freeze([
  'ms-vscode-remote.remote-containers',
  'ms-vscode-remote.remote-ssh',
  'ms-azuretools.vscode-docker',
  'DankLinux.dms-theme'
])

export interface ToolboxConfig {
  containerName: string
  imageName: string
  buildContext: string | undefined
  settleSeconds: number
  activationDelaySeconds: number
  logRetention: number
  logDir: string
  wrapperDir: string
  extensions: string[]
}

export function defaultConfig(): ToolboxConfig {
  return {
    containerName: 'devtoolbox',
    imageName: 'localhost/devtoolbox',
    buildContext: undefined,
    settleSeconds: 3,
    activationDelaySeconds: 10,
    logRetention: 5,
    logDir: os.tmpdir(),
    wrapperDir: '/usr/local/bin',
    extensions: [...REQUIRED_EXTENSIONS]
  }
}

export function configPath(env: NodeJS.ProcessEnv = process.env, homeDir: string = os.homedir()): string {
  const base = env.XDG_CONFIG_HOME || path.join(homeDir, '.config')
  return path.join(base, 'ide-toolbox', 'config.toml')
}

/** `1` or `true` (any case) disables auto-installing extensions. */
export function isActivationDisabled(env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env[DISABLE_ENV]?.trim().toLowerCase()
  return value === '1' || value === 'true'
}

export async function loadConfig(file: string = configPath()): Promise<ToolboxConfig> {
  const config = defaultConfig()
  if (!(await fs.pathExists(file))) return config

  let parsed: unknown
  try {
    parsed = TOML.parse(await fs.readFile(file, 'utf8'))
  } catch (error) {
    throw new ConfigError(`Invalid TOML in ${file}: ${error instanceof Error ? error.message : String(error)}`, file)
  }
  if (!isRecord(parsed)) return config
  const data = parsed

  const str = (key: string): string | undefined => {
    const v = data[key]
    if (v === undefined) return undefined
    if (typeof v !== 'string' || v.trim() === '') throw new ConfigError(`'${key}' must be a non-empty string`, file)
    return v
  }
  const num = (key: string): number | undefined => {
    const v = data[key]
    if (v === undefined) return undefined
    if (typeof v !== 'number' || !Number.isFinite(v) || v < 0) throw new ConfigError(`'${key}' must be a non-negative number`, file)
    return v
  }

  const extensions = data.extensions
  if (extensions !== undefined) {
    if (!Array.isArray(extensions) || !extensions.every((e): e is string => typeof e === 'string')) {
      throw new ConfigError(`'extensions' must be an array of strings`, file)
    }
    config.extensions = extensions
  }

  config.containerName = str('container_name') ?? config.containerName
  config.imageName = str('image_name') ?? config.imageName
  config.buildContext = str('build_context') ?? config.buildContext
  config.logDir = str('log_dir') ?? config.logDir
  config.wrapperDir = str('wrapper_dir') ?? config.wrapperDir
  config.settleSeconds = num('settle_seconds') ?? config.settleSeconds
  config.activationDelaySeconds = num('activation_delay_seconds') ?? config.activationDelaySeconds
  const retention = num('log_retention')
  if (retention !== undefined) {
    if (!Number.isInteger(retention) || retention < 1) throw new ConfigError(`'log_retention' must be a positive integer`, file)
    config.logRetention = retention
  }
  return config
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
