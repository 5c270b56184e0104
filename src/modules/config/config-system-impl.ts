/**
 * ConfigSystem implementation: loads configuration in hierarchy order and
 * exposes get/set operations.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults      (config/defaults.yaml)
 *     → global user config  (~/.taskrelay/config.yaml)
 *     → project config      (./.taskrelay/config.yaml)
 *     → environment vars    (TASKRELAY_* prefixed)
 *     → overrides           (passed via ConfigSystemOptions.overrides)
 */

import { readFile, writeFile, mkdir, access } from 'fs/promises'
import { join, resolve } from 'path'
import { homedir } from 'os'
import yaml from 'js-yaml'
import { createLogger } from '../../utils/logger.js'
import { isPlainObject } from '../../utils/helpers.js'
import { ConfigurationError } from '../../core/errors.js'
import {
  TaskRelayConfigSchema,
  PartialTaskRelayConfigSchema,
  type TaskRelayConfig,
  type PartialTaskRelayConfig,
} from './config-schema.js'
import { loadDefaultConfig } from './defaults.js'
import type { ConfigSystem, ConfigSystemOptions } from './config-system.js'

const logger = createLogger('config')

export const CONFIG_DIR_NAME = '.taskrelay'
export const CONFIG_FILE_NAME = 'config.yaml'

// ---------------------------------------------------------------------------
// Deep merge utility
// ---------------------------------------------------------------------------

/** Objects merge key by key; arrays and scalars replace. */
export function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base }
  for (const [key, val] of Object.entries(override)) {
    const current = result[key]
    if (isPlainObject(val) && isPlainObject(current)) {
      result[key] = deepMerge(current, val)
    } else if (val !== undefined) {
      result[key] = val
    }
  }
  return result
}

// ---------------------------------------------------------------------------
// Environment variable resolution
// ---------------------------------------------------------------------------

/**
 * Map of TASKRELAY_ environment variable names to config paths.
 * Only scalar settings (and the comma-separated abort list) are reachable.
 */
const ENV_VAR_MAP: Record<string, string> = {
  TASKRELAY_LOG_LEVEL: 'global.log_level',
  TASKRELAY_WORKER_POOL_SIZE: 'global.worker_pool_size',
  TASKRELAY_PRODUCTION_TIMEOUT_MS: 'global.production_timeout_ms',
  TASKRELAY_STAGE_RETRY_CEILING: 'global.stage_retry_ceiling',
  TASKRELAY_LOOP_TIME_CEILING_MS: 'global.loop_time_ceiling_ms',
  TASKRELAY_LOOP_MAX_AGE_HOURS: 'global.loop_max_age_hours',
  TASKRELAY_HISTORY_RETENTION_HOURS: 'global.history_retention_hours',
  TASKRELAY_STATE_DB_PATH: 'global.state_db_path',
  TASKRELAY_BASE_RETRY_DELAY_MS: 'global.base_retry_delay_ms',
  TASKRELAY_ABORT_CONDITIONS: 'global.abort_conditions',
}

const LIST_VARIABLES = new Set(['TASKRELAY_ABORT_CONDITIONS'])

function coerceEnvValue(rawValue: string): unknown {
  if (rawValue === 'true') return true
  if (rawValue === 'false') return false
  if (/^\d+$/.test(rawValue)) return parseInt(rawValue, 10)
  if (/^\d*\.\d+$/.test(rawValue)) return parseFloat(rawValue)
  return rawValue
}

/**
 * Read relevant environment variables and return a partial config overlay.
 * Invalid values are logged and ignored rather than failing the load.
 */
function readEnvOverrides(env: NodeJS.ProcessEnv): PartialTaskRelayConfig {
  let overrides: Record<string, unknown> = {}

  for (const [envKey, configPath] of Object.entries(ENV_VAR_MAP)) {
    const rawValue = env[envKey]
    if (rawValue === undefined) continue
    const value = LIST_VARIABLES.has(envKey)
      ? rawValue
          .split(',')
          .map((part) => part.trim())
          .filter((part) => part.length > 0)
      : coerceEnvValue(rawValue)
    overrides = setByPath(overrides, configPath, value)
  }

  const parsed = PartialTaskRelayConfigSchema.safeParse(overrides)
  if (!parsed.success) {
    logger.warn({ errors: parsed.error.issues }, 'Invalid environment variable overrides ignored')
    return {}
  }
  return parsed.data
}

// ---------------------------------------------------------------------------
// Dot-notation key accessor / setter
// ---------------------------------------------------------------------------

function getByPath(obj: unknown, path: string): unknown {
  let cursor: unknown = obj
  for (const part of path.split('.')) {
    if (!isPlainObject(cursor)) return undefined
    cursor = cursor[part]
  }
  return cursor
}

/**
 * Return a copy of `obj` with `path` set to `value`, creating intermediate
 * objects as needed.
 */
function setByPath(obj: Record<string, unknown>, path: string, value: unknown): Record<string, unknown> {
  const [head, ...rest] = path.split('.')
  if (head === undefined || head === '') return obj
  if (rest.length === 0) return { ...obj, [head]: value }
  const child = obj[head]
  return { ...obj, [head]: setByPath(isPlainObject(child) ? child : {}, rest.join('.'), value) }
}

function formatIssues(issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string }>): string {
  return issues.map((issue) => `  • ${issue.path.join('.')}: ${issue.message}`).join('\n')
}

// ---------------------------------------------------------------------------
// ConfigSystemImpl
// ---------------------------------------------------------------------------

export class ConfigSystemImpl implements ConfigSystem {
  private _config: TaskRelayConfig | null = null
  private readonly _projectConfigDir: string
  private readonly _globalConfigDir: string
  private readonly _overrides: PartialTaskRelayConfig
  private readonly _env: NodeJS.ProcessEnv

  constructor(options: ConfigSystemOptions = {}) {
    this._projectConfigDir = options.projectConfigDir
      ? resolve(options.projectConfigDir)
      : resolve(process.cwd(), CONFIG_DIR_NAME)
    this._globalConfigDir = options.globalConfigDir
      ? resolve(options.globalConfigDir)
      : resolve(homedir(), CONFIG_DIR_NAME)
    this._overrides = options.overrides ?? {}
    this._env = options.env ?? process.env
  }

  get isLoaded(): boolean {
    return this._config !== null
  }

  async load(): Promise<void> {
    // 1. Built-in defaults
    let merged: Record<string, unknown> = loadDefaultConfig()

    // 2-3. Global user config, then project config
    for (const dir of [this._globalConfigDir, this._projectConfigDir]) {
      const layer = await this._loadYamlFile(join(dir, CONFIG_FILE_NAME))
      if (layer !== null) {
        merged = deepMerge(merged, layer)
      }
    }

    // 4. Environment variable overrides
    const envOverrides = readEnvOverrides(this._env)
    if (Object.keys(envOverrides).length > 0) {
      merged = deepMerge(merged, envOverrides)
    }

    // 5. Programmatic overrides
    if (Object.keys(this._overrides).length > 0) {
      merged = deepMerge(merged, this._overrides)
    }

    const result = TaskRelayConfigSchema.safeParse(merged)
    if (!result.success) {
      throw new ConfigurationError(`Configuration validation failed:\n${formatIssues(result.error.issues)}`, {
        issues: result.error.issues,
      })
    }

    this._config = result.data
    logger.debug(
      { strategies: Object.keys(result.data.strategies), stateDbPath: result.data.global.state_db_path },
      'Configuration loaded successfully',
    )
  }

  getConfig(): TaskRelayConfig {
    if (this._config === null) {
      throw new ConfigurationError('Configuration has not been loaded. Call load() before getConfig().')
    }
    return this._config
  }

  get(key: string): unknown {
    return getByPath(this.getConfig(), key)
  }

  async set(key: string, value: unknown): Promise<void> {
    const existing = getByPath(this.getConfig(), key)

    // The key must resolve to something in the merged config
    if (existing === undefined) {
      throw new ConfigurationError(`Unknown config key: ${key}`, { key })
    }

    // Whole sections are not replaceable; arrays count as values
    if (isPlainObject(existing)) {
      throw new ConfigurationError(`Cannot set object key "${key}": use a more specific dot-notation path`, { key })
    }

    const projectConfigPath = join(this._projectConfigDir, CONFIG_FILE_NAME)
    const projectConfigRaw = (await this._loadYamlFile(projectConfigPath)) ?? {}
    const updated = setByPath(projectConfigRaw, key, value)

    const partial = PartialTaskRelayConfigSchema.safeParse(updated)
    if (!partial.success) {
      throw new ConfigurationError(`Invalid value for "${key}":\n${formatIssues(partial.error.issues)}`, {
        key,
        value,
        issues: partial.error.issues,
      })
    }

    await mkdir(this._projectConfigDir, { recursive: true })
    await writeFile(projectConfigPath, yaml.dump(updated), 'utf-8')
    logger.info({ key, path: projectConfigPath }, 'Config value written')

    await this.load()
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _fileExists(filePath: string): Promise<boolean> {
    try {
      await access(filePath)
      return true
    } catch {
      return false
    }
  }

  private async _loadYamlFile(filePath: string): Promise<PartialTaskRelayConfig | null> {
    if (!(await this._fileExists(filePath))) return null

    let parsed: unknown
    try {
      parsed = yaml.load(await readFile(filePath, 'utf-8'))
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      throw new ConfigurationError(`Failed to read config file at ${filePath}: ${message}`, { filePath })
    }

    // An empty file is an empty layer
    if (parsed === undefined || parsed === null) return {}

    const result = PartialTaskRelayConfigSchema.safeParse(parsed)
    if (!result.success) {
      throw new ConfigurationError(`Invalid config file at ${filePath}:\n${formatIssues(result.error.issues)}`, {
        filePath,
        issues: result.error.issues,
      })
    }
    return result.data
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new ConfigSystem instance.
 *
 * @example
 * const config = createConfigSystem()
 * await config.load()
 * const poolSize = config.getConfig().global.worker_pool_size
 */
export function createConfigSystem(options: ConfigSystemOptions = {}): ConfigSystem {
  return new ConfigSystemImpl(options)
}
