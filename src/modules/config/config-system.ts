/**
 * ConfigSystem interface: public contract for the configuration subsystem.
 *
 * All callers should depend on this interface, not the concrete implementation.
 * Create an instance via `createConfigSystem()` from config-system-impl.ts.
 */

import type { TaskRelayConfig, PartialTaskRelayConfig } from './config-schema.js'

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface ConfigSystemOptions {
  /** Path to the project-level .taskrelay/ directory (default: <cwd>/.taskrelay) */
  projectConfigDir?: string
  /** Path to the global user-level .taskrelay/ directory (default: ~/.taskrelay) */
  globalConfigDir?: string
  /** Values applied on top of every other layer, environment included */
  overrides?: PartialTaskRelayConfig
  /** Environment to read TASKRELAY_* variables from (default: process.env) */
  env?: NodeJS.ProcessEnv
}

// ---------------------------------------------------------------------------
// ConfigSystem interface
// ---------------------------------------------------------------------------

/**
 * Provides access to fully-merged, validated taskrelay configuration.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults < global config < project config < env vars < overrides
 */
export interface ConfigSystem {
  /**
   * Load and validate configuration from all sources in hierarchy order.
   * Must be called before `getConfig()`.
   * @throws {ConfigurationError} if any layer or the merged result is invalid.
   */
  load(): Promise<void>

  /**
   * @throws {ConfigurationError} if `load()` has not been called.
   */
  getConfig(): TaskRelayConfig

  /**
   * Return a single value by dot-notation key (e.g. "global.worker_pool_size").
   * @returns the value, or undefined if the key does not exist.
   */
  get(key: string): unknown

  /**
   * Persist a single scalar value to the project config file and reload.
   * @throws {ConfigurationError} if the key is unknown or the value invalid.
   */
  set(key: string, value: unknown): Promise<void>

  readonly isLoaded: boolean
}
