/**
 * Built-in default values for the taskrelay configuration system.
 *
 * The values live in `config/defaults.yaml` at the package root. They are
 * the lowest-priority layer, overridden by:
 *   global config → project config → environment variables → overrides
 */

import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import yaml from 'js-yaml'
import { ConfigurationError } from '../../core/errors.js'
import { TaskRelayConfigSchema, type TaskRelayConfig } from './config-schema.js'

/** Same relative location from src/modules/config and dist/modules/config */
export const DEFAULTS_FILE = fileURLToPath(new URL('../../../config/defaults.yaml', import.meta.url))

let cached: TaskRelayConfig | null = null

function readDefaults(): TaskRelayConfig {
  let raw: unknown
  try {
    raw = yaml.load(readFileSync(DEFAULTS_FILE, 'utf-8'))
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new ConfigurationError(`Failed to read built-in defaults at ${DEFAULTS_FILE}: ${message}`, {
      filePath: DEFAULTS_FILE,
    })
  }

  const result = TaskRelayConfigSchema.safeParse(raw)
  if (!result.success) {
    const issues = result.error.issues.map((i) => `  • ${i.path.join('.')}: ${i.message}`).join('\n')
    throw new ConfigurationError(`Built-in defaults are invalid:\n${issues}`, {
      filePath: DEFAULTS_FILE,
      issues: result.error.issues,
    })
  }
  return result.data
}

/**
 * Return a fresh copy of the built-in defaults. The file is read once per
 * process; callers may mutate the copy.
 */
export function loadDefaultConfig(): TaskRelayConfig {
  if (cached === null) {
    cached = readDefaults()
  }
  return structuredClone(cached)
}
