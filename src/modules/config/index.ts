/**
 * Barrel exports for the config module.
 */

export { createConfigSystem, ConfigSystemImpl, deepMerge, CONFIG_DIR_NAME, CONFIG_FILE_NAME } from './config-system-impl.js'
export type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
export {
  TaskRelayConfigSchema,
  PartialTaskRelayConfigSchema,
  StrategyConfigSchema,
  QualityGatesConfigSchema,
  CURRENT_CONFIG_FORMAT_VERSION,
} from './config-schema.js'
export type {
  TaskRelayConfig,
  PartialTaskRelayConfig,
  GlobalSettings,
  StrategyConfig,
  StageOverride,
  QualityGatesConfig,
} from './config-schema.js'
export { loadDefaultConfig, DEFAULTS_FILE } from './defaults.js'
export { toStrategies, toRetryStrategy } from './strategies.js'
