/**
 * @entry Config
 *
 * YAML loading, schema validation, env overrides
 */

export { loadConfig, getDefaultConfig, clearConfigCache, applyEnvOverrides, CONFIG_FILENAME } from './loadConfig.js'
export * from './schema.js'
