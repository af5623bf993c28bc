export { loadConfig, CONFIG_FILENAME } from './load'
export type { LoadConfigOptions } from './load'
export { default as validateConfig } from './validate'
export { ConfigLoadError, ConfigValidationError } from './errors'
