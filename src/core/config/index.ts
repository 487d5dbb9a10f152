export { loadConfig, createDefaultConfig, parseEnvValue, CONFIG_FILENAMES, type LoadConfigOptions } from './load'
export { default as validateRunConfig } from './validate'
export { ConfigLoadError, ConfigValidationError } from './errors'
