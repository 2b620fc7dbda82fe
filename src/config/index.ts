export { loadConfig, ConfigError, STORAGE_PATH_ENV } from './loader.js'
export { DEFAULT_CONFIG } from './defaults.js'
