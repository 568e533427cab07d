export * from './wasm'
export * from './errors'
export {
  configFileSchema,
  createSnapshot,
  DEFAULT_CONFIG_PATH,
  DynamicConfig,
  EMPTY_SNAPSHOT,
  ensureConfigFile,
  parseConfig,
  saveConfig,
  toConfigFile
} from './config/dynamic-config'
export type { ConfigFile, ConfigSnapshot, DynamicConfigOptions } from './config/dynamic-config'
export type { FileWatcher, WatchCallbacks, WatchFactory, WatchHandle } from './utils/file-watch'
