export { ConfigSchema, ConfigDefaults, type RawConfig, type Config, type SearchConfig, type ResolvedProviderConfig } from './schema.js';
export {
  loadConfig,
  loadConfigWithMeta,
  getConfigPath,
  expandTilde,
  ConfigError,
  type LoadConfigOptions,
  type LoadConfigResult,
} from './loader.js';
