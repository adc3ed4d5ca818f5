export { ConfigManager, DEFAULT_WATCH_CONFIG, defaultResolvedConfig, resolveConfig } from './config_manager';

export type {
  WatchConfig,
  ResolvedWatchConfig,
  ConfigLoadResult,
  InitConfigResult,
  IConfigManager,
} from './config_manager.types';

export {
  ConfigError,
  ConfigReadError,
  ConfigKeyMissingError,
  ConfigKeyInvalidError,
  ConfigAlreadyExistsError,
  isConfigError,
  isConfigReadError,
  isConfigKeyMissingError,
  isConfigKeyInvalidError,
  isConfigAlreadyExistsError,
} from './config_manager.errors';
