export { FsConfigStore, createConfigManager, DEFAULT_CONFIG_FILE } from './fs_config_store';
