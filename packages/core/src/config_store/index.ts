/**
 * ConfigStore - watchrun.json persistence
 *
 * @example
 * ```typescript
 * import { FsConfigStore, createConfigManager } from './config_store/fs';
 * import { MemoryConfigStore } from './config_store/memory';
 * ```
 */

export type { ConfigStore } from './config_store';
export { parseConfigText, serializeConfig } from './config_store';
export { FsConfigStore, createConfigManager, DEFAULT_CONFIG_FILE } from './fs';
export { MemoryConfigStore } from './memory';
