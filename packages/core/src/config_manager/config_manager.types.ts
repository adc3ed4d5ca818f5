/**
 * ConfigManager Types
 */

import type { ConfigError } from './config_manager.errors';

/**
 * On-disk shape of watchrun.json
 */
export type WatchConfig = {
  monitored_dirs: string[];
  program: string;
  args: string;
  latency_ms?: number;
  resolve_target_on_fire?: boolean;
};

/**
 * Effective settings after defaults are applied to whatever keys were valid
 */
export type ResolvedWatchConfig = {
  monitoredDirs: string[];
  program: string;
  args: string;
  latencyMs: number;
  resolveTargetOnFire: boolean;
};

export type ConfigLoadResult = {
  config: ResolvedWatchConfig;
  /** Non-fatal problems, one per unreadable file or bad key */
  errors: ConfigError[];
};

export type InitConfigResult = {
  created: boolean;
  location: string;
};

export interface IConfigManager {
  loadConfig(): Promise<ConfigLoadResult>;
  initConfig(): Promise<InitConfigResult>;
}
