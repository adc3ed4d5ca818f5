/**
 * ConfigStore Interface
 *
 * Abstraction for watchrun.json persistence: filesystem for the CLI, memory
 * for tests. Stores hand back the parsed document untyped; ConfigManager owns
 * validation and defaults.
 */

import type { WatchConfig } from '../config_manager/config_manager.types';
import { ConfigReadError } from '../config_manager/config_manager.errors';

export interface ConfigStore {
  /** Human-readable location used in messages (a path for FsConfigStore) */
  readonly location: string;

  /**
   * Read and parse the config document
   *
   * @throws ConfigReadError when the document is missing, unreadable or not JSON
   */
  load(): Promise<unknown>;

  /**
   * Write the config only if none exists yet
   *
   * @throws ConfigAlreadyExistsError when a config is already present
   */
  create(config: WatchConfig): Promise<void>;
}

export function serializeConfig(config: WatchConfig): string {
  return JSON.stringify(config, null, 2);
}

export function parseConfigText(text: string, location: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigReadError(location, `invalid JSON (${reason})`);
  }
}
