/**
 * FsConfigStore - Filesystem implementation of ConfigStore
 *
 * Reads and writes a single JSON file, `watchrun.json` in the working
 * directory unless another path is given.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import type { ConfigStore } from '../config_store';
import { parseConfigText, serializeConfig } from '../config_store';
import type { WatchConfig } from '../../config_manager/config_manager.types';
import { ConfigManager } from '../../config_manager/config_manager';
import {
  ConfigAlreadyExistsError,
  ConfigReadError,
} from '../../config_manager/config_manager.errors';

export const DEFAULT_CONFIG_FILE = 'watchrun.json';

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function describeReadFailure(error: unknown): string {
  switch (errorCode(error)) {
    case 'ENOENT':
      return 'file not found';
    case 'EACCES':
    case 'EPERM':
      return 'permission denied';
    case 'EISDIR':
      return 'is a directory';
    default:
      return error instanceof Error ? error.message : String(error);
  }
}

/**
 * Filesystem-based ConfigStore implementation.
 *
 * @example
 * ```typescript
 * const store = new FsConfigStore('/path/to/project/watchrun.json');
 * const raw = await store.load();
 * ```
 */
export class FsConfigStore implements ConfigStore {
  readonly location: string;

  constructor(configPath: string = DEFAULT_CONFIG_FILE) {
    this.location = path.resolve(configPath);
  }

  async load(): Promise<unknown> {
    let content: string;
    try {
      content = await fs.readFile(this.location, 'utf-8');
    } catch (error) {
      throw new ConfigReadError(this.location, describeReadFailure(error));
    }
    return parseConfigText(content, this.location);
  }

  /**
   * Exclusive create (`wx`), so an existing file is never modified
   */
  async create(config: WatchConfig): Promise<void> {
    try {
      await fs.writeFile(this.location, serializeConfig(config), { encoding: 'utf-8', flag: 'wx' });
    } catch (error) {
      if (errorCode(error) === 'EEXIST') {
        throw new ConfigAlreadyExistsError(this.location);
      }
      throw error;
    }
  }
}

/**
 * Create a ConfigManager backed by the given file (default: ./watchrun.json).
 */
export function createConfigManager(configPath?: string): ConfigManager {
  return new ConfigManager(new FsConfigStore(configPath));
}
