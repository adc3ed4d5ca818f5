/**
 * MemoryConfigStore - In-memory implementation of ConfigStore
 *
 * Keeps the raw document text so tests can feed malformed JSON as well as
 * valid configs.
 */

import type { ConfigStore } from '../config_store';
import { parseConfigText, serializeConfig } from '../config_store';
import type { WatchConfig } from '../../config_manager/config_manager.types';
import {
  ConfigAlreadyExistsError,
  ConfigReadError,
} from '../../config_manager/config_manager.errors';

/**
 * @example
 * ```typescript
 * const store = new MemoryConfigStore();
 * store.setContent('{"monitored_dirs":["./"],"program":"echo","args":"ok"}');
 * const result = await new ConfigManager(store).loadConfig();
 * ```
 */
export class MemoryConfigStore implements ConfigStore {
  readonly location: string;
  private content: string | null = null;

  constructor(location: string = 'memory:watchrun.json') {
    this.location = location;
  }

  async load(): Promise<unknown> {
    if (this.content === null) {
      throw new ConfigReadError(this.location, 'file not found');
    }
    return parseConfigText(this.content, this.location);
  }

  async create(config: WatchConfig): Promise<void> {
    if (this.content !== null) {
      throw new ConfigAlreadyExistsError(this.location);
    }
    this.content = serializeConfig(config);
  }

  // ==================== Test Helper Methods ====================

  /** Raw document text; null clears it */
  setContent(content: string | null): void {
    this.content = content;
  }

  getContent(): string | null {
    return this.content;
  }
}
