/**
 * ConfigManager - watchrun.json loading and initialization
 *
 * Validates the raw document with a JSON schema (ajv, allErrors) and applies
 * every key that is valid on its own. Each missing or ill-typed key becomes
 * one non-fatal error and keeps its default.
 */

import Ajv from 'ajv';
import type { ErrorObject, ValidateFunction } from 'ajv';
import type { ConfigStore } from '../config_store/config_store';
import { DEFAULT_LATENCY_MS } from '../session/session.types';
import watchConfigSchema from './watch_config.schema.json';
import type {
  ConfigLoadResult,
  IConfigManager,
  InitConfigResult,
  ResolvedWatchConfig,
  WatchConfig,
} from './config_manager.types';
import {
  ConfigKeyInvalidError,
  ConfigKeyMissingError,
  ConfigReadError,
  isConfigAlreadyExistsError,
  isConfigReadError,
} from './config_manager.errors';
import type { ConfigError } from './config_manager.errors';

/** Document written by `watchrun init` */
export const DEFAULT_WATCH_CONFIG: WatchConfig = {
  monitored_dirs: ['./'],
  program: '',
  args: '',
};

let cachedValidator: ValidateFunction<WatchConfig> | null = null;

function getValidator(): ValidateFunction<WatchConfig> {
  if (!cachedValidator) {
    const ajv = new Ajv({ allErrors: true });
    cachedValidator = ajv.compile<WatchConfig>(watchConfigSchema);
  }
  return cachedValidator;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function defaultResolvedConfig(): ResolvedWatchConfig {
  return {
    monitoredDirs: [...DEFAULT_WATCH_CONFIG.monitored_dirs],
    program: DEFAULT_WATCH_CONFIG.program,
    args: DEFAULT_WATCH_CONFIG.args,
    latencyMs: DEFAULT_LATENCY_MS,
    resolveTargetOnFire: false,
  };
}

/**
 * One error per offending top-level key, in the order ajv reports them.
 */
function collectKeyErrors(errors: ErrorObject[]): Map<string, ConfigError> {
  const byKey = new Map<string, ConfigError>();

  for (const error of errors) {
    if (error.keyword === 'required') {
      const missing: unknown = error.params.missingProperty;
      if (typeof missing === 'string' && !byKey.has(missing)) {
        byKey.set(missing, new ConfigKeyMissingError(missing));
      }
      continue;
    }

    // instancePath is "/key" or "/key/index"
    const key = error.instancePath.split('/')[1];
    if (key && !byKey.has(key)) {
      byKey.set(key, new ConfigKeyInvalidError(key, error.message ?? 'is invalid'));
    }
  }

  return byKey;
}

/**
 * Validate a parsed document and merge its valid keys over the defaults.
 */
export function resolveConfig(raw: unknown, location: string): ConfigLoadResult {
  const config = defaultResolvedConfig();

  if (!isRecord(raw)) {
    return { config, errors: [new ConfigReadError(location, 'expected a JSON object')] };
  }

  const validate = getValidator();
  const keyErrors = validate(raw) ? new Map<string, ConfigError>() : collectKeyErrors(validate.errors ?? []);
  const usable = (key: keyof WatchConfig): boolean => key in raw && !keyErrors.has(key);

  const dirs = raw['monitored_dirs'];
  if (usable('monitored_dirs') && Array.isArray(dirs)) {
    config.monitoredDirs = dirs.filter((dir): dir is string => typeof dir === 'string');
  }

  const program = raw['program'];
  if (usable('program') && typeof program === 'string') {
    config.program = program.trim();
  }

  const args = raw['args'];
  if (usable('args') && typeof args === 'string') {
    config.args = args.trim();
  }

  const latency = raw['latency_ms'];
  if (usable('latency_ms') && typeof latency === 'number') {
    config.latencyMs = latency;
  }

  const resolveOnFire = raw['resolve_target_on_fire'];
  if (usable('resolve_target_on_fire') && typeof resolveOnFire === 'boolean') {
    config.resolveTargetOnFire = resolveOnFire;
  }

  return { config, errors: Array.from(keyErrors.values()) };
}

/**
 * @example
 * ```typescript
 * const manager = new ConfigManager(new FsConfigStore('watchrun.json'));
 * const { config, errors } = await manager.loadConfig();
 * ```
 */
export class ConfigManager implements IConfigManager {
  private readonly configStore: ConfigStore;

  constructor(configStore: ConfigStore) {
    this.configStore = configStore;
  }

  get location(): string {
    return this.configStore.location;
  }

  /**
   * Never throws for configuration problems: they come back in `errors`
   * alongside the effective settings.
   */
  async loadConfig(): Promise<ConfigLoadResult> {
    let raw: unknown;
    try {
      raw = await this.configStore.load();
    } catch (error) {
      if (isConfigReadError(error)) {
        return { config: defaultResolvedConfig(), errors: [error] };
      }
      throw error;
    }
    return resolveConfig(raw, this.configStore.location);
  }

  /**
   * Write the default document unless one already exists. An existing file is
   * left untouched.
   */
  async initConfig(): Promise<InitConfigResult> {
    try {
      await this.configStore.create(DEFAULT_WATCH_CONFIG);
      return { created: true, location: this.configStore.location };
    } catch (error) {
      if (isConfigAlreadyExistsError(error)) {
        return { created: false, location: this.configStore.location };
      }
      throw error;
    }
  }
}
