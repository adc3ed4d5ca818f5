import type { BaseCommandOptions } from '../../interfaces/command';

export interface WatchCommandOptions extends BaseCommandOptions {
  /** Config file path (default: watchrun.json) */
  config?: string;
  /** Overrides latency_ms from the config */
  latency?: number;
  /** Overrides resolve_target_on_fire when set */
  resolveOnFire?: boolean;
}

export interface WatchCommandIo {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}
