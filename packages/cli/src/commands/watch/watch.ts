import { Command, InvalidArgumentError } from 'commander';
import { WatchCommand } from './watch-command';
import type { WatchCommandOptions } from './watch-command';

export function parseLatency(value: string): number {
  const latency = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(latency)) {
    throw new InvalidArgumentError('Latency must be a whole number of milliseconds.');
  }
  return latency;
}

/**
 * Registers the default action: load the config and enter the REPL
 */
export function registerWatchCommand(program: Command): void {
  const watchCommand = new WatchCommand();

  program
    .option('-c, --config <path>', 'Config file to load', 'watchrun.json')
    .option('-l, --latency <ms>', 'Quiet period before a change triggers a run', parseLatency)
    .option('--resolve-on-fire', 'Decide between running and notifying when the debounce fires')
    .option('-v, --verbose', 'Log debug output')
    .action(async (options: WatchCommandOptions) => {
      await watchCommand.execute(options);
    });
}
