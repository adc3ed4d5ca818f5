import { Logger } from '@watchrun/core';
import { BaseCommand } from '../../base/base-command';
import { ConsoleReporter } from '../../repl/console_reporter';
import { ReplSession } from '../../repl/repl_session';
import type { WatchCommandIo, WatchCommandOptions } from './watch-command.types';

export type { WatchCommandIo, WatchCommandOptions } from './watch-command.types';

const TEARDOWN_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/**
 * WatchCommand - the interactive session.
 *
 * Loads the config, reports its problems, builds the coordinator and hands
 * control to the REPL. A configured command runs right away unless the config
 * had errors.
 */
export class WatchCommand extends BaseCommand<WatchCommandOptions> {
  private readonly io: WatchCommandIo;

  constructor(io: WatchCommandIo = { input: process.stdin, output: process.stdout }) {
    super();
    this.io = io;
  }

  async execute(options: WatchCommandOptions): Promise<void> {
    if (options.verbose) {
      Logger.setDefaultLogLevel('debug');
    }

    let exitCode: number;
    try {
      exitCode = await this.runSession(options);
    } catch (error) {
      this.handleError(
        `watchrun failed: ${error instanceof Error ? error.message : String(error)}`,
        options,
        error instanceof Error ? error : undefined
      );
      return;
    }

    process.exit(exitCode);
  }

  private async runSession(options: WatchCommandOptions): Promise<number> {
    const configManager = this.dependencyService.getConfigManager(options.config);
    const { config, errors } = await configManager.loadConfig();
    for (const error of errors) {
      console.error(`❌ ${error.message}`);
    }

    const effective = {
      ...config,
      latencyMs: options.latency ?? config.latencyMs,
      resolveTargetOnFire: options.resolveOnFire || config.resolveTargetOnFire,
    };

    const { coordinator } = this.dependencyService.createWatchRuntime(
      effective,
      new ConsoleReporter(this.io.output)
    );
    const repl = new ReplSession({ coordinator, input: this.io.input, output: this.io.output });

    const teardown = (): void => repl.close();
    for (const signal of TEARDOWN_SIGNALS) {
      process.once(signal, teardown);
    }

    try {
      if (errors.length === 0 && effective.program) {
        try {
          await coordinator.startMonitoring();
          await coordinator.execute();
        } catch (error) {
          this.io.output.write(`${error instanceof Error ? error.message : String(error)}\n`);
        }
      }
      return await repl.run();
    } finally {
      for (const signal of TEARDOWN_SIGNALS) {
        process.removeListener(signal, teardown);
      }
    }
  }
}
