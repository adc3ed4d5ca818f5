import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

export interface InitCommandOptions extends BaseCommandOptions {
  config?: string;
}

/**
 * InitCommand - writes the default config file.
 *
 * An existing file is reported and left exactly as it is; both outcomes exit 0.
 */
export class InitCommand extends BaseCommand<InitCommandOptions> {
  async execute(options: InitCommandOptions): Promise<void> {
    try {
      const configManager = this.dependencyService.getConfigManager(options.config);
      const result = await configManager.initConfig();

      const message = result.created
        ? `Created ${result.location}`
        : `${result.location} already exists, left unchanged`;
      this.handleSuccess(result, options, message);
    } catch (error) {
      this.handleError(
        `Initialization failed: ${error instanceof Error ? error.message : String(error)}`,
        options,
        error instanceof Error ? error : undefined
      );
    }
  }
}
