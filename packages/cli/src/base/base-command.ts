/**
 * Base Command Class for the watchrun CLI
 *
 * Shared success/error output and access to the dependency service.
 */

import { DependencyInjectionService } from '../services/dependency-injection';
import type { BaseCommandOptions, IExecutableCommand } from '../interfaces/command';

export abstract class BaseCommand<TOptions extends BaseCommandOptions = BaseCommandOptions>
  implements IExecutableCommand<TOptions> {

  protected readonly dependencyService = DependencyInjectionService.getInstance();

  abstract execute(options: TOptions): Promise<void>;

  /**
   * Handle errors consistently across all commands. Exits the process.
   */
  protected handleError(message: string, options: TOptions, error?: Error, exitCode: number = 1): void {
    const isJson = options.json || false;
    const isVerbose = options.verbose || false;

    if (isJson) {
      console.log(JSON.stringify({
        success: false,
        error: message,
        exitCode
      }, null, 2));
    } else {
      // Only add ❌ if message doesn't already have it
      const formattedMessage = message.startsWith('❌') ? message : `❌ ${message}`;
      console.error(formattedMessage);
      if (isVerbose && error) {
        console.error(`🔍 Technical details: ${error.stack}`);
      }
    }

    process.exit(exitCode);
  }

  /**
   * Handle successful output consistently. `data` is only printed in JSON mode.
   */
  protected handleSuccess(data: unknown, options: TOptions, message?: string): void {
    if (options.json) {
      console.log(JSON.stringify({
        success: true,
        data
      }, null, 2));
    } else if (message && !options.quiet) {
      console.log(`✅ ${message}`);
    }
  }
}
