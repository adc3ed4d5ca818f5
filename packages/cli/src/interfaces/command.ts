/**
 * Standard Command Interface for the watchrun CLI
 */

/**
 * Base options that all commands should support
 */
export interface BaseCommandOptions {
  json?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * Executable command interface
 */
export interface IExecutableCommand<TOptions extends BaseCommandOptions = BaseCommandOptions> {
  /**
   * Execute the command with given options
   * @param options - Command-specific options
   */
  execute(options: TOptions): Promise<void>;
}
