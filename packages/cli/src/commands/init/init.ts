import { Command } from 'commander';
import { InitCommand } from './init-command';
import type { InitCommandOptions } from './init-command';

/**
 * Registers the init command
 */
export function registerInitCommands(program: Command): void {
  const initCommand = new InitCommand();

  program
    .command('init')
    .description('Create watchrun.json with default settings if it does not exist')
    .option('-c, --config <path>', 'Config file to create', 'watchrun.json')
    .option('--json', 'Output in JSON format for automation')
    .option('-q, --quiet', 'Minimal output for scripting')
    .action(async (options: InitCommandOptions) => {
      await initCommand.execute(options);
    });
}
