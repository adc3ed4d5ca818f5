#!/usr/bin/env node

import { Command } from 'commander';
import { registerInitCommands } from './commands/init/init';
import { registerWatchCommand } from './commands/watch/watch';

const program = new Command();

program
  .name('watchrun')
  .description('Re-run a shell command whenever watched directories settle after a change')
  .version('1.0.0')
  // Options after a subcommand belong to the subcommand
  .enablePositionalOptions();

registerInitCommands(program);
registerWatchCommand(program);

program.parseAsync().catch((error: unknown) => {
  console.error("❌ Fatal error:", error);
  process.exit(1);
});
