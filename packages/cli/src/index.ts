#!/usr/bin/env node

import 'dotenv/config';
import { Command } from 'commander';
import { Logger } from '@forkflow/core';
import { registerSyncCommands } from './commands/sync/sync';
import { registerRollbackCommands } from './commands/rollback/rollback';
import { registerResolveConflictsCommand } from './commands/resolve-conflicts/resolve-conflicts';
import { registerHealthCheckCommand } from './commands/health-check/health-check';
import type { BaseCommandOptions } from './interfaces/command';

const program = new Command();

program
  .name('forkflow')
  .description('Keep a fork in sync with upstream through mirror, integration and production branches')
  .version('1.0.0')
  .option('--json', 'Print machine-readable JSON')
  .option('--quiet', 'Only print warnings, errors and failures')
  .option('--verbose', 'Print debug logging and error stacks');

// Loggers exist before the flags are parsed, so the flags override their console level
program.hook('preAction', (_program, actionCommand) => {
  const options: BaseCommandOptions = actionCommand.optsWithGlobals();
  if (options.json) {
    Logger.setConsoleLevel('silent');
  } else if (options.quiet) {
    Logger.setConsoleLevel('warn');
  } else if (options.verbose) {
    Logger.setConsoleLevel('debug');
  }
});

registerSyncCommands(program);
registerRollbackCommands(program);
registerResolveConflictsCommand(program);
registerHealthCheckCommand(program);

program.parseAsync().catch((error: unknown) => {
  console.error('❌ Fatal error:', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
