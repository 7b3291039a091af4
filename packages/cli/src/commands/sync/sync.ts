import { Command } from 'commander';
import { SyncCommand } from './sync-command';

/**
 * Register `forkflow sync`
 */
export function registerSyncCommands(program: Command): void {
  const syncCommand = new SyncCommand();
  syncCommand.register(program);
}
