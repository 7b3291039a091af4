import { Command } from 'commander';
import { ResolveConflictsCommand } from './resolve-conflicts-command';

/**
 * Register `forkflow resolve-conflicts`
 */
export function registerResolveConflictsCommand(program: Command): void {
  new ResolveConflictsCommand().register(program);
}
