import { Command } from 'commander';
import { ROLLBACK_VARIANTS, RollbackCommand } from './rollback-command';

/**
 * Register `forkflow rollback` and `forkflow emergency-rollback`
 */
export function registerRollbackCommands(program: Command): void {
  new RollbackCommand(ROLLBACK_VARIANTS.branch).register(program);
  new RollbackCommand(ROLLBACK_VARIANTS.all).register(program);
}
