import { Command } from 'commander';
import { ConflictResolver, SessionLease } from '@forkflow/core';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';
import { reportSession } from '../sync/sync-command';

export interface ResolveConflictsOptions extends BaseCommandOptions {
  /** false under --no-continue */
  continue?: boolean;
}

/**
 * ResolveConflictsCommand - walks the operator through a conflicted
 * integration merge, then continues the sync from the test gate.
 */
export class ResolveConflictsCommand extends BaseCommand<ResolveConflictsOptions> {

  override register(program: Command): void {
    program
      .command('resolve-conflicts')
      .description('Resolve the conflicts of an interrupted integration merge, then continue the sync')
      .option('--no-continue', 'Stop after the merge commit instead of running tests and promotion')
      .action(async (_options: ResolveConflictsOptions, command: Command) => {
        await this.execute(command.optsWithGlobals());
      });
  }

  async execute(options: ResolveConflictsOptions): Promise<void> {
    try {
      const resolver = await this.dependencyService.getConflictResolver();
      const leases = await this.dependencyService.getLeaseManager();
      const prompter = this.dependencyService.getPrompter();

      // The lease is released before resume() takes its own
      const result = await SessionLease.withLease(leases, 'resolve-conflicts', () =>
        ConflictResolver.resolveInteractively(resolver, prompter)
      );

      switch (result.status) {
        case 'nothing-to-resolve':
        case 'pending-commit':
          this.handleSuccess(result, options);
          return;
        case 'unresolved':
          this.handleError(`${result.unresolved.length} conflicting file(s) still unresolved`, options);
          return;
        case 'aborted':
          this.handleError(
            result.restoredTo ? `Merge aborted; integration restored to ${result.restoredTo}` : 'Merge aborted',
            options
          );
          return;
        case 'completed':
          break;
      }

      if (!options.json) {
        console.log(`✓ Merge completed (${result.completion.commit.slice(0, 7)})`);
      }
      if (options.continue === false) {
        this.handleSuccess(result, options, 'Continue later with: forkflow sync');
        return;
      }

      const pipeline = await this.dependencyService.getSyncPipeline();
      const config = await this.dependencyService.getConfig();
      reportSession(await pipeline.resume('manual'), config.branches, options);
    } catch (error) {
      this.handleError(`Conflict resolution failed: ${this.errorMessage(error)}`, options, this.toError(error));
    }
  }
}
