import { Command } from 'commander';
import { SessionLease } from '@forkflow/core';
import type { Backup, Rollback } from '@forkflow/core';
import { BaseCommand } from '../../base/base-command';
import type { ConfirmableOptions } from '../../interfaces/command';

/** What the operator must type before any branch is reset */
export const CONFIRMATION_WORD = 'ROLLBACK';

const CANDIDATES_SHOWN = 20;

type RollbackVariant = {
  name: 'rollback' | 'emergency-rollback';
  scope: Rollback.RollbackScope;
  description: string;
};

export const ROLLBACK_VARIANTS: Record<Rollback.RollbackScope, RollbackVariant> = {
  branch: {
    name: 'rollback',
    scope: 'branch',
    description: 'Reset the branch a backup tag was taken from to that tag',
  },
  all: {
    name: 'emergency-rollback',
    scope: 'all',
    description: 'Reset mirror, integration and production to a backup tag',
  },
};

/**
 * RollbackCommand - `forkflow rollback` and `forkflow emergency-rollback`
 *
 * Without a tag, lists the backup points and exits 1. With one, shows the
 * plan, asks for the confirmation word and resets under the session lease.
 */
export class RollbackCommand extends BaseCommand<ConfirmableOptions> {
  constructor(private readonly variant: RollbackVariant) {
    super();
  }

  override register(program: Command): void {
    program
      .command(`${this.variant.name} [backup-tag]`)
      .description(this.variant.description)
      .option('-y, --yes', 'Skip the confirmation prompt')
      .action(async (tag: string | undefined, _options: ConfirmableOptions, command: Command) => {
        await this.execute(tag, command.optsWithGlobals());
      });
  }

  async execute(tag: string | undefined, options: ConfirmableOptions): Promise<void> {
    try {
      const manager = await this.dependencyService.getRollbackManager();

      if (!tag) {
        this.listCandidates(await manager.listCandidates(), options);
        return;
      }

      const plan = await manager.plan(tag, this.variant.scope);
      if (!options.json) {
        console.log(this.formatPlan(plan));
      }

      if (!options.yes) {
        const prompter = this.dependencyService.getPrompter();
        const answer = await prompter.ask(`Type '${CONFIRMATION_WORD}' to confirm: `);
        if (answer !== CONFIRMATION_WORD) {
          this.handleSuccess({ cancelled: true }, options, 'Rollback cancelled');
          return;
        }
      }

      const leases = await this.dependencyService.getLeaseManager();
      const result = await SessionLease.withLease(leases, this.variant.name, () => manager.execute(plan));
      this.handleSuccess(result, options, this.formatResult(result));
    } catch (error) {
      this.handleError(`Rollback failed: ${this.errorMessage(error)}`, options, this.toError(error));
    }
  }

  private listCandidates(candidates: Backup.BackupTag[], options: ConfirmableOptions): void {
    const message = `Backup tag required. Usage: forkflow ${this.variant.name} <backup-tag>`;

    if (options.json) {
      console.log(JSON.stringify({
        success: false,
        error: message,
        candidates,
        exitCode: 1
      }, null, 2));
      process.exit(1);
      return;
    }

    if (candidates.length === 0) {
      console.log('No backup tags found.');
    } else {
      console.log('Available backup tags:');
      candidates.slice(0, CANDIDATES_SHOWN).forEach((candidate, index) => {
        console.log(`  ${index + 1}. ${candidate.name}  (${candidate.sourceRole}, ${candidate.sourceCommit.slice(0, 7)})`);
      });
    }
    this.handleError(message, options);
  }

  private formatPlan(plan: Rollback.RollbackPlan): string {
    const lines = [
      this.variant.scope === 'all' ? '=== EMERGENCY ROLLBACK ===' : '=== Rollback ===',
      `WARNING: this resets ${plan.targets.length === 1 ? 'a branch' : 'branches'} to ${plan.target}`,
    ];
    for (const target of plan.targets) {
      lines.push(`  ${target.branch}: ${target.currentCommit.slice(0, 7)} → ${target.targetCommit.slice(0, 7)}`);
    }
    return lines.join('\n');
  }

  private formatResult(result: Rollback.RollbackResult): string {
    const lines = [
      `✅ Rolled back ${result.plan.targets.map((target) => target.branch).join(', ')} to ${result.plan.target}`,
      '',
      'Emergency tags created:',
      ...result.emergencyTags.map((tag) => `  - ${tag.name}`),
    ];
    if (result.warnings.length > 0) {
      lines.push('', 'Warnings:', ...result.warnings.map((warning) => `  ⚠ ${warning}`));
    }
    lines.push('', 'To undo this rollback:', `  $ forkflow rollback ${result.snapshotId}`);
    return lines.join('\n');
  }
}
