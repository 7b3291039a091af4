/**
 * Promoter - merges integration into production behind the test gate
 */

import type { IGitModule } from '../git/git_module';
import { GitError, MergeConflictError } from '../git/errors';
import type { BackupManager, BackupTag } from '../backup';
import type { ForkflowConfig } from '../config_manager/config_manager.types';
import type { Prompter } from '../prompter';
import type { TestResult } from '../test_gate';
import { gateBlocks } from '../test_gate';
import { SyncError } from '../errors';
import { createLogger } from '../logger/logger';

const logger = createLogger('[Promote] ');

export type SyncMode = 'manual' | 'auto';

export type PromotionInput = {
  timestamp: string;
  date: string;
  mode: SyncMode;
  testResult: TestResult;
};

export type PromotionResult =
  | {
      status: 'promoted';
      previousCommit: string;
      commit: string;
      backupTag: BackupTag;
      /** Manual mode: the operator's typed confirmation stands in for the gate */
      operatorOverride: boolean;
    }
  | { status: 'declined' }
  | { status: 'blocked'; reason: string };

export type PromoterDependencies = {
  git: IGitModule;
  backups: BackupManager;
  prompter: Prompter;
  config: Pick<ForkflowConfig, 'remotes' | 'branches' | 'requireTests'>;
};

export const PROMOTION_QUESTION = 'Have you reviewed changes and confirmed tests pass? (yes/no): ';

export function buildPromotionMessage(integration: string, production: string, input: PromotionInput): string {
  const title = `Promote: ${integration} to ${production} (${input.date})`;
  if (input.testResult === 'skipped') {
    return `${title}\n\nNo test suite ran; promoted without automated verification.`;
  }
  return input.mode === 'auto' ? `${title}\n\nTests passed, promoting staged upstream changes.` : title;
}

export class Promoter {
  private readonly git: IGitModule;
  private readonly backups: BackupManager;
  private readonly prompter: Prompter;
  private readonly config: Pick<ForkflowConfig, 'remotes' | 'branches' | 'requireTests'>;

  constructor(dependencies: PromoterDependencies) {
    this.git = dependencies.git;
    this.backups = dependencies.backups;
    this.prompter = dependencies.prompter;
    this.config = dependencies.config;
  }

  async promote(input: PromotionInput): Promise<PromotionResult> {
    const { integration, production } = this.config.branches;
    const origin = this.config.remotes.origin;

    if (gateBlocks(input.testResult, this.config.requireTests)) {
      const reason =
        input.testResult === 'failed'
          ? 'tests failed'
          : 'no test suite ran and requireTests is enabled';
      logger.error(`Promotion blocked: ${reason}`);
      return { status: 'blocked', reason };
    }

    if (input.mode === 'manual') {
      logger.warn(`Ready to promote ${integration} → ${production}`);
      const answer = await this.prompter.ask(PROMOTION_QUESTION);
      if (answer !== 'yes') {
        logger.info(`Promotion to ${production} skipped. ${integration} is ready for review.`);
        return { status: 'declined' };
      }
    }

    const previousCommit = await this.git.getCommitHash(production);
    const backupTag = await this.backups.createBackup('production', input.timestamp);

    await this.git.checkoutBranch(production);
    let commit: string;
    try {
      const result = await this.git.merge(integration, {
        strategy: 'no-ff',
        message: buildPromotionMessage(integration, production, input),
      });
      commit = result.commitHash;
    } catch (error) {
      if (error instanceof MergeConflictError) {
        // Production carries commits integration does not; leave it untouched.
        await this.git.mergeAbort();
        throw new SyncError(
          `Promoting ${integration} into ${production} conflicts in ${error.conflictedFiles.join(', ')}`,
          'promotion',
          [`git checkout ${integration} && git merge ${production}`, 'forkflow sync']
        );
      }
      throw error;
    }

    try {
      await this.git.push(origin, production);
    } catch (error) {
      if (error instanceof GitError) {
        throw new SyncError(`Failed to push ${production} to ${origin}: ${error.message}`, 'promotion', [
          `git push ${origin} ${production}`,
          `forkflow rollback ${backupTag.name}`,
        ]);
      }
      throw error;
    }
    logger.info(`✓ Promoted ${integration} to ${production} and pushed to ${origin}`);

    return {
      status: 'promoted',
      previousCommit,
      commit,
      backupTag,
      operatorOverride: input.mode === 'manual',
    };
  }
}
