/**
 * IntegrationMerger - merges the mirror into the integration branch
 *
 * Always a merge commit. Conflicts are never resolved here: the merge is left
 * in progress for the conflict resolver and the caller halts the session.
 */

import type { IGitModule } from '../git/git_module';
import { GitError, MergeConflictError } from '../git/errors';
import type { BackupManager, BackupTag } from '../backup';
import type { ForkflowConfig } from '../config_manager/config_manager.types';
import { SyncError } from '../errors';
import { createLogger } from '../logger/logger';

const logger = createLogger('[Integration] ');

export type IntegrationMergeInput = {
  timestamp: string;
  /** Calendar date shown in the merge message (YYYY-MM-DD) */
  date: string;
  newCommitCount: number;
};

export type IntegrationMergeResult =
  | {
      status: 'merged' | 'up-to-date';
      previousCommit: string;
      commit: string;
      backupTag: BackupTag;
    }
  | {
      status: 'conflicts';
      previousCommit: string;
      backupTag: BackupTag;
      conflictFiles: string[];
    };

export type IntegrationMergerDependencies = {
  git: IGitModule;
  backups: BackupManager;
  config: Pick<ForkflowConfig, 'remotes' | 'branches'>;
};

export function buildSyncMessage(input: IntegrationMergeInput, backupTag: string): string {
  return [
    `Sync: Merge upstream changes (${input.date})`,
    '',
    `Upstream commits: ${input.newCommitCount}`,
    `Backup tag: ${backupTag}`,
  ].join('\n');
}

/**
 * Recovery commands printed when the integration merge stops on conflicts.
 */
export function conflictRemediation(backupTag: string): string[] {
  return [
    'forkflow resolve-conflicts',
    `git merge --abort && git reset --hard ${backupTag}`,
  ];
}

export class IntegrationMerger {
  private readonly git: IGitModule;
  private readonly backups: BackupManager;
  private readonly config: Pick<ForkflowConfig, 'remotes' | 'branches'>;

  constructor(dependencies: IntegrationMergerDependencies) {
    this.git = dependencies.git;
    this.backups = dependencies.backups;
    this.config = dependencies.config;
  }

  async merge(input: IntegrationMergeInput): Promise<IntegrationMergeResult> {
    const { mirror, integration } = this.config.branches;

    const previousCommit = await this.git.getCommitHash(integration);
    const backupTag = await this.backups.createBackup('integration', input.timestamp);

    await this.git.checkoutBranch(integration);
    try {
      const result = await this.git.merge(mirror, {
        strategy: 'no-ff',
        message: buildSyncMessage(input, backupTag.name),
      });
      const status = result.status === 'up-to-date' ? 'up-to-date' : 'merged';
      if (status === 'merged') {
        logger.info(`✓ Merged ${mirror} into ${integration}`);
        await this.publish();
      }
      return { status, previousCommit, commit: result.commitHash, backupTag };
    } catch (error) {
      if (error instanceof MergeConflictError) {
        logger.error(`Merge conflicts detected in ${integration}: ${error.conflictedFiles.join(', ')}`);
        return { status: 'conflicts', previousCommit, backupTag, conflictFiles: error.conflictedFiles };
      }
      throw error;
    }
  }

  /**
   * Pushes the integration branch to origin.
   */
  async publish(): Promise<void> {
    const { integration } = this.config.branches;
    const origin = this.config.remotes.origin;
    try {
      await this.git.push(origin, integration);
    } catch (error) {
      if (error instanceof GitError) {
        throw new SyncError(`Failed to push ${integration} to ${origin}: ${error.message}`, 'integration', [
          `git push ${origin} ${integration}`,
        ]);
      }
      throw error;
    }
    logger.info(`✓ Pushed ${integration} to ${origin}`);
  }
}
