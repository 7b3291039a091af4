/**
 * MirrorUpdater - keeps the mirror branch identical to upstream
 *
 * The mirror only ever fast-forwards. When someone committed to it directly
 * it is reset to upstream (with a warning) and force-pushed under a lease.
 */

import type { IGitModule } from '../git/git_module';
import { GitError, NotFastForwardError } from '../git/errors';
import type { BackupManager, BackupTag } from '../backup';
import type { ForkflowConfig } from '../config_manager/config_manager.types';
import { EnvironmentError, SyncError } from '../errors';
import { createLogger } from '../logger/logger';

const logger = createLogger('[Mirror] ');

export type MirrorUpdateStatus = 'up-to-date' | 'fast-forward' | 'reset';

export type MirrorUpdateResult = {
  status: MirrorUpdateStatus;
  previousCommit: string;
  commit: string;
  backupTag: BackupTag | null;
  warnings: string[];
};

export type MirrorUpdaterDependencies = {
  git: IGitModule;
  backups: BackupManager;
  config: Pick<ForkflowConfig, 'remotes' | 'branches'>;
};

export class MirrorUpdater {
  private readonly git: IGitModule;
  private readonly backups: BackupManager;
  private readonly config: Pick<ForkflowConfig, 'remotes' | 'branches'>;

  constructor(dependencies: MirrorUpdaterDependencies) {
    this.git = dependencies.git;
    this.backups = dependencies.backups;
    this.config = dependencies.config;
  }

  get upstreamRef(): string {
    return `${this.config.remotes.upstream}/${this.config.remotes.upstreamBranch}`;
  }

  /**
   * Advances the mirror to the fetched upstream tip and pushes it to origin.
   * Expects upstream and origin to be fetched already.
   */
  async update(timestamp: string): Promise<MirrorUpdateResult> {
    const mirror = this.config.branches.mirror;
    const origin = this.config.remotes.origin;

    const upstreamCommit = await this.git.resolveRef(this.upstreamRef);
    if (!upstreamCommit) {
      throw new EnvironmentError(`Upstream ref ${this.upstreamRef} not found`, [`git fetch ${this.config.remotes.upstream}`]);
    }
    const previousCommit = await this.git.resolveRef(mirror);
    if (!previousCommit) {
      throw new EnvironmentError(`Mirror branch ${mirror} not found`, [`git branch ${mirror} ${this.upstreamRef}`]);
    }

    if (previousCommit === upstreamCommit) {
      logger.info(`✓ ${mirror} already matches ${this.upstreamRef}`);
      return { status: 'up-to-date', previousCommit, commit: upstreamCommit, backupTag: null, warnings: [] };
    }

    const backupTag = await this.backups.createBackup('mirror', timestamp);
    await this.git.checkoutBranch(mirror);

    const warnings: string[] = [];
    let status: MirrorUpdateStatus;
    try {
      await this.git.merge(this.upstreamRef, { strategy: 'ff-only' });
      status = 'fast-forward';
      logger.info(`✓ Fast-forwarded ${mirror} to ${this.upstreamRef}`);
    } catch (error) {
      if (!(error instanceof NotFastForwardError)) {
        throw error;
      }
      const warning = `${mirror} had commits not in ${this.upstreamRef}; reset it to upstream (previous tip kept in ${backupTag.name})`;
      logger.warn(warning);
      warnings.push(warning);
      await this.git.resetHard(this.upstreamRef);
      status = 'reset';
    }

    try {
      if (status === 'reset') {
        const remoteTip = (await this.git.resolveRef(`${origin}/${mirror}`)) ?? '';
        await this.git.pushWithLease(origin, [{ branch: mirror, expectedRemoteCommit: remoteTip }]);
      } else {
        await this.git.push(origin, mirror);
      }
    } catch (error) {
      if (error instanceof GitError) {
        throw new SyncError(`Failed to push ${mirror} to ${origin}: ${error.message}`, 'mirror', [
          `git push --force-with-lease ${origin} ${mirror}`,
        ]);
      }
      throw error;
    }
    logger.info(`✓ Pushed ${mirror} to ${origin}`);

    return { status, previousCommit, commit: upstreamCommit, backupTag, warnings };
  }
}
