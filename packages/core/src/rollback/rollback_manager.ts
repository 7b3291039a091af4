/**
 * RollbackManager - resets branches to backup tags, reversibly
 *
 * Every affected branch gets an emergency tag first, then all of them are
 * reset locally and published in one atomic lease-protected push. A rejected
 * push restores the local branches, so nothing is applied partially.
 */

import type { IGitModule } from '../git/git_module';
import { PushRejectedError } from '../git/errors';
import type { BackupManager, BackupTag } from '../backup';
import {
  BRANCH_ROLES,
  BackupError,
  BackupNotFoundError,
  backupTagName,
  formatSessionTimestamp,
  parseBackupTagName,
} from '../backup';
import type { BranchRole, ForkflowConfig } from '../config_manager/config_manager.types';
import { DirtyStateError, FetchError } from '../errors';
import { createLogger } from '../logger/logger';

const logger = createLogger('[Rollback] ');

const SNAPSHOT_ID = /^emergency\/(\d{8}-\d{6})$/;

/** `branch` resets the branch the tag was taken from; `all` resets mirror, integration and production */
export type RollbackScope = 'branch' | 'all';

export type RollbackTarget = {
  role: BranchRole;
  branch: string;
  targetRef: string;
  targetCommit: string;
  currentCommit: string;
};

export type RollbackPlan = {
  target: string;
  scope: RollbackScope;
  targets: RollbackTarget[];
};

export type RollbackResult = {
  plan: RollbackPlan;
  emergencyTags: BackupTag[];
  /** Rolling back to this id undoes the rollback */
  snapshotId: string;
  warnings: string[];
};

export type RollbackManagerDependencies = {
  git: IGitModule;
  backups: BackupManager;
  config: Pick<ForkflowConfig, 'remotes' | 'branches'>;
  now?: () => Date;
};

export class RollbackManager {
  private readonly git: IGitModule;
  private readonly backups: BackupManager;
  private readonly config: Pick<ForkflowConfig, 'remotes' | 'branches'>;
  private readonly now: () => Date;

  constructor(dependencies: RollbackManagerDependencies) {
    this.git = dependencies.git;
    this.backups = dependencies.backups;
    this.config = dependencies.config;
    this.now = dependencies.now ?? (() => new Date());
  }

  /**
   * Backup and emergency tags, newest first.
   */
  async listCandidates(): Promise<BackupTag[]> {
    return this.backups.listBackups();
  }

  /**
   * Works out which branches move where, without touching anything.
   *
   * @throws BackupNotFoundError when the tag or snapshot does not exist
   * @throws BackupError when a single-branch rollback gets a tag of no known role
   */
  async plan(target: string, scope: RollbackScope): Promise<RollbackPlan> {
    const snapshot = SNAPSHOT_ID.exec(target);
    if (snapshot) {
      const tags = (await this.backups.listBackups('emergency')).filter((tag) => tag.timestamp === snapshot[1]);
      if (tags.length === 0) {
        throw new BackupNotFoundError(target);
      }
      const targets = await Promise.all(tags.map((tag) => this.toTarget(tag.sourceRole, tag.name, tag.sourceCommit)));
      return { target, scope, targets: sortByRole(targets) };
    }

    if (!(await this.git.tagExists(target))) {
      throw new BackupNotFoundError(target);
    }
    const commit = await this.git.getCommitHash(target);

    if (scope === 'all') {
      const targets = await Promise.all(BRANCH_ROLES.map((role) => this.toTarget(role, target, commit)));
      return { target, scope, targets };
    }

    const parsed = parseBackupTagName(target);
    if (!parsed) {
      throw new BackupError(
        `Cannot tell which branch ${target} belongs to; use emergency-rollback to reset every branch to it`,
        target
      );
    }
    return { target, scope, targets: [await this.toTarget(parsed.role, target, commit)] };
  }

  /**
   * @throws DirtyStateError when tracked files have uncommitted changes
   * @throws FetchError when origin cannot be fetched
   * @throws PushRejectedError when origin moved since the fetch (local branches are restored)
   */
  async execute(plan: RollbackPlan): Promise<RollbackResult> {
    const origin = this.config.remotes.origin;

    if (await this.git.hasUncommittedChanges()) {
      throw new DirtyStateError();
    }
    try {
      await this.git.fetch(origin);
    } catch (error) {
      throw new FetchError(origin, error instanceof Error ? error.message : String(error));
    }

    // Tips are read again: the plan may predate the confirmation prompt and the lease
    const targets = await Promise.all(
      plan.targets.map((target) => this.toTarget(target.role, target.targetRef, target.targetCommit))
    );

    const updates = await Promise.all(
      targets.map(async (target) => ({
        branch: target.branch,
        expectedRemoteCommit: (await this.git.resolveRef(`${origin}/${target.branch}`)) ?? '',
      }))
    );

    const timestamp = await this.nextSnapshotTimestamp();
    const emergencyTags: BackupTag[] = [];
    for (const target of targets) {
      emergencyTags.push(await this.backups.createBackup(target.role, timestamp, 'emergency'));
    }

    const originalBranch = await this.git.getCurrentBranch();
    for (const target of targets) {
      await this.git.checkoutBranch(target.branch);
      await this.git.resetHard(target.targetRef);
      logger.info(`${target.branch}: ${target.currentCommit.slice(0, 7)} → ${target.targetCommit.slice(0, 7)}`);
    }

    try {
      await this.git.pushWithLease(origin, updates);
    } catch (error) {
      if (error instanceof PushRejectedError) {
        logger.error(`${origin} moved since it was fetched; restoring local branches`);
        await this.restore(targets, originalBranch);
      }
      throw error;
    }
    await this.git.checkoutBranch(originalBranch);
    logger.info(`✓ Rolled back ${targets.map((target) => target.branch).join(', ')} to ${plan.target}`);

    const warnings = (await this.backups.pushBackups(origin, emergencyTags)).map(
      (name) => `Emergency tag ${name} exists only locally`
    );

    return { plan: { ...plan, targets }, emergencyTags, snapshotId: `emergency/${timestamp}`, warnings };
  }

  /**
   * First second from now that no emergency snapshot uses yet, so a rollback
   * undone within the same second gets a snapshot of its own.
   */
  private async nextSnapshotTimestamp(): Promise<string> {
    const taken = new Set((await this.git.listTags('emergency/*')).map((tag) => tag.name));
    const start = this.now().getTime();
    for (let offset = 0; ; offset += 1) {
      const timestamp = formatSessionTimestamp(new Date(start + offset * 1000));
      if (!BRANCH_ROLES.some((role) => taken.has(backupTagName('emergency', role, timestamp)))) {
        return timestamp;
      }
    }
  }

  private async restore(targets: RollbackTarget[], originalBranch: string): Promise<void> {
    for (const target of targets) {
      await this.git.checkoutBranch(target.branch);
      await this.git.resetHard(target.currentCommit);
    }
    await this.git.checkoutBranch(originalBranch);
  }

  private async toTarget(role: BranchRole, targetRef: string, targetCommit: string): Promise<RollbackTarget> {
    const branch = this.config.branches[role];
    const currentCommit = await this.git.resolveRef(branch);
    if (!currentCommit) {
      throw new BackupError(`Branch ${branch} (${role}) not found`, targetRef);
    }
    return { role, branch, targetRef, targetCommit, currentCommit };
  }
}

function sortByRole(targets: RollbackTarget[]): RollbackTarget[] {
  return [...targets].sort((a, b) => BRANCH_ROLES.indexOf(a.role) - BRANCH_ROLES.indexOf(b.role));
}
