/**
 * ConflictResolver - per-path resolution of a conflicted integration merge
 *
 * Every operator choice is a ConflictAction consumed by resolve(). The merge
 * can only be completed once no path is left unresolved; abort is always
 * available and returns integration to its pre-merge backup.
 */

import type { IGitModule } from '../git/git_module';
import type { ConflictSide } from '../git/types';
import type { BackupManager } from '../backup';
import type { Changelog } from '../changelog';
import type { ForkflowConfig } from '../config_manager/config_manager.types';
import type { IntegrationMerger } from '../integration_merge';
import type { ProtectedPaths } from '../protected_paths';
import { ConflictMarkersPresentError, SyncError, UnresolvedConflictsError } from '../errors';
import { createLogger } from '../logger/logger';
import { countConflictSections, scanConflictMarkers } from './conflict_markers';
import type {
  CompletionResult,
  ConflictAction,
  ConflictEntry,
  ResolveOutcome,
} from './conflict_resolver.types';

const logger = createLogger('[Conflicts] ');

export type ConflictResolverDependencies = {
  git: IGitModule;
  backups: BackupManager;
  merger: IntegrationMerger;
  changelog: Changelog;
  protectedPaths: ProtectedPaths;
  config: Pick<ForkflowConfig, 'branches'>;
  now?: () => Date;
};

export class ConflictResolver {
  private readonly git: IGitModule;
  private readonly backups: BackupManager;
  private readonly merger: IntegrationMerger;
  private readonly changelog: Changelog;
  private readonly protectedPaths: ProtectedPaths;
  private readonly config: Pick<ForkflowConfig, 'branches'>;
  private readonly now: () => Date;
  private readonly entries = new Map<string, ConflictEntry>();

  constructor(dependencies: ConflictResolverDependencies) {
    this.git = dependencies.git;
    this.backups = dependencies.backups;
    this.merger = dependencies.merger;
    this.changelog = dependencies.changelog;
    this.protectedPaths = dependencies.protectedPaths;
    this.config = dependencies.config;
    this.now = dependencies.now ?? (() => new Date());
  }

  /**
   * Reads the conflicted paths of the merge in progress.
   * Returns an empty list when there is nothing to resolve.
   */
  async load(): Promise<ConflictEntry[]> {
    this.entries.clear();
    if (!(await this.git.isMergeInProgress())) {
      return [];
    }

    for (const filePath of await this.git.getConflictedFiles()) {
      const content = await this.git.readWorkingFile(filePath);
      this.entries.set(filePath, {
        path: filePath,
        resolution: 'unresolved',
        protectedBy: this.protectedPaths.match(filePath),
        conflictSections: content === null ? 0 : countConflictSections(content),
        lastLocalCommit: await this.git.getLastCommitTouching('HEAD', filePath),
        lastUpstreamCommit: await this.git.getLastCommitTouching(this.config.branches.mirror, filePath),
      });
    }
    return this.list();
  }

  /** A merge is in progress (with or without conflicts left) */
  async hasPendingMerge(): Promise<boolean> {
    return this.git.isMergeInProgress();
  }

  list(): ConflictEntry[] {
    return [...this.entries.values()];
  }

  unresolved(): string[] {
    return this.list()
      .filter((entry) => entry.resolution === 'unresolved')
      .map((entry) => entry.path);
  }

  async resolve(filePath: string, action: ConflictAction): Promise<ResolveOutcome> {
    const entry = this.entries.get(filePath);
    if (!entry) {
      throw new SyncError(`${filePath} is not a conflicting path`, 'conflicts');
    }

    switch (action.type) {
      case 'keep-local':
        await this.takeSide(filePath, 'ours');
        entry.resolution = 'ours';
        logger.info(`✓ Kept local changes for ${filePath}`);
        return { type: 'resolved', entry };

      case 'keep-incoming':
        await this.takeSide(filePath, 'theirs');
        entry.resolution = 'theirs';
        logger.info(`✓ Accepted upstream changes for ${filePath}`);
        return { type: 'resolved', entry };

      case 'manual': {
        const content = await this.git.readWorkingFile(filePath);
        if (content === null) {
          await this.git.rm([filePath]);
        } else {
          const markers = scanConflictMarkers(content);
          if (markers.length > 0 && !action.force) {
            throw new ConflictMarkersPresentError(filePath, markers);
          }
          if (markers.length > 0) {
            logger.warn(`Marking ${filePath} resolved with conflict markers still present`);
          }
          await this.git.add([filePath]);
        }
        entry.resolution = 'manual';
        logger.info(`✓ Manual edit completed for ${filePath}`);
        return { type: 'resolved', entry };
      }

      case 'view-diff':
        return { type: 'diff', diff: await this.git.getWorkingDiff(filePath) };

      case 'skip':
        logger.info(`Skipped ${filePath}`);
        return { type: 'skipped', entry };

      case 'abort':
        return { type: 'aborted', restoredTo: await this.abort() };
    }
  }

  /**
   * Aborts the merge and makes sure integration sits on its latest backup.
   *
   * @returns The backup tag integration was reset to, or null when the abort alone restored it
   */
  async abort(): Promise<string | null> {
    if (await this.git.isMergeInProgress()) {
      await this.git.mergeAbort();
    }
    this.entries.clear();
    logger.warn('✗ Merge aborted');

    const integration = this.config.branches.integration;
    const backup = await this.backups.getLatestBackup('integration');
    if (!backup) {
      return null;
    }
    const tip = await this.git.getCommitHash(integration);
    if (tip === backup.sourceCommit) {
      return null;
    }
    await this.git.checkoutBranch(integration);
    await this.git.resetHard(backup.name);
    logger.info(`✓ Restored ${integration} to ${backup.name}`);
    return backup.name;
  }

  /**
   * Commits the merge, pushes integration and records the sync.
   *
   * @throws UnresolvedConflictsError while any path is unresolved
   */
  async complete(): Promise<CompletionResult> {
    const remaining = [...new Set([...this.unresolved(), ...(await this.git.getConflictedFiles())])].sort();
    if (remaining.length > 0) {
      throw new UnresolvedConflictsError(remaining);
    }

    const commit = await this.git.commitMerge();
    logger.info('✓ Merge completed');
    await this.merger.publish();

    const resolvedPaths = this.list().map((entry) => entry.path);
    const [previousTip, mirrorTip] = await this.git.getCommitParents(commit);
    const newCommitCount = previousTip && mirrorTip ? await this.git.countCommits(previousTip, mirrorTip) : 0;
    const backup = await this.backups.getLatestBackup('integration');

    await this.changelog.append({
      date: this.now().toISOString(),
      upstreamCommit: mirrorTip ?? commit,
      newCommitCount,
      backupTags: backup ? [backup.name] : [],
      conflictsResolved: resolvedPaths,
    });
    this.entries.clear();

    return { commit, resolvedPaths };
  }

  // Modify/delete conflicts have no version on one side: taking that side deletes the path.
  private async takeSide(filePath: string, side: ConflictSide): Promise<void> {
    if (await this.git.hasConflictVersion(filePath, side)) {
      await this.git.checkoutConflictVersion(filePath, side);
      await this.git.add([filePath]);
    } else {
      await this.git.rm([filePath]);
    }
  }
}
