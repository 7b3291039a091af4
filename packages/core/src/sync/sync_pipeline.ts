/**
 * SyncPipeline - one fork sync session, stage by stage
 *
 * Lease → preconditions → fetch → mirror → integration → changelog → tests →
 * promotion → deploy/notify. Every stage that moves a branch tags it first.
 * A halt leaves the repository at the last completed ref update and records
 * the stage and the commands that recover from it.
 */

import type { IGitModule } from '../git/git_module';
import type { ExecCommand } from '../git/types';
import { GitCommandError } from '../git/errors';
import type { ForkflowConfig } from '../config_manager/config_manager.types';
import type { Workspace } from '../workspace';
import type { Prompter } from '../prompter';
import { confirm } from '../prompter';
import type { SessionLeaseManager } from '../session_lease';
import { withLease } from '../session_lease';
import { BackupManager, BRANCH_ROLES, formatSessionTimestamp } from '../backup';
import type { BackupTag } from '../backup';
import { MirrorUpdater } from '../mirror';
import { IntegrationMerger, conflictRemediation } from '../integration_merge';
import type { Changelog } from '../changelog';
import { TestGate, formatCommand } from '../test_gate';
import { Promoter } from '../promoter';
import type { SyncMode } from '../promoter';
import { PostPromotionNotifier } from '../notifier';
import { ProtectedPaths } from '../protected_paths';
import {
  DirtyStateError,
  EnvironmentError,
  FetchError,
  SyncError,
  TestFailureError,
} from '../errors';
import type { SyncStage } from '../errors';
import { createLogger } from '../logger/logger';
import type { SyncSession } from './sync.types';

const logger = createLogger('[Sync] ');

/** Upstream commits listed before the operator confirms a manual sync */
const PREVIEW_COMMITS = 10;

export type SyncPipelineDependencies = {
  git: IGitModule;
  workspace: Workspace;
  execCommand: ExecCommand;
  config: ForkflowConfig;
  prompter: Prompter;
  leases: SessionLeaseManager;
  /** Sync history kept under the git directory */
  changelog: Changelog;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
};

/** Upstream commits brought in by the run: `from..to` */
type MergedRange = { from: string; to: string };

export class SyncPipeline {
  private readonly git: IGitModule;
  private readonly workspace: Workspace;
  private readonly config: ForkflowConfig;
  private readonly prompter: Prompter;
  private readonly leases: SessionLeaseManager;
  private readonly now: () => Date;

  private readonly backups: BackupManager;
  private readonly mirror: MirrorUpdater;
  private readonly merger: IntegrationMerger;
  private readonly changelog: Changelog;
  private readonly tests: TestGate;
  private readonly promoter: Promoter;
  private readonly notifier: PostPromotionNotifier;

  private stage: SyncStage = 'preconditions';

  constructor(dependencies: SyncPipelineDependencies) {
    this.git = dependencies.git;
    this.workspace = dependencies.workspace;
    this.config = dependencies.config;
    this.prompter = dependencies.prompter;
    this.leases = dependencies.leases;
    this.now = dependencies.now ?? (() => new Date());

    const { git, config } = dependencies;
    this.backups = new BackupManager({ git, branches: config.branches });
    this.mirror = new MirrorUpdater({ git, backups: this.backups, config });
    this.merger = new IntegrationMerger({ git, backups: this.backups, config });
    this.changelog = dependencies.changelog;
    this.tests = new TestGate({ workspace: dependencies.workspace, execCommand: dependencies.execCommand, config });
    this.promoter = new Promoter({ git, backups: this.backups, prompter: dependencies.prompter, config });
    this.notifier = new PostPromotionNotifier({
      git,
      workspace: dependencies.workspace,
      execCommand: dependencies.execCommand,
      config,
      sleep: dependencies.sleep,
    });
  }

  /**
   * Runs a full sync session under the session lease.
   * Never throws for pipeline failures: they come back as a halted session.
   */
  async run(mode: SyncMode): Promise<SyncSession> {
    const session = this.createSession(mode);
    logger.info(`=== Upstream Sync - ${session.date} (${mode} mode) ===`);
    return this.underLease(session, 'sync', () => this.execute(session));
  }

  /**
   * Continues a session whose integration merge was completed by the
   * conflict resolver: test gate, promotion, deploy and notification.
   */
  async resume(mode: SyncMode): Promise<SyncSession> {
    const session = this.createSession(mode);
    logger.info(`=== Resuming sync after conflict resolution (${mode} mode) ===`);
    return this.underLease(session, 'sync --resume', () => this.executeResume(session));
  }

  private async execute(session: SyncSession): Promise<SyncSession> {
    const { mirror, integration } = this.config.branches;
    const upstreamRef = this.mirror.upstreamRef;

    this.enter('preconditions');
    await this.checkPreconditions();

    this.enter('fetch');
    await this.fetch(this.config.remotes.upstream);
    await this.fetch(this.config.remotes.origin);

    const upstreamCommit = await this.git.resolveRef(upstreamRef);
    if (!upstreamCommit) {
      throw new EnvironmentError(`${upstreamRef} not found after fetching`, [
        `git ls-remote ${this.config.remotes.upstream} ${this.config.remotes.upstreamBranch}`,
      ]);
    }
    session.upstreamCommit = upstreamCommit;

    const mirrorCommit = await this.git.getCommitHash(mirror);
    if (mirrorCommit === upstreamCommit && (await this.git.isAncestor(mirrorCommit, integration))) {
      logger.info('✓ Already up to date with upstream. Nothing to do.');
      session.status = 'up-to-date';
      return session;
    }

    const integrationTip = await this.git.getCommitHash(integration);
    const range: MergedRange = { from: integrationTip, to: upstreamCommit };
    session.newCommitCount = await this.git.countCommits(integrationTip, upstreamCommit);
    logger.info(`Found ${session.newCommitCount} new upstream commit(s)`);

    if (session.mode === 'manual') {
      await this.previewCommits(range);
      if (!(await confirm(this.prompter, 'Proceed with sync?'))) {
        logger.info('Sync cancelled by user');
        session.status = 'cancelled';
        return session;
      }
    }

    const created: BackupTag[] = [];
    try {
      this.enter('mirror');
      const mirrorResult = await this.mirror.update(session.timestamp);
      if (mirrorResult.backupTag) {
        created.push(mirrorResult.backupTag);
        session.backupTags.push(mirrorResult.backupTag.name);
      }
      session.warnings.push(...mirrorResult.warnings);

      this.enter('integration');
      const merge = await this.merger.merge({
        timestamp: session.timestamp,
        date: session.date,
        newCommitCount: session.newCommitCount,
      });
      created.push(merge.backupTag);
      session.backupTags.push(merge.backupTag.name);

      if (merge.status === 'conflicts') {
        session.conflictFiles = merge.conflictFiles;
        await this.flagProtectedConflicts(session);
        return this.halt(
          session,
          new SyncError(
            `Merge conflicts in ${integration}: ${merge.conflictFiles.join(', ')}`,
            'integration',
            conflictRemediation(merge.backupTag.name)
          )
        );
      }

      await this.changelog.append({
        date: this.now().toISOString(),
        upstreamCommit,
        newCommitCount: session.newCommitCount,
        backupTags: [...session.backupTags],
        conflictsResolved: [],
      });

      return await this.testAndPromote(session, range, merge.backupTag.name);
    } finally {
      await this.publishBackups(session, created);
    }
  }

  private async executeResume(session: SyncSession): Promise<SyncSession> {
    const { mirror, integration, production } = this.config.branches;

    this.enter('preconditions');
    await this.checkPreconditions();

    const integrationTip = await this.git.getCommitHash(integration);
    const mirrorTip = await this.git.getCommitHash(mirror);
    if (!(await this.git.isAncestor(mirrorTip, integrationTip))) {
      throw new SyncError(`${integration} does not contain ${mirror}; there is no completed merge to continue`, 'conflicts', [
        'forkflow resolve-conflicts',
        'forkflow sync',
      ]);
    }
    if (await this.git.isAncestor(integrationTip, production)) {
      logger.info(`✓ ${production} already contains ${integration}. Nothing to do.`);
      session.status = 'up-to-date';
      return session;
    }

    // Parents of the sync merge: integration before it, and the mirror tip it brought in
    const [previousTip, mergedTip] = await this.git.getCommitParents(integrationTip);
    const range: MergedRange = { from: previousTip ?? integrationTip, to: mergedTip ?? integrationTip };
    session.upstreamCommit = mirrorTip;
    session.newCommitCount = await this.git.countCommits(range.from, range.to);

    const backup = await this.backups.getLatestBackup('integration');
    await this.git.checkoutBranch(integration);
    return this.testAndPromote(session, range, backup?.name ?? null);
  }

  private async testAndPromote(session: SyncSession, range: MergedRange, integrationBackup: string | null): Promise<SyncSession> {
    const { integration } = this.config.branches;

    this.enter('tests');
    const gate = await this.tests.run();
    session.testResult = gate.result;
    session.warnings.push(...gate.warnings);

    if (gate.result === 'failed') {
      const remediation = [
        ...(integrationBackup ? [`forkflow rollback ${integrationBackup}`] : []),
        ...(gate.command ? [`git checkout ${integration} && ${formatCommand(gate.command)}`] : []),
      ];
      return this.halt(session, new TestFailureError(gate.exitCode ?? 1, remediation));
    }

    this.enter('promotion');
    const promotion = await this.promoter.promote({
      timestamp: session.timestamp,
      date: session.date,
      mode: session.mode,
      testResult: gate.result,
    });

    if (promotion.status === 'blocked') {
      return this.halt(
        session,
        new SyncError(`Promotion blocked: ${promotion.reason}`, 'promotion', [
          'Configure testCommand in .forkflow/config.json',
          'or set requireTests to false to promote without a test suite',
        ])
      );
    }
    if (promotion.status === 'declined') {
      session.status = 'completed';
      return session;
    }

    session.promoted = true;
    session.operatorOverride = promotion.operatorOverride;
    session.backupTags.push(promotion.backupTag.name);
    await this.publishBackups(session, [promotion.backupTag]);

    this.enter('post-promotion');
    await this.postPromotion(session, range);

    session.status = 'completed';
    logger.info('=== Sync Complete ===');
    return session;
  }

  /**
   * Rebuild and notification never undo a promotion; their failures are warnings.
   */
  private async postPromotion(session: SyncSession, range: MergedRange): Promise<void> {
    try {
      session.deploy = await this.notifier.deploy();
      session.warnings.push(...session.deploy.warnings);
    } catch (error) {
      const message = `Post-promotion deploy failed: ${error instanceof Error ? error.message : String(error)}`;
      logger.warn(message);
      session.warnings.push(message);
    }

    session.notification = await this.notifier.notify({
      newCommitCount: session.newCommitCount,
      date: session.date,
      range,
      deploy: session.deploy,
    });
    if (session.notification.warning) {
      session.warnings.push(session.notification.warning);
    }
  }

  private async checkPreconditions(): Promise<void> {
    const { remotes } = this.config;

    if (!(await this.git.isRepository())) {
      throw new EnvironmentError('Not in a git repository!', ['cd into the fork checkout']);
    }
    for (const remote of [remotes.upstream, remotes.origin]) {
      if (!(await this.git.isRemoteConfigured(remote))) {
        throw new EnvironmentError(`Remote ${remote} not found`, [`git remote add ${remote} <url>`]);
      }
    }
    if (await this.git.isMergeInProgress()) {
      throw new EnvironmentError('A merge is in progress', ['forkflow resolve-conflicts', 'git merge --abort']);
    }
    if (await this.git.hasUncommittedChanges()) {
      throw new DirtyStateError();
    }
    for (const role of BRANCH_ROLES) {
      const branch = this.config.branches[role];
      if (!(await this.git.branchExists(branch))) {
        throw new EnvironmentError(`Branch missing: ${branch} (${role})`, [`git branch ${branch} ${remotes.origin}/${branch}`]);
      }
    }
  }

  private async fetch(remote: string): Promise<void> {
    try {
      await this.git.fetch(remote);
    } catch (error) {
      if (error instanceof GitCommandError) {
        throw new FetchError(remote, error.stderr.trim() || error.message);
      }
      throw new FetchError(remote, error instanceof Error ? error.message : String(error));
    }
    logger.info(`✓ Fetched ${remote}`);
  }

  private async previewCommits(range: MergedRange): Promise<void> {
    const commits = await this.git.getCommitHistoryRange(range.from, range.to, { maxCount: PREVIEW_COMMITS });
    this.prompter.show(['Recent upstream commits:', ...commits.map((commit) => `  ${commit.hash.slice(0, 7)} ${commit.message}`)].join('\n'));
  }

  private async flagProtectedConflicts(session: SyncSession): Promise<void> {
    const protectedPaths = await ProtectedPaths.load(this.workspace, this.config.protectedPathsFile);
    for (const file of session.conflictFiles) {
      const entry = protectedPaths.match(file);
      if (entry) {
        session.warnings.push(`${file} is protected (${entry.pattern}); review the resolution carefully`);
      }
    }
  }

  private async publishBackups(session: SyncSession, tags: BackupTag[]): Promise<void> {
    const failed = await this.backups.pushBackups(this.config.remotes.origin, tags);
    for (const name of failed) {
      session.warnings.push(`Backup tag ${name} exists only locally; push it with: git push ${this.config.remotes.origin} ${name}`);
    }
  }

  private async underLease(
    session: SyncSession,
    command: string,
    fn: () => Promise<unknown>
  ): Promise<SyncSession> {
    this.stage = 'lease';
    try {
      await withLease(this.leases, command, async () => {
        try {
          await fn();
        } catch (error) {
          this.halt(session, error);
        }
      });
    } catch (error) {
      this.halt(session, error);
    }
    await this.recordBranches(session);
    return session;
  }

  private halt(session: SyncSession, error: unknown): SyncSession {
    const stage = error instanceof SyncError ? error.stage : this.stage;
    const message = error instanceof Error ? error.message : String(error);

    session.status = 'halted';
    session.haltedStage = stage;
    session.error = message;
    if (error instanceof SyncError && error.remediation.length > 0) {
      session.remediation = error.remediation;
    } else {
      const lastBackup = session.backupTags[session.backupTags.length - 1];
      session.remediation = lastBackup ? [`forkflow rollback ${lastBackup}`, 'forkflow health-check'] : ['forkflow health-check'];
    }
    logger.error(`✗ Halted at ${stage}: ${message}`);
    return session;
  }

  private enter(stage: SyncStage): void {
    this.stage = stage;
    logger.debug(`Stage: ${stage}`);
  }

  private async recordBranches(session: SyncSession): Promise<void> {
    for (const role of BRANCH_ROLES) {
      session.branches[role] = await this.git.resolveRef(this.config.branches[role]);
    }
  }

  private createSession(mode: SyncMode): SyncSession {
    const startedAt = this.now();
    return {
      timestamp: formatSessionTimestamp(startedAt),
      startedAt: startedAt.toISOString(),
      date: startedAt.toISOString().slice(0, 10),
      mode,
      upstreamCommit: null,
      newCommitCount: 0,
      backupTags: [],
      conflictFiles: [],
      testResult: 'not-run',
      promoted: false,
      operatorOverride: false,
      status: 'halted',
      haltedStage: null,
      warnings: [],
      remediation: [],
      deploy: null,
      notification: null,
      error: null,
      branches: { mirror: null, integration: null, production: null },
    };
  }
}
