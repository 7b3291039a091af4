/**
 * HealthChecker - read-only diagnostics of the fork
 *
 * Works from what is already fetched; it never fetches, tags or moves a ref.
 */

import type { IGitModule } from '../git/git_module';
import type { ForkflowConfig } from '../config_manager/config_manager.types';
import type { Workspace } from '../workspace';
import { isGlobPattern, parseProtectedPaths } from '../protected_paths';
import type { SessionLeaseManager } from '../session_lease';
import type { Changelog } from '../changelog';
import { BRANCH_ROLES } from '../backup';

export type CheckStatus = 'pass' | 'warn' | 'fail';

export type CheckCategory =
  | 'remotes'
  | 'branches'
  | 'sync'
  | 'backups'
  | 'protected-paths'
  | 'changelog'
  | 'working-tree'
  | 'session';

export type HealthCheckItem = {
  category: CheckCategory;
  status: CheckStatus;
  message: string;
};

export type HealthReport = {
  checks: HealthCheckItem[];
  errors: number;
  warnings: number;
  /** No failed checks; warnings allowed */
  healthy: boolean;
};

export type HealthCheckerDependencies = {
  git: IGitModule;
  workspace: Workspace;
  leases: SessionLeaseManager;
  changelog: Changelog;
  config: ForkflowConfig;
};

/**
 * The repository part of a remote URL (`owner/repo`), without scheme,
 * user, host, port or `.git`, so https and scp-style SSH remotes of the
 * same repository compare equal.
 */
export function repositoryPath(url: string): string {
  const hostAndPath = url
    .trim()
    .replace(/^[a-z][a-z0-9+.-]*:\/\//i, '')
    .replace(/^[^@/]*@/, '');
  const separator = hostAndPath.search(/[:/]/);
  const repoPath = separator === -1 ? hostAndPath : hostAndPath.slice(separator + 1);
  return repoPath
    .replace(/^\d+\//, '')
    .replace(/\/+$/, '')
    .replace(/\.git$/, '')
    .toLowerCase();
}

export class HealthChecker {
  private readonly git: IGitModule;
  private readonly workspace: Workspace;
  private readonly leases: SessionLeaseManager;
  private readonly changelog: Changelog;
  private readonly config: ForkflowConfig;
  private checks: HealthCheckItem[] = [];

  constructor(dependencies: HealthCheckerDependencies) {
    this.git = dependencies.git;
    this.workspace = dependencies.workspace;
    this.leases = dependencies.leases;
    this.changelog = dependencies.changelog;
    this.config = dependencies.config;
  }

  async run(): Promise<HealthReport> {
    this.checks = [];

    await this.checkRemotes();
    const branches = await this.checkBranches();
    await this.checkSync(branches);
    await this.checkBackups();
    await this.checkProtectedPaths();
    await this.checkChangelog();
    await this.checkWorkingTree();
    await this.checkSession();

    const errors = this.checks.filter((check) => check.status === 'fail').length;
    const warnings = this.checks.filter((check) => check.status === 'warn').length;
    return { checks: this.checks, errors, warnings, healthy: errors === 0 };
  }

  private record(category: CheckCategory, status: CheckStatus, message: string): void {
    this.checks.push({ category, status, message });
  }

  private async checkRemotes(): Promise<void> {
    const { upstream, origin, expectedUpstreamUrl } = this.config.remotes;

    const upstreamUrl = await this.git.getRemoteUrl(upstream);
    if (upstreamUrl === null) {
      this.record('remotes', 'fail', `Upstream remote not found: ${upstream}`);
    } else if (expectedUpstreamUrl && repositoryPath(upstreamUrl) !== repositoryPath(expectedUpstreamUrl)) {
      this.record('remotes', 'warn', `Upstream remote exists but points to: ${upstreamUrl}`);
    } else {
      this.record('remotes', 'pass', 'Upstream remote configured correctly');
    }

    if (await this.git.isRemoteConfigured(origin)) {
      this.record('remotes', 'pass', 'Origin remote configured');
    } else {
      this.record('remotes', 'fail', `Origin remote not found: ${origin}`);
    }
  }

  /**
   * @returns Names of the pipeline branches that exist
   */
  private async checkBranches(): Promise<Set<string>> {
    const existing = new Set<string>();
    for (const role of BRANCH_ROLES) {
      const branch = this.config.branches[role];
      if (await this.git.branchExists(branch)) {
        existing.add(branch);
        this.record('branches', 'pass', `Branch exists: ${branch}`);
      } else {
        this.record('branches', 'fail', `Branch missing: ${branch}`);
      }
    }
    return existing;
  }

  private async checkSync(existing: Set<string>): Promise<void> {
    const { mirror, integration, production } = this.config.branches;
    const upstreamRef = `${this.config.remotes.upstream}/${this.config.remotes.upstreamBranch}`;
    const threshold = this.config.healthCheck.mirrorBehindFailThreshold;

    if (existing.has(mirror)) {
      if ((await this.git.resolveRef(upstreamRef)) === null) {
        this.record('sync', 'warn', `${upstreamRef} has not been fetched; run forkflow sync`);
      } else {
        if (!(await this.git.isAncestor(mirror, upstreamRef))) {
          this.record('sync', 'fail', `${mirror} has commits that are not in ${upstreamRef}`);
        }
        const behind = await this.git.countCommits(mirror, upstreamRef);
        if (behind === 0) {
          this.record('sync', 'pass', `${mirror} is up to date`);
        } else if (behind < threshold) {
          this.record('sync', 'warn', `${mirror} is ${behind} commits behind upstream`);
        } else {
          this.record('sync', 'fail', `${mirror} is ${behind} commits behind upstream (sync needed!)`);
        }
      }
    }

    if (existing.has(integration) && existing.has(mirror)) {
      const behind = await this.git.countCommits(integration, mirror);
      this.record(
        'sync',
        behind === 0 ? 'pass' : 'warn',
        behind === 0 ? `${integration} is current with ${mirror}` : `${integration} is ${behind} commits behind ${mirror}`
      );
    }

    if (existing.has(production) && existing.has(integration)) {
      const behind = await this.git.countCommits(production, integration);
      this.record(
        'sync',
        behind === 0 ? 'pass' : 'warn',
        behind === 0
          ? `${production} is current with ${integration}`
          : `${production} is ${behind} commits behind ${integration} (promotion needed)`
      );
    }
  }

  private async checkBackups(): Promise<void> {
    const tags = await this.git.listTags('backup/*');
    const threshold = this.config.healthCheck.backupCleanupThreshold;

    if (tags.length === 0) {
      this.record('backups', 'warn', 'No backup tags found');
      return;
    }
    this.record('backups', 'pass', `Found ${tags.length} backup tag${tags.length === 1 ? '' : 's'}`);
    if (tags.length > threshold) {
      this.record('backups', 'warn', `${tags.length - threshold} old backup tags (consider cleanup)`);
    }

    const emergency = await this.git.listTags('emergency/*');
    if (emergency.length > 0) {
      this.record('backups', 'pass', `Found ${emergency.length} emergency tag${emergency.length === 1 ? '' : 's'}`);
    }
  }

  private async checkProtectedPaths(): Promise<void> {
    const listFile = this.config.protectedPathsFile;
    if (!(await this.workspace.exists(listFile))) {
      this.record('protected-paths', 'warn', `${listFile} file not found`);
      return;
    }
    this.record('protected-paths', 'pass', `${listFile} file exists`);

    const entries = parseProtectedPaths(await this.workspace.read(listFile));
    for (const entry of entries) {
      if (entry.kind === 'dir') {
        if (await this.workspace.isDirectory(entry.pattern)) {
          this.record('protected-paths', 'pass', `Protected directory exists: ${entry.pattern}/`);
        } else {
          this.record('protected-paths', 'fail', `Protected directory missing: ${entry.pattern}/`);
        }
        continue;
      }
      const found = isGlobPattern(entry.pattern)
        ? (await this.workspace.list([entry.pattern])).length > 0
        : await this.workspace.exists(entry.pattern);
      this.record(
        'protected-paths',
        found ? 'pass' : 'warn',
        found ? `Protected file exists: ${entry.pattern}` : `Protected file not found: ${entry.pattern}`
      );
    }
  }

  private async checkChangelog(): Promise<void> {
    const file = this.changelog.filePath;
    if (await this.changelog.exists()) {
      this.record('changelog', 'pass', `${file} exists`);
    } else {
      this.record('changelog', 'warn', `${file} not found (written by the first sync)`);
    }
  }

  private async checkWorkingTree(): Promise<void> {
    if (await this.git.isMergeInProgress()) {
      this.record('working-tree', 'fail', 'A merge is in progress; run forkflow resolve-conflicts');
    } else if (await this.git.hasUncommittedChanges()) {
      this.record('working-tree', 'warn', 'Uncommitted changes to tracked files');
    } else {
      this.record('working-tree', 'pass', 'Working tree clean');
    }
  }

  private async checkSession(): Promise<void> {
    const status = await this.leases.inspect();
    if (!status) {
      this.record('session', 'pass', 'No forkflow session running');
    } else if (status.expired) {
      this.record(
        'session',
        'warn',
        `Expired lease left by ${status.lease.command} (pid ${status.lease.pid} on ${status.lease.hostname}); the next command takes it over`
      );
    } else {
      this.record(
        'session',
        'warn',
        `${status.lease.command} is running (pid ${status.lease.pid} on ${status.lease.hostname}) until ${status.lease.expiresAt}`
      );
    }
  }
}
