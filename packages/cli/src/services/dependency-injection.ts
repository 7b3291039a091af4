import * as path from 'path';
import {
  Backup,
  Changelog,
  Config,
  ConfigStore,
  ConflictResolver,
  Errors,
  Git,
  HealthCheck,
  IntegrationMerge,
  Logger,
  ProtectedPaths,
  Rollback,
  SessionLease,
  Sync,
  Workspace,
} from '@forkflow/core';
import type { Prompter } from '@forkflow/core';
import { createExecCommand } from './exec-command';
import { TerminalPrompter } from './terminal-prompter';

/**
 * Dependency Injection Service for the forkflow CLI
 *
 * Builds the core modules for the repository the CLI runs in.
 * Instances are created lazily and shared for the lifetime of the process.
 */
export class DependencyInjectionService {
  private static instance: DependencyInjectionService | null = null;
  private projectRoot: string | null = null;
  private execCommand: Git.ExecCommand | null = null;
  private gitModule: Git.LocalGitModule | null = null;
  private workspace: Workspace.FsWorkspace | null = null;
  private config: Config.ForkflowConfig | null = null;
  private leaseManager: SessionLease.SessionLeaseManager | null = null;
  private prompter: Prompter.Prompter | null = null;

  private constructor() { }

  /**
   * Singleton pattern to ensure single instance across CLI
   */
  static getInstance(): DependencyInjectionService {
    if (!DependencyInjectionService.instance) {
      DependencyInjectionService.instance = new DependencyInjectionService();
    }
    return DependencyInjectionService.instance;
  }

  /**
   * Nearest ancestor of the working directory that holds a .git entry
   */
  getProjectRoot(): string {
    if (!this.projectRoot) {
      const root = ConfigStore.FsConfigStore.findProjectRoot();
      if (!root) {
        throw new Errors.EnvironmentError('Not a git repository (or any of the parent directories)', [
          'cd <your fork checkout>',
        ]);
      }
      this.projectRoot = root;
    }
    return this.projectRoot;
  }

  getExecCommand(): Git.ExecCommand {
    if (!this.execCommand) {
      this.execCommand = createExecCommand(this.getProjectRoot());
    }
    return this.execCommand;
  }

  getGitModule(): Git.LocalGitModule {
    if (!this.gitModule) {
      this.gitModule = new Git.LocalGitModule({
        repoRoot: this.getProjectRoot(),
        execCommand: this.getExecCommand(),
      });
    }
    return this.gitModule;
  }

  getWorkspace(): Workspace.FsWorkspace {
    if (!this.workspace) {
      this.workspace = new Workspace.FsWorkspace({ cwd: this.getProjectRoot() });
    }
    return this.workspace;
  }

  /**
   * Loads configuration and points the log file sink at config.logFile.
   */
  async getConfig(): Promise<Config.ForkflowConfig> {
    if (!this.config) {
      const root = this.getProjectRoot();
      this.config = await ConfigStore.createConfigManager(root).loadConfig();
      Logger.setLogFile(path.resolve(root, this.config.logFile));
    }
    return this.config;
  }

  async getLeaseManager(): Promise<SessionLease.SessionLeaseManager> {
    if (!this.leaseManager) {
      const config = await this.getConfig();
      const gitDir = await this.getGitModule().getGitDir();
      this.leaseManager = new SessionLease.SessionLeaseManager({
        store: new SessionLease.FsLeaseStore(gitDir),
        ttlSeconds: config.lease.ttlSeconds,
      });
    }
    return this.leaseManager;
  }

  /**
   * The sync history lives under the git directory, beside the session lease.
   */
  async getChangelog(): Promise<Changelog.Changelog> {
    const config = await this.getConfig();
    const gitDir = await this.getGitModule().getGitDir();
    return new Changelog.Changelog(new Workspace.FsWorkspace({ cwd: gitDir }), config.changelogFile);
  }

  getPrompter(): Prompter.Prompter {
    if (!this.prompter) {
      this.prompter = new TerminalPrompter(this.getProjectRoot());
    }
    return this.prompter;
  }

  async getSyncPipeline(): Promise<Sync.SyncPipeline> {
    return new Sync.SyncPipeline({
      git: this.getGitModule(),
      workspace: this.getWorkspace(),
      execCommand: this.getExecCommand(),
      config: await this.getConfig(),
      prompter: this.getPrompter(),
      leases: await this.getLeaseManager(),
      changelog: await this.getChangelog(),
    });
  }

  async getRollbackManager(): Promise<Rollback.RollbackManager> {
    const config = await this.getConfig();
    const git = this.getGitModule();
    return new Rollback.RollbackManager({
      git,
      backups: new Backup.BackupManager({ git, branches: config.branches }),
      config,
    });
  }

  async getConflictResolver(): Promise<ConflictResolver.ConflictResolver> {
    const config = await this.getConfig();
    const git = this.getGitModule();
    const workspace = this.getWorkspace();
    const backups = new Backup.BackupManager({ git, branches: config.branches });
    return new ConflictResolver.ConflictResolver({
      git,
      backups,
      merger: new IntegrationMerge.IntegrationMerger({ git, backups, config }),
      changelog: await this.getChangelog(),
      protectedPaths: await ProtectedPaths.ProtectedPaths.load(workspace, config.protectedPathsFile),
      config,
    });
  }

  async getHealthChecker(): Promise<HealthCheck.HealthChecker> {
    return new HealthCheck.HealthChecker({
      git: this.getGitModule(),
      workspace: this.getWorkspace(),
      leases: await this.getLeaseManager(),
      changelog: await this.getChangelog(),
      config: await this.getConfig(),
    });
  }
}
