import {
  Backup,
  Changelog,
  Config,
  ConflictResolver,
  Git,
  IntegrationMerge,
  Prompter,
  ProtectedPaths,
  SessionLease,
  Sync,
  Workspace,
} from '@forkflow/core';
import { createSession } from '../../test_helpers';

const mockPipeline = {
  resume: jest.fn<Promise<Sync.SyncSession>, [string]>(),
};

const mockDependencyService = {
  getConflictResolver: jest.fn(),
  getLeaseManager: jest.fn(),
  getPrompter: jest.fn(),
  getSyncPipeline: jest.fn(),
  getConfig: jest.fn(),
};

jest.mock('../../services/dependency-injection', () => ({
  DependencyInjectionService: {
    getInstance: () => mockDependencyService,
  },
}));

import { ResolveConflictsCommand } from './resolve-conflicts-command';

const mockConsoleLog = jest.spyOn(console, 'log').mockImplementation();
const mockConsoleError = jest.spyOn(console, 'error').mockImplementation();
const mockProcessExit = jest.spyOn(process, 'exit').mockImplementation();

describe('ResolveConflictsCommand - Unit Tests', () => {
  const config = Config.createDefaultConfig();
  let git: Git.MemoryGitModule;
  let workspace: Workspace.MemoryWorkspace;
  let leaseStore: SessionLease.MemoryLeaseStore;
  let prompter: Prompter.ScriptedPrompter;

  function setAnswers(answers: string[]): void {
    prompter = new Prompter.ScriptedPrompter(answers);
    mockDependencyService.getPrompter.mockReturnValue(prompter);
  }

  // staging and upstream both changed src/app.ts since the common root
  async function startConflictedMerge(): Promise<void> {
    const root = git.seedCommit({ 'src/app.ts': 'export const version = 1;\n' }, 'initial');
    const local = git.seedCommit({ 'src/app.ts': 'export const version = "custom";\n' }, 'local edits', [root]);
    const upstream = git.seedCommit({ 'src/app.ts': 'export const version = 2;\n' }, 'feat: bump version', [root]);
    git.setBranch(config.branches.mirror, upstream);
    git.setBranch(config.branches.integration, local);
    git.setBranch(config.branches.production, local);
    git.setHead(config.branches.integration);
    git.addRemote('origin', 'https://example.com/fork.git');
    git.setRemoteBranch('origin', config.branches.integration, local);
    await git.fetch('origin');

    const backups = new Backup.BackupManager({ git, branches: config.branches });
    const merger = new IntegrationMerge.IntegrationMerger({ git, backups, config });
    await merger.merge({ timestamp: '20240502-083000', date: '2024-05-02', newCommitCount: 1 });

    mockDependencyService.getConflictResolver.mockResolvedValue(
      new ConflictResolver.ConflictResolver({
        git,
        backups,
        merger,
        changelog: new Changelog.Changelog(workspace, config.changelogFile),
        protectedPaths: new ProtectedPaths.ProtectedPaths([]),
        config,
      })
    );
  }

  beforeEach(async () => {
    jest.clearAllMocks();
    git = new Git.MemoryGitModule();
    workspace = new Workspace.MemoryWorkspace();
    leaseStore = new SessionLease.MemoryLeaseStore();
    mockDependencyService.getLeaseManager.mockResolvedValue(
      new SessionLease.SessionLeaseManager({ store: leaseStore, ttlSeconds: 600, pid: 4242, hostname: 'test-host' })
    );
    mockDependencyService.getSyncPipeline.mockResolvedValue(mockPipeline);
    mockDependencyService.getConfig.mockResolvedValue(config);
    await startConflictedMerge();
  });

  afterAll(() => {
    mockConsoleLog.mockRestore();
    mockConsoleError.mockRestore();
    mockProcessExit.mockRestore();
  });

  it('should complete the merge and stop there under --no-continue', async () => {
    setAnswers(['1', '']);

    await new ResolveConflictsCommand().execute({ continue: false });

    expect(prompter.questions).toEqual(['Choose action (1-6): ', 'Complete the merge commit? (Y/n): ']);
    expect(await git.isMergeInProgress()).toBe(false);
    expect(await git.readWorkingFile('src/app.ts')).toBe('export const version = "custom";\n');
    expect(mockConsoleLog.mock.calls[0][0]).toMatch(/^✓ Merge completed \([0-9a-f]{7}\)$/);
    expect(mockConsoleLog).toHaveBeenCalledWith('Continue later with: forkflow sync');
    expect(mockDependencyService.getSyncPipeline).not.toHaveBeenCalled();
    expect(leaseStore.getLease()).toBeNull();
    expect(mockProcessExit).not.toHaveBeenCalled();
  });

  it('should continue the sync from the test gate once the lease is released', async () => {
    const session = createSession({ testResult: 'passed', promoted: true, operatorOverride: true });
    mockPipeline.resume.mockImplementation(async () => {
      expect(leaseStore.getLease()).toBeNull();
      return session;
    });
    setAnswers(['2', 'Y']);

    await new ResolveConflictsCommand().execute({});

    expect(await git.readWorkingFile('src/app.ts')).toBe('export const version = 2;\n');
    expect(mockPipeline.resume).toHaveBeenCalledWith('manual');
    expect(mockConsoleLog).toHaveBeenLastCalledWith(Sync.formatSessionSummary(session, config.branches));
    expect(mockProcessExit).not.toHaveBeenCalled();
  });

  it('should exit 1 while conflicts remain unresolved', async () => {
    setAnswers(['5']);

    await new ResolveConflictsCommand().execute({});

    expect(prompter.output).toContain('Some conflicts remain unresolved:\n  src/app.ts');
    expect(await git.isMergeInProgress()).toBe(true);
    expect(mockConsoleError).toHaveBeenCalledWith('❌ 1 conflicting file(s) still unresolved');
    expect(mockProcessExit).toHaveBeenCalledWith(1);
    expect(mockPipeline.resume).not.toHaveBeenCalled();
  });

  it('should exit 1 after the operator aborts the merge', async () => {
    setAnswers(['6']);

    await new ResolveConflictsCommand().execute({});

    expect(await git.isMergeInProgress()).toBe(false);
    expect(mockConsoleError).toHaveBeenCalledWith('❌ Merge aborted');
    expect(mockProcessExit).toHaveBeenCalledWith(1);
  });

  it('should leave the merge commit for later when the operator says no', async () => {
    setAnswers(['1', 'n']);

    await new ResolveConflictsCommand().execute({});

    expect(await git.isMergeInProgress()).toBe(true);
    expect(prompter.output).toContain('Merge commit ready. Complete it later with: forkflow resolve-conflicts');
    expect(mockProcessExit).not.toHaveBeenCalled();
    expect(mockPipeline.resume).not.toHaveBeenCalled();
  });

  it('should report that nothing needs resolving when no merge is in progress', async () => {
    await git.mergeAbort();
    setAnswers([]);

    await new ResolveConflictsCommand().execute({});

    expect(prompter.output).toEqual(['No merge conflicts detected!']);
    expect(mockProcessExit).not.toHaveBeenCalled();
  });
});
