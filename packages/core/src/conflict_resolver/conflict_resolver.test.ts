import { BackupManager } from '../backup';
import { Changelog } from '../changelog';
import { ConflictMarkersPresentError, UnresolvedConflictsError } from '../errors';
import { IntegrationMerger } from '../integration_merge';
import { ProtectedPaths } from '../protected_paths';
import { ScriptedPrompter } from '../prompter';
import { MemoryWorkspace } from '../workspace';
import { createForkRepository } from '../test_helpers';
import type { ForkRepository } from '../test_helpers';
import { ConflictResolver } from './conflict_resolver';
import { scanConflictMarkers } from './conflict_markers';
import { parseConflictChoice, resolveInteractively } from './interactive';

const LOCAL_APP = 'export const version = "custom";\n';
const UPSTREAM_APP = 'export const version = 2;\n';
const LOCAL_README = '# app (fork)\n';

describe('ConflictResolver', () => {
  let repo: ForkRepository;
  let workspace: MemoryWorkspace;
  let resolver: ConflictResolver;
  let localTip: string;
  let upstreamTip: string;

  beforeEach(async () => {
    repo = await createForkRepository();
    workspace = new MemoryWorkspace();
    localTip = repo.git.commitOnBranch(
      'staging',
      { 'src/app.ts': LOCAL_APP, 'README.md': LOCAL_README },
      'local edits'
    );
    const hashes = repo.addUpstreamCommits(['feat: bump version'], () => ({
      'src/app.ts': UPSTREAM_APP,
      'README.md': null,
    }));
    upstreamTip = hashes[0] ?? '';
    repo.git.setBranch('pristine-upstream', upstreamTip);

    const backups = new BackupManager({ git: repo.git, branches: repo.config.branches });
    const merger = new IntegrationMerger({ git: repo.git, backups, config: repo.config });
    await merger.merge({ timestamp: '20240501-100000', date: '2024-05-01', newCommitCount: 1 });

    resolver = new ConflictResolver({
      git: repo.git,
      backups,
      merger,
      changelog: new Changelog(workspace, 'forkflow/SYNC_HISTORY.md'),
      protectedPaths: new ProtectedPaths([{ pattern: 'src', kind: 'dir' }]),
      config: repo.config,
      now: () => new Date('2024-05-01T11:00:00.000Z'),
    });
  });

  describe('load', () => {
    it('should describe every conflicting path', async () => {
      const entries = await resolver.load();

      expect(entries.map((entry) => entry.path)).toEqual(['README.md', 'src/app.ts']);
      const app = entries[1];
      expect(app?.protectedBy).toEqual({ pattern: 'src', kind: 'dir' });
      expect(app?.conflictSections).toBe(1);
      expect(app?.resolution).toBe('unresolved');
      expect(app?.lastLocalCommit?.message).toBe('local edits');
      expect(app?.lastUpstreamCommit?.message).toBe('feat: bump version');
      expect(entries[0]?.protectedBy).toBeNull();
    });

    it('should return nothing when no merge is in progress', async () => {
      await repo.git.mergeAbort();
      expect(await resolver.load()).toEqual([]);
    });
  });

  describe('resolve', () => {
    beforeEach(async () => {
      await resolver.load();
    });

    it('should keep the pre-merge local version byte for byte', async () => {
      const outcome = await resolver.resolve('src/app.ts', { type: 'keep-local' });

      expect(outcome.type).toBe('resolved');
      expect(await repo.git.readWorkingFile('src/app.ts')).toBe(LOCAL_APP);
      expect(await repo.git.getConflictedFiles()).toEqual(['README.md']);
    });

    it('should take the upstream version, deleting paths upstream removed', async () => {
      await resolver.resolve('src/app.ts', { type: 'keep-incoming' });
      await resolver.resolve('README.md', { type: 'keep-incoming' });

      expect(await repo.git.readWorkingFile('src/app.ts')).toBe(UPSTREAM_APP);
      expect(await repo.git.readWorkingFile('README.md')).toBeNull();
      expect(resolver.unresolved()).toEqual([]);
    });

    it('should refuse a manual resolution while markers remain unless forced', async () => {
      await expect(resolver.resolve('src/app.ts', { type: 'manual' })).rejects.toThrow(ConflictMarkersPresentError);
      expect(resolver.unresolved()).toEqual(['README.md', 'src/app.ts']);

      const outcome = await resolver.resolve('src/app.ts', { type: 'manual', force: true });
      expect(outcome).toMatchObject({ type: 'resolved', entry: { resolution: 'manual' } });
    });

    it('should accept a manual edit without markers', async () => {
      repo.git.writeWorkingFile('src/app.ts', 'export const version = "custom-2";\n');
      await resolver.resolve('src/app.ts', { type: 'manual' });
      expect(await repo.git.getConflictedFiles()).toEqual(['README.md']);
    });

    it('should show a diff without changing anything', async () => {
      const outcome = await resolver.resolve('src/app.ts', { type: 'view-diff' });

      expect(outcome.type).toBe('diff');
      if (outcome.type === 'diff') {
        expect(outcome.diff.startsWith('--- a/src/app.ts\n+++ b/src/app.ts\n')).toBe(true);
      }
      expect(resolver.unresolved()).toEqual(['README.md', 'src/app.ts']);
    });

    it('should leave skipped paths unresolved', async () => {
      expect((await resolver.resolve('README.md', { type: 'skip' })).type).toBe('skipped');
      expect(resolver.unresolved()).toContain('README.md');
    });

    it('should abort back to the pre-merge integration tip', async () => {
      const outcome = await resolver.resolve('README.md', { type: 'abort' });

      expect(outcome).toEqual({ type: 'aborted', restoredTo: null });
      expect(await repo.git.isMergeInProgress()).toBe(false);
      expect(repo.git.getBranch('staging')).toBe(localTip);
      expect(await repo.git.readWorkingFile('src/app.ts')).toBe(LOCAL_APP);
    });
  });

  describe('complete', () => {
    beforeEach(async () => {
      await resolver.load();
    });

    it('should refuse while paths are unresolved', async () => {
      await resolver.resolve('src/app.ts', { type: 'keep-local' });
      await expect(resolver.complete()).rejects.toThrow(UnresolvedConflictsError);
    });

    it('should commit, push and record the resolved paths', async () => {
      await resolver.resolve('src/app.ts', { type: 'keep-local' });
      await resolver.resolve('README.md', { type: 'keep-local' });

      const result = await resolver.complete();

      expect(result.resolvedPaths).toEqual(['README.md', 'src/app.ts']);
      expect(await repo.git.getCommitParents(result.commit)).toEqual([localTip, upstreamTip]);
      expect(repo.git.getRemoteBranch('origin', 'staging')).toBe(result.commit);
      const history = workspace.getFile('forkflow/SYNC_HISTORY.md') ?? '';
      expect(history).toContain(`- Upstream commit: \`${upstreamTip}\``);
      expect(history).toContain('- New upstream commits: 1');
      expect(history).toContain('- Backup tags: backup/integration-20240501-100000');
      expect(history).toContain('- Conflicts resolved: README.md, src/app.ts');
    });
  });

  describe('resolveInteractively', () => {
    it('should walk every path and complete the merge', async () => {
      const prompter = new ScriptedPrompter(['2', '4', '1', 'y']);

      const result = await resolveInteractively(resolver, prompter);

      expect(result.status).toBe('completed');
      expect(prompter.questions).toEqual([
        'Choose action (1-6): ',
        'Choose action (1-6): ',
        'Choose action (1-6): ',
        'Complete the merge commit? (Y/n): ',
      ]);
      expect(prompter.output.some((text) => text.startsWith('--- a/src/app.ts'))).toBe(true);
      expect(await repo.git.isMergeInProgress()).toBe(false);
    });

    it('should report paths left unresolved', async () => {
      const prompter = new ScriptedPrompter(['5', '3', 'n']);

      const result = await resolveInteractively(resolver, prompter);

      expect(result).toEqual({ status: 'unresolved', unresolved: ['README.md', 'src/app.ts'] });
      expect(prompter.edited).toEqual(['src/app.ts']);
      expect(await repo.git.isMergeInProgress()).toBe(true);
    });

    it('should accept a manual edit that removed the markers', async () => {
      const prompter = new ScriptedPrompter(['1', '3', 'Y'], (filePath) =>
        repo.git.writeWorkingFile(filePath, 'export const version = "both";\n')
      );

      const result = await resolveInteractively(resolver, prompter);

      expect(result.status).toBe('completed');
      expect(await repo.git.getFileContent('staging', 'src/app.ts')).toBe('export const version = "both";\n');
    });

    it('should abort on request', async () => {
      const result = await resolveInteractively(resolver, new ScriptedPrompter(['6']));
      expect(result).toEqual({ status: 'aborted', restoredTo: null });
    });

    it('should offer to commit a merge whose conflicts are already staged', async () => {
      await resolver.load();
      await resolver.resolve('src/app.ts', { type: 'keep-local' });
      await resolver.resolve('README.md', { type: 'keep-local' });

      const prompter = new ScriptedPrompter(['n']);
      expect(await resolveInteractively(resolver, prompter)).toEqual({ status: 'pending-commit' });
      expect(prompter.questions).toEqual(['Complete the merge commit? (Y/n): ']);
    });
  });
});

describe('conflict markers', () => {
  it('should find marker lines', () => {
    expect(scanConflictMarkers('a\n<<<<<<< HEAD\nb\n=======\nc\n>>>>>>> upstream\n')).toEqual([2, 4, 6]);
    expect(scanConflictMarkers('title\n=====\n')).toEqual([]);
  });

  it('should map menu choices to actions', () => {
    expect(parseConflictChoice('3')).toEqual({ type: 'manual' });
    expect(parseConflictChoice('9')).toBeNull();
  });
});
