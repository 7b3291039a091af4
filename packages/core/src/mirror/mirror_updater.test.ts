import { BackupManager } from '../backup';
import { SyncError } from '../errors';
import { createForkRepository } from '../test_helpers';
import type { ForkRepository } from '../test_helpers';
import { MirrorUpdater } from './mirror_updater';

describe('MirrorUpdater', () => {
  let repo: ForkRepository;
  let updater: MirrorUpdater;

  beforeEach(async () => {
    repo = await createForkRepository();
    updater = new MirrorUpdater({
      git: repo.git,
      backups: new BackupManager({ git: repo.git, branches: repo.config.branches }),
      config: repo.config,
    });
  });

  it('should do nothing when the mirror already matches upstream', async () => {
    const result = await updater.update('20240501-100000');

    expect(result.status).toBe('up-to-date');
    expect(result.backupTag).toBeNull();
    expect(await repo.git.listTags('backup/*')).toEqual([]);
  });

  it('should fast-forward the mirror, back it up first and push it', async () => {
    const [, second] = repo.addUpstreamCommits(['feat: one', 'fix: two']);
    await repo.git.fetch('upstream');

    const result = await updater.update('20240501-100000');

    expect(result.status).toBe('fast-forward');
    expect(result.previousCommit).toBe(repo.root);
    expect(result.commit).toBe(second);
    expect(result.backupTag?.name).toBe('backup/mirror-20240501-100000');
    expect(await repo.git.resolveRef('backup/mirror-20240501-100000')).toBe(repo.root);
    expect(repo.git.getBranch('pristine-upstream')).toBe(second);
    expect(repo.git.getRemoteBranch('origin', 'pristine-upstream')).toBe(second);
    expect(result.warnings).toEqual([]);
  });

  it('should reset a diverged mirror with a warning and force-push it under a lease', async () => {
    const stray = repo.git.commitOnBranch('pristine-upstream', { 'stray.txt': 'oops' }, 'direct commit');
    repo.git.setRemoteBranch('origin', 'pristine-upstream', stray);
    await repo.git.fetch('origin');
    const [upstreamTip] = repo.addUpstreamCommits(['feat: one']);
    await repo.git.fetch('upstream');

    const result = await updater.update('20240501-100000');

    expect(result.status).toBe('reset');
    expect(result.warnings).toEqual([
      'pristine-upstream had commits not in upstream/main; reset it to upstream (previous tip kept in backup/mirror-20240501-100000)',
    ]);
    expect(await repo.git.resolveRef('backup/mirror-20240501-100000')).toBe(stray);
    expect(repo.git.getBranch('pristine-upstream')).toBe(upstreamTip);
    expect(repo.git.getRemoteBranch('origin', 'pristine-upstream')).toBe(upstreamTip);
    expect(await repo.git.isAncestor('pristine-upstream', 'upstream/main')).toBe(true);
  });

  it('should report a push failure at the mirror stage', async () => {
    repo.addUpstreamCommits(['feat: one']);
    await repo.git.fetch('upstream');
    const elsewhere = repo.git.seedCommit({ 'x.txt': 'x' }, 'remote only', [repo.root]);
    repo.git.setRemoteBranch('origin', 'pristine-upstream', elsewhere);

    const error = await updater.update('20240501-100000').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SyncError);
    expect(error).toMatchObject({ stage: 'mirror' });
  });
});
