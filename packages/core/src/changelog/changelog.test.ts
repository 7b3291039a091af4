import { MemoryWorkspace } from '../workspace';
import { Changelog, formatChangelogEntry } from './changelog';

const entry = {
  date: '2024-05-01T10:00:05.000Z',
  upstreamCommit: 'abc123',
  newCommitCount: 3,
  backupTags: ['backup/mirror-20240501-100000', 'backup/integration-20240501-100000'],
  conflictsResolved: [],
};

describe('Changelog', () => {
  it('should format an entry', () => {
    expect(formatChangelogEntry(entry)).toBe(
      [
        '',
        '## 2024-05-01 10:00:05 UTC',
        '',
        '- Upstream commit: `abc123`',
        '- New upstream commits: 3',
        '- Backup tags: backup/mirror-20240501-100000, backup/integration-20240501-100000',
        '- Conflicts resolved: none',
        '',
      ].join('\n')
    );
  });

  it('should create the document with a header and append entries', async () => {
    const workspace = new MemoryWorkspace();
    const changelog = new Changelog(workspace, 'forkflow/SYNC_HISTORY.md');

    await changelog.append(entry);
    await changelog.append({ ...entry, conflictsResolved: ['src/app.ts'] });

    const content = workspace.getFile('forkflow/SYNC_HISTORY.md') ?? '';
    expect(content.startsWith('# Sync History\n')).toBe(true);
    expect(content.match(/^## /gm)).toHaveLength(2);
    expect(content.endsWith('- Conflicts resolved: src/app.ts\n')).toBe(true);
    expect(await changelog.exists()).toBe(true);
  });
});
