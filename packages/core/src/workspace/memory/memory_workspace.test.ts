import { MemoryWorkspace } from './memory_workspace';
import { WorkspaceError } from '../workspace';

describe('MemoryWorkspace', () => {
  it('should accept files as a record or a map', async () => {
    const fromRecord = new MemoryWorkspace({ files: { 'a.txt': 'a' } });
    const fromMap = new MemoryWorkspace({ files: new Map([['b.txt', 'b']]) });

    expect(await fromRecord.read('a.txt')).toBe('a');
    expect(await fromMap.read('b.txt')).toBe('b');
  });

  it('should derive directories from file paths and explicit entries', async () => {
    const workspace = new MemoryWorkspace({ files: { 'src/app.ts': '' }, directories: ['tests/'] });

    expect(await workspace.isDirectory('src')).toBe(true);
    expect(await workspace.isDirectory('tests')).toBe(true);
    expect(await workspace.exists('tests/')).toBe(true);
    expect(await workspace.isDirectory('src/app.ts')).toBe(false);
    expect(await workspace.exists('docs')).toBe(false);
  });

  it('should list with globs and ignores', async () => {
    const workspace = new MemoryWorkspace({
      files: { 'dist/b.js': '', 'dist/a.js': '', 'dist/a.js.map': '', 'src/a.ts': '' },
    });

    expect(await workspace.list(['dist/**'], { ignore: ['**/*.map'] })).toEqual(['dist/a.js', 'dist/b.js']);
  });

  it('should append to new and existing files', async () => {
    const workspace = new MemoryWorkspace();

    await workspace.append('log.md', 'one\n');
    await workspace.append('log.md', 'two\n');

    expect(workspace.getFile('log.md')).toBe('one\ntwo\n');
  });

  it('should throw FILE_NOT_FOUND for missing files', async () => {
    const workspace = new MemoryWorkspace();
    await expect(workspace.read('missing')).rejects.toBeInstanceOf(WorkspaceError);
  });
});
