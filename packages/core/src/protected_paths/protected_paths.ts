/**
 * Protected paths - advisory list of locally modified files
 *
 * Format, one pattern per line:
 *
 *   # comment
 *   src/config/schema.ts      file
 *   extensions/custom/        directory (trailing slash)
 *   src/**\/*.custom.ts        glob
 *
 * Entries annotate conflicts and feed the health check; they never block a merge.
 */

import picomatch from 'picomatch';
import type { Workspace } from '../workspace';

export type ProtectedPathKind = 'file' | 'dir';

export type ProtectedPathEntry = {
  pattern: string;
  kind: ProtectedPathKind;
};

export function parseProtectedPaths(content: string): ProtectedPathEntry[] {
  const entries: ProtectedPathEntry[] = [];
  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line.length === 0 || line.startsWith('#')) continue;

    const pattern = line.replace(/^\.\//, '');
    if (pattern.endsWith('/')) {
      entries.push({ pattern: pattern.replace(/\/+$/, ''), kind: 'dir' });
    } else {
      entries.push({ pattern, kind: 'file' });
    }
  }
  return entries;
}

export function isGlobPattern(pattern: string): boolean {
  return /[*?[\]{}]/.test(pattern);
}

export class ProtectedPaths {
  readonly entries: ProtectedPathEntry[];
  private readonly matchers: Array<{ entry: ProtectedPathEntry; isMatch: (filePath: string) => boolean }>;

  constructor(entries: ProtectedPathEntry[]) {
    this.entries = entries;
    this.matchers = entries.map((entry) => ({
      entry,
      isMatch:
        entry.kind === 'dir'
          ? picomatch([entry.pattern, `${entry.pattern}/**`], { dot: true })
          : picomatch(entry.pattern, { dot: true }),
    }));
  }

  /**
   * Reads the list from the workspace; a missing file means nothing is protected.
   */
  static async load(workspace: Workspace, listFile: string): Promise<ProtectedPaths> {
    if (!(await workspace.exists(listFile))) {
      return new ProtectedPaths([]);
    }
    return new ProtectedPaths(parseProtectedPaths(await workspace.read(listFile)));
  }

  /** First entry covering the path, or null */
  match(filePath: string): ProtectedPathEntry | null {
    return this.matchers.find((matcher) => matcher.isMatch(filePath))?.entry ?? null;
  }

  isProtected(filePath: string): boolean {
    return this.match(filePath) !== null;
  }
}
