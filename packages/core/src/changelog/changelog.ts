/**
 * Changelog - append-only markdown history of sync runs
 */

import type { Workspace } from '../workspace';
import { createLogger } from '../logger/logger';

const logger = createLogger('[Changelog] ');

export type ChangelogEntry = {
  /** ISO 8601 */
  date: string;
  upstreamCommit: string;
  newCommitCount: number;
  backupTags: string[];
  conflictsResolved: string[];
};

const HEADER = '# Sync History\n\nAppended by forkflow after every integration of upstream changes.\n';

export function formatChangelogEntry(entry: ChangelogEntry): string {
  const lines = [
    '',
    `## ${entry.date.slice(0, 10)} ${entry.date.slice(11, 19)} UTC`,
    '',
    `- Upstream commit: \`${entry.upstreamCommit}\``,
    `- New upstream commits: ${entry.newCommitCount}`,
    `- Backup tags: ${entry.backupTags.length > 0 ? entry.backupTags.join(', ') : 'none'}`,
    `- Conflicts resolved: ${entry.conflictsResolved.length > 0 ? entry.conflictsResolved.join(', ') : 'none'}`,
  ];
  return `${lines.join('\n')}\n`;
}

export class Changelog {
  constructor(
    private readonly workspace: Workspace,
    readonly filePath: string
  ) {}

  async append(entry: ChangelogEntry): Promise<void> {
    if (!(await this.workspace.exists(this.filePath))) {
      await this.workspace.write(this.filePath, HEADER);
    }
    await this.workspace.append(this.filePath, formatChangelogEntry(entry));
    logger.info(`✓ Recorded sync in ${this.filePath}`);
  }

  async exists(): Promise<boolean> {
    return this.workspace.exists(this.filePath);
  }
}
