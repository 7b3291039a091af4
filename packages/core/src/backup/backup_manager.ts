/**
 * BackupManager - immutable snapshots of branch tips
 *
 * Tags are annotated (`backup/<role>-<YYYYMMDD-HHmmss>`,
 * `emergency/<role>-<YYYYMMDD-HHmmss>`), verified right after creation and
 * never deleted by forkflow.
 */

import type { IGitModule } from '../git/git_module';
import { TagAlreadyExistsError } from '../git/errors';
import type { BranchRole, ForkflowConfig } from '../config_manager/config_manager.types';
import { createLogger } from '../logger/logger';
import { BackupError, BackupNotFoundError } from './errors';
import type { BackupKind, BackupTag, ParsedBackupTagName } from './backup.types';

const logger = createLogger('[Backup] ');

export const BRANCH_ROLES: readonly BranchRole[] = ['mirror', 'integration', 'production'];

const TAG_NAME_PATTERN = /^(backup|emergency)\/(mirror|integration|production)-(\d{8}-\d{6})$/;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Session timestamp in UTC, e.g. 20240501-103000
 */
export function formatSessionTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `-${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

export function backupTagName(kind: BackupKind, role: BranchRole, timestamp: string): string {
  return `${kind}/${role}-${timestamp}`;
}

function isBackupKind(value: string | undefined): value is BackupKind {
  return value === 'backup' || value === 'emergency';
}

function isBranchRole(value: string | undefined): value is BranchRole {
  return value === 'mirror' || value === 'integration' || value === 'production';
}

export function parseBackupTagName(name: string): ParsedBackupTagName | null {
  const match = TAG_NAME_PATTERN.exec(name);
  if (!match) return null;
  const [, kind, role, timestamp] = match;
  if (!isBackupKind(kind) || !isBranchRole(role) || timestamp === undefined) return null;
  return { kind, role, timestamp };
}

export type BackupManagerDependencies = {
  git: IGitModule;
  branches: ForkflowConfig['branches'];
};

export class BackupManager {
  private readonly git: IGitModule;
  private readonly branches: ForkflowConfig['branches'];

  constructor(dependencies: BackupManagerDependencies) {
    this.git = dependencies.git;
    this.branches = dependencies.branches;
  }

  /**
   * Tags the current tip of the branch playing `role` and verifies the tag.
   *
   * @throws BackupError when the branch is missing, the tag exists or verification fails
   */
  async createBackup(role: BranchRole, timestamp: string, kind: BackupKind = 'backup'): Promise<BackupTag> {
    const branch = this.branches[role];
    const name = backupTagName(kind, role, timestamp);

    const commit = await this.git.resolveRef(branch);
    if (!commit) {
      throw new BackupError(`Cannot back up ${role} branch ${branch}: branch not found`, name);
    }

    const label = kind === 'backup' ? 'Backup' : 'Emergency snapshot';
    try {
      await this.git.createTag(name, commit, `${label} of ${branch} (${role}) at ${commit}`);
    } catch (error) {
      if (error instanceof TagAlreadyExistsError) {
        throw new BackupError(`Backup tag ${name} already exists`, name);
      }
      throw error;
    }

    const tag = await this.verifyBackup(name, commit);
    logger.info(`✓ Created ${kind} tag: ${name}`);
    return tag;
  }

  /**
   * @throws BackupNotFoundError when the tag does not exist
   * @throws BackupError when it points somewhere else than `expectedCommit`
   */
  async verifyBackup(name: string, expectedCommit?: string): Promise<BackupTag> {
    const info = (await this.git.listTags(name)).find((tag) => tag.name === name);
    if (!info) {
      throw new BackupNotFoundError(name);
    }
    if (expectedCommit && info.commit !== expectedCommit) {
      throw new BackupError(`Backup tag ${name} points at ${info.commit}, expected ${expectedCommit}`, name);
    }

    const parsed = parseBackupTagName(name);
    if (!parsed) {
      throw new BackupError(`${name} is not a forkflow backup tag`, name);
    }
    return {
      name,
      kind: parsed.kind,
      createdAt: info.createdAt,
      sourceRole: parsed.role,
      sourceCommit: info.commit,
      timestamp: parsed.timestamp,
    };
  }

  /**
   * Backup and emergency tags, newest first. Tags outside the naming scheme are ignored.
   */
  async listBackups(kind?: BackupKind): Promise<BackupTag[]> {
    const kinds: BackupKind[] = kind ? [kind] : ['backup', 'emergency'];
    const tags: BackupTag[] = [];

    for (const current of kinds) {
      for (const info of await this.git.listTags(`${current}/*`)) {
        const parsed = parseBackupTagName(info.name);
        if (!parsed) continue;
        tags.push({
          name: info.name,
          kind: parsed.kind,
          createdAt: info.createdAt,
          sourceRole: parsed.role,
          sourceCommit: info.commit,
          timestamp: parsed.timestamp,
        });
      }
    }

    return tags.sort(
      (a, b) =>
        b.timestamp.localeCompare(a.timestamp) ||
        b.createdAt.localeCompare(a.createdAt) ||
        b.name.localeCompare(a.name)
    );
  }

  async getLatestBackup(role: BranchRole, kind: BackupKind = 'backup'): Promise<BackupTag | null> {
    const tags = await this.listBackups(kind);
    return tags.find((tag) => tag.sourceRole === role) ?? null;
  }

  /**
   * Publishes tags to the remote.
   *
   * @returns Names of the tags that could not be pushed
   */
  async pushBackups(remote: string, tags: BackupTag[]): Promise<string[]> {
    const failed: string[] = [];
    for (const tag of tags) {
      try {
        await this.git.pushTag(remote, tag.name);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.warn(`Failed to push ${tag.name} to ${remote}: ${message}`);
        failed.push(tag.name);
      }
    }
    return failed;
  }
}
