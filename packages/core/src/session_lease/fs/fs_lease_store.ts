/**
 * FsLeaseStore - lease record as a file inside the .git directory
 *
 * Exclusive creation (`wx`) makes acquisition atomic on a local filesystem.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import type { LeaseStore, SessionLease } from '../session_lease.types';

export const LEASE_FILE = 'forkflow.lease.json';

function isSessionLease(value: unknown): value is SessionLease {
  if (typeof value !== 'object' || value === null) return false;
  const record: Record<string, unknown> = { ...value };
  return (
    typeof record['owner'] === 'string' &&
    typeof record['command'] === 'string' &&
    typeof record['pid'] === 'number' &&
    typeof record['hostname'] === 'string' &&
    typeof record['acquiredAt'] === 'string' &&
    typeof record['expiresAt'] === 'string'
  );
}

export class FsLeaseStore implements LeaseStore {
  readonly location: string;

  constructor(gitDir: string) {
    this.location = path.join(gitDir, LEASE_FILE);
  }

  async create(lease: SessionLease): Promise<boolean> {
    try {
      const handle = await fs.open(this.location, 'wx');
      try {
        await handle.writeFile(`${JSON.stringify(lease, null, 2)}\n`, 'utf-8');
      } finally {
        await handle.close();
      }
      return true;
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'EEXIST') {
        return false;
      }
      throw error;
    }
  }

  /**
   * An unreadable or malformed record is reported as an already-expired lease
   * so it can be taken over.
   */
  async read(): Promise<SessionLease | null> {
    let content: string;
    try {
      content = await fs.readFile(this.location, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return null;
      }
      throw error;
    }

    try {
      const parsed: unknown = JSON.parse(content);
      if (isSessionLease(parsed)) {
        return parsed;
      }
    } catch {
      // fall through to the corrupt-record lease below
    }
    return {
      owner: 'unknown',
      command: 'unknown',
      pid: 0,
      hostname: 'unknown',
      acquiredAt: new Date(0).toISOString(),
      expiresAt: new Date(0).toISOString(),
    };
  }

  async remove(): Promise<void> {
    await fs.rm(this.location, { force: true });
  }
}
