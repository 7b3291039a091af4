import type { BranchRole } from '../config_manager/config_manager.types';

/**
 * `backup` tags precede pipeline mutations; `emergency` tags precede rollbacks.
 */
export type BackupKind = 'backup' | 'emergency';

/**
 * Immutable snapshot of one branch tip.
 */
export type BackupTag = {
  name: string;
  kind: BackupKind;
  createdAt: string;
  sourceRole: BranchRole;
  sourceCommit: string;
  /** Session timestamp embedded in the name (YYYYMMDD-HHmmss) */
  timestamp: string;
};

export type ParsedBackupTagName = {
  kind: BackupKind;
  role: BranchRole;
  timestamp: string;
};
