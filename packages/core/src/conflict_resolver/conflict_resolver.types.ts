import type { CommitInfo } from '../git/types';
import type { ProtectedPathEntry } from '../protected_paths';

/**
 * What the operator chose for one conflicting path.
 */
export type ConflictAction =
  | { type: 'keep-local' }
  | { type: 'keep-incoming' }
  | { type: 'manual'; force?: boolean }
  | { type: 'view-diff' }
  | { type: 'skip' }
  | { type: 'abort' };

export type ConflictResolution = 'unresolved' | 'ours' | 'theirs' | 'manual';

export type ConflictEntry = {
  path: string;
  resolution: ConflictResolution;
  /** Protected-paths entry the path falls under, if any */
  protectedBy: ProtectedPathEntry | null;
  /** Number of `<<<<<<<` sections in the working file */
  conflictSections: number;
  lastLocalCommit: CommitInfo | null;
  lastUpstreamCommit: CommitInfo | null;
};

export type ResolveOutcome =
  | { type: 'resolved'; entry: ConflictEntry }
  | { type: 'skipped'; entry: ConflictEntry }
  | { type: 'diff'; diff: string }
  | { type: 'aborted'; restoredTo: string | null };

export type CompletionResult = {
  commit: string;
  resolvedPaths: string[];
};
