/**
 * Sync Pipeline Types
 */

import type { BranchRole } from '../config_manager/config_manager.types';
import type { SyncStage } from '../errors';
import type { DeployReport, NotificationResult } from '../notifier';
import type { SyncMode } from '../promoter';
import type { TestResult } from '../test_gate';

/**
 * - `up-to-date`: nothing new upstream; no tag was created and no ref moved
 * - `cancelled`: the operator declined to start
 * - `completed`: ran to the end, promoted or not
 * - `halted`: stopped at `haltedStage`; `remediation` says how to recover
 */
export type SyncStatus = 'up-to-date' | 'cancelled' | 'completed' | 'halted';

/**
 * One pipeline run. Built at start, filled in stage by stage and rendered
 * as the run summary.
 */
export type SyncSession = {
  /** Suffix of every backup tag created by this run (YYYYMMDD-HHmmss, UTC) */
  timestamp: string;
  /** ISO 8601 */
  startedAt: string;
  /** YYYY-MM-DD */
  date: string;
  mode: SyncMode;
  upstreamCommit: string | null;
  newCommitCount: number;
  backupTags: string[];
  conflictFiles: string[];
  testResult: TestResult | 'not-run';
  promoted: boolean;
  /** Manual mode: promotion rested on the operator's confirmation */
  operatorOverride: boolean;
  status: SyncStatus;
  haltedStage: SyncStage | null;
  warnings: string[];
  remediation: string[];
  deploy: DeployReport | null;
  notification: NotificationResult | null;
  error: string | null;
  /** Branch tips when the run ended (null for a missing branch) */
  branches: Record<BranchRole, string | null>;
};
