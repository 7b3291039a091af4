/**
 * Run summary rendering for a SyncSession
 */

import { BRANCH_ROLES } from '../backup';
import type { ForkflowConfig } from '../config_manager/config_manager.types';
import type { SyncSession } from './sync.types';

function shortHash(hash: string | null): string {
  return hash ? hash.slice(0, 7) : '(missing)';
}

function describeTests(session: SyncSession): string {
  switch (session.testResult) {
    case 'passed':
      return 'passed';
    case 'failed':
      return 'FAILED';
    case 'skipped':
      return 'skipped (no test suite ran; changes are NOT verified)';
    case 'not-run':
      return 'not run';
  }
}

function describeProduction(session: SyncSession): string {
  if (!session.promoted) {
    return 'NOT updated (manual promotion needed)';
  }
  return session.operatorOverride ? 'updated (confirmed by operator)' : 'updated';
}

/**
 * Exit status of a finished run: only a halt is a failure.
 */
export function sessionExitCode(session: SyncSession): number {
  return session.status === 'halted' ? 1 : 0;
}

export function formatSessionSummary(session: SyncSession, branches: ForkflowConfig['branches']): string {
  if (session.status === 'up-to-date') {
    return '✓ Already up to date with upstream. Nothing to do.';
  }
  if (session.status === 'cancelled') {
    return 'Sync cancelled by user';
  }

  const lines: string[] =
    session.status === 'halted'
      ? [`=== Sync halted at stage: ${session.haltedStage ?? 'unknown'} ===`, ...(session.error ? [`✗ ${session.error}`] : [])]
      : ['=== Sync Complete ==='];

  lines.push(
    '',
    'Summary:',
    `  - Mode: ${session.mode}`,
    `  - Upstream commits merged: ${session.newCommitCount}`,
    `  - Tests: ${describeTests(session)}`,
    `  - ${branches.production}: ${describeProduction(session)}`
  );
  if (session.conflictFiles.length > 0) {
    lines.push(`  - Conflicting files: ${session.conflictFiles.join(', ')}`);
  }
  if (session.deploy) {
    lines.push(`  - Build: ${session.deploy.build}`, `  - Service: ${session.deploy.service}`);
  }
  if (session.notification) {
    lines.push(`  - Notification: ${session.notification.status}`);
  }

  lines.push('', 'Branches:');
  for (const role of BRANCH_ROLES) {
    lines.push(`  - ${branches[role]}: ${shortHash(session.branches[role])}`);
  }

  lines.push('', 'Backup tags created:');
  lines.push(...(session.backupTags.length > 0 ? session.backupTags.map((tag) => `  - ${tag}`) : ['  (none)']));

  if (session.warnings.length > 0) {
    lines.push('', 'Warnings:', ...session.warnings.map((warning) => `  ⚠ ${warning}`));
  }
  if (session.remediation.length > 0) {
    lines.push('', 'To recover:', ...session.remediation.map((command) => `  $ ${command}`));
  }
  return lines.join('\n');
}
