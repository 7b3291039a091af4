/**
 * Menu-driven resolution of every conflicting path, one at a time.
 */

import type { Prompter } from '../prompter';
import { confirm } from '../prompter';
import type { CommitInfo } from '../git/types';
import { ConflictMarkersPresentError } from '../errors';
import type { ConflictResolver } from './conflict_resolver';
import type { CompletionResult, ConflictAction, ConflictEntry } from './conflict_resolver.types';

const DIFF_PREVIEW_LINES = 50;

const MENU = [
  'Options:',
  '  1. Keep OUR changes (local)',
  '  2. Accept THEIR changes (upstream)',
  '  3. Manual edit (opens editor)',
  '  4. Show diff',
  '  5. Skip for now',
  '  6. Abort merge',
].join('\n');

export type InteractiveResolutionResult =
  | { status: 'nothing-to-resolve' }
  | { status: 'completed'; completion: CompletionResult }
  | { status: 'unresolved'; unresolved: string[] }
  | { status: 'pending-commit' }
  | { status: 'aborted'; restoredTo: string | null };

export function parseConflictChoice(choice: string): ConflictAction | null {
  switch (choice.trim()) {
    case '1':
      return { type: 'keep-local' };
    case '2':
      return { type: 'keep-incoming' };
    case '3':
      return { type: 'manual' };
    case '4':
      return { type: 'view-diff' };
    case '5':
      return { type: 'skip' };
    case '6':
      return { type: 'abort' };
    default:
      return null;
  }
}

function describeCommit(commit: CommitInfo | null, missing: string): string {
  return commit ? `  ${commit.hash.slice(0, 7)} - ${commit.message} (${commit.author}, ${commit.date})` : `  ${missing}`;
}

export function describeConflictEntry(entry: ConflictEntry): string {
  const lines = [
    `File: ${entry.path}`,
    `Conflict sections: ${entry.conflictSections}`,
    'Last modified locally:',
    describeCommit(entry.lastLocalCommit, '(not in current branch)'),
    'Last modified upstream:',
    describeCommit(entry.lastUpstreamCommit, '(not in upstream)'),
  ];
  if (entry.protectedBy) {
    lines.push(`⚠️  WARNING: protected path (matches ${entry.protectedBy.pattern})`);
  }
  return lines.join('\n');
}

export async function resolveInteractively(
  resolver: ConflictResolver,
  prompter: Prompter
): Promise<InteractiveResolutionResult> {
  const entries = await resolver.load();
  if (entries.length === 0) {
    if (await resolver.hasPendingMerge()) {
      return finish(resolver, prompter);
    }
    prompter.show('No merge conflicts detected!');
    return { status: 'nothing-to-resolve' };
  }

  prompter.show(['Conflicting files:', ...entries.map((entry, i) => `  ${i + 1}. ${entry.path}`)].join('\n'));

  for (const entry of entries) {
    for (;;) {
      prompter.show(`${describeConflictEntry(entry)}\n\n${MENU}`);
      const action = parseConflictChoice(await prompter.ask('Choose action (1-6): '));

      if (action === null) {
        prompter.show('Invalid choice, skipping...');
        break;
      }
      if (action.type === 'view-diff') {
        const outcome = await resolver.resolve(entry.path, action);
        if (outcome.type === 'diff') {
          prompter.show(outcome.diff.split('\n').slice(0, DIFF_PREVIEW_LINES).join('\n'));
        }
        continue;
      }
      if (action.type === 'abort') {
        return { status: 'aborted', restoredTo: await resolver.abort() };
      }
      if (action.type === 'manual') {
        await prompter.edit(entry.path);
        try {
          await resolver.resolve(entry.path, action);
        } catch (error) {
          if (!(error instanceof ConflictMarkersPresentError)) {
            throw error;
          }
          prompter.show(`⚠️  ${error.message}`);
          if (await confirm(prompter, 'Mark as resolved anyway?')) {
            await resolver.resolve(entry.path, { type: 'manual', force: true });
          }
        }
        break;
      }
      await resolver.resolve(entry.path, action);
      break;
    }
  }

  const unresolved = resolver.unresolved();
  if (unresolved.length > 0) {
    prompter.show(['Some conflicts remain unresolved:', ...unresolved.map((p) => `  ${p}`)].join('\n'));
    return { status: 'unresolved', unresolved };
  }

  return finish(resolver, prompter);
}

async function finish(resolver: ConflictResolver, prompter: Prompter): Promise<InteractiveResolutionResult> {
  prompter.show('✓ All conflicts resolved!');
  const answer = await prompter.ask('Complete the merge commit? (Y/n): ');
  if (/^[Nn]$/.test(answer)) {
    prompter.show('Merge commit ready. Complete it later with: forkflow resolve-conflicts');
    return { status: 'pending-commit' };
  }
  return { status: 'completed', completion: await resolver.complete() };
}
