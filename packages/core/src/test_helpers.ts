/**
 * Shared fixture for pipeline tests: an in-memory fork with upstream and
 * origin remotes and the three pipeline branches.
 */

import { MemoryGitModule } from './git/memory';
import { createDefaultConfig } from './config_manager/defaults';
import type { ForkflowConfig } from './config_manager/config_manager.types';

export type ForkRepository = {
  git: MemoryGitModule;
  config: ForkflowConfig;
  /** Commit shared by every branch */
  root: string;
  /** Local modification on staging and custom/main */
  localCommit: string;
  /** Adds commits to upstream/main (visible after fetch) and returns their hashes */
  addUpstreamCommits(messages: string[], files?: (index: number) => Record<string, string | null>): string[];
};

export const FIXTURE_START = Date.UTC(2024, 4, 1, 10, 0, 0);

/**
 * Clock advancing one second per call.
 */
export function tickingClock(start: number = FIXTURE_START): () => Date {
  let tick = 0;
  return () => new Date(start + 1000 * tick++);
}

export async function createForkRepository(): Promise<ForkRepository> {
  const git = new MemoryGitModule({ now: tickingClock() });
  const config = createDefaultConfig();
  const { mirror, integration, production } = config.branches;

  const root = git.seedCommit({ 'README.md': '# app\n', 'src/app.ts': 'export const version = 1;\n' }, 'initial');
  const localCommit = git.seedCommit({ 'src/custom.ts': 'export const apiId = "fork";\n' }, 'feat: local apiId', [root]);

  git.setBranch(mirror, root);
  git.setBranch(integration, localCommit);
  git.setBranch(production, localCommit);
  git.setHead(production);

  git.addRemote('upstream', 'https://example.com/upstream.git');
  git.setRemoteBranch('upstream', 'main', root);
  git.addRemote('origin', 'https://example.com/fork.git');
  git.setRemoteBranch('origin', mirror, root);
  git.setRemoteBranch('origin', integration, localCommit);
  git.setRemoteBranch('origin', production, localCommit);
  await git.fetch('upstream');
  await git.fetch('origin');

  return {
    git,
    config,
    root,
    localCommit,
    addUpstreamCommits(messages, files) {
      return messages.map((message, index) =>
        git.commitOnRemote('upstream', 'main', files ? files(index) : { [`upstream-${index}.txt`]: `${message}\n` }, message)
      );
    },
  };
}
