import * as os from 'os';
import * as path from 'path';
import type { ForkflowConfig } from './config_manager.types';

/**
 * Branch and remote layout of a fork: upstream/main is mirrored into
 * pristine-upstream, integrated on staging and released from custom/main.
 */
export function createDefaultConfig(): ForkflowConfig {
  return {
    remotes: {
      upstream: 'upstream',
      upstreamBranch: 'main',
      origin: 'origin',
      expectedUpstreamUrl: null,
    },
    branches: {
      mirror: 'pristine-upstream',
      integration: 'staging',
      production: 'custom/main',
    },
    protectedPathsFile: '.sync-protected',
    changelogFile: 'forkflow/SYNC_HISTORY.md',
    testCommand: null,
    requireTests: false,
    build: {
      installCommand: null,
      installFallbackCommand: null,
      buildCommand: null,
      outputDir: 'dist',
      marker: null,
      markerSources: [],
    },
    service: {
      statusCommand: null,
      restartCommand: null,
      healthCommand: null,
      healthAttempts: 5,
      healthIntervalMs: 2000,
    },
    notification: {
      command: null,
      channel: 'telegram',
      target: null,
      profile: 'default',
      maxNotableCommits: 10,
    },
    lease: {
      ttlSeconds: 3600,
    },
    healthCheck: {
      mirrorBehindFailThreshold: 5,
      backupCleanupThreshold: 30,
    },
    logFile: path.join(os.tmpdir(), 'forkflow-sync.log'),
  };
}
