/**
 * ConfigManager Types
 */

/**
 * An external program and its arguments. Arguments may carry placeholders
 * that the caller substitutes (e.g. `{message}` for notifications).
 */
export type CommandSpec = {
  command: string;
  args: string[];
};

export type BranchRole = 'mirror' | 'integration' | 'production';

/**
 * Resolved forkflow configuration: defaults, then .forkflow/config.json,
 * then environment variables.
 */
export type ForkflowConfig = {
  remotes: {
    upstream: string;
    upstreamBranch: string;
    origin: string;
    /** Health check warns when the upstream remote points elsewhere */
    expectedUpstreamUrl: string | null;
  };
  branches: Record<BranchRole, string>;
  protectedPathsFile: string;
  /** Sync history, relative to the git directory so it never dirties the working tree */
  changelogFile: string;
  /** Overrides test discovery */
  testCommand: CommandSpec | null;
  /** Treat a skipped test gate as blocking */
  requireTests: boolean;
  build: {
    installCommand: CommandSpec | null;
    installFallbackCommand: CommandSpec | null;
    buildCommand: CommandSpec | null;
    outputDir: string;
    /** Text that must appear in the build output when local changes survived */
    marker: string | null;
    /** Files named in the report when the marker is missing */
    markerSources: string[];
  };
  service: {
    /** Exit 0 means the service is installed and running */
    statusCommand: CommandSpec | null;
    restartCommand: CommandSpec | null;
    healthCommand: CommandSpec | null;
    healthAttempts: number;
    healthIntervalMs: number;
  };
  notification: {
    command: CommandSpec | null;
    channel: string;
    target: string | null;
    profile: string;
    maxNotableCommits: number;
  };
  lease: {
    ttlSeconds: number;
  };
  healthCheck: {
    mirrorBehindFailThreshold: number;
    backupCleanupThreshold: number;
  };
  logFile: string;
};

type CommandSpecInput = {
  command: string;
  args?: string[];
};

type Section<T> = {
  [K in keyof T]?: T[K] extends CommandSpec | null ? CommandSpecInput | null : T[K];
};

/**
 * Shape of .forkflow/config.json; every property is optional.
 */
export type ForkflowConfigFile = {
  $schema?: string;
  remotes?: Section<ForkflowConfig['remotes']>;
  branches?: Partial<ForkflowConfig['branches']>;
  protectedPathsFile?: string;
  changelogFile?: string;
  testCommand?: CommandSpecInput | null;
  requireTests?: boolean;
  build?: Section<ForkflowConfig['build']>;
  service?: Section<ForkflowConfig['service']>;
  notification?: Section<ForkflowConfig['notification']>;
  lease?: Section<ForkflowConfig['lease']>;
  healthCheck?: Section<ForkflowConfig['healthCheck']>;
  logFile?: string;
};

/**
 * IConfigManager interface
 */
export interface IConfigManager {
  /**
   * Load and validate configuration
   * @throws ConfigValidationError
   */
  loadConfig(): Promise<ForkflowConfig>;

  /**
   * Persist a configuration file
   * @throws ConfigValidationError
   */
  saveConfig(config: ForkflowConfigFile): Promise<void>;
}
