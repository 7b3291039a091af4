/**
 * ConfigManager - Project Configuration Manager
 *
 * Resolves the forkflow configuration from three layers: built-in defaults,
 * .forkflow/config.json (through a ConfigStore) and environment variables.
 * The file layer is validated against config_schema.yaml before merging.
 */

import { existsSync } from 'fs';
import * as path from 'path';
import type { ConfigStore } from '../config_store/config_store';
import { SchemaValidationCache } from '../validation';
import { ConfigValidationError } from './errors';
import { createDefaultConfig } from './defaults';
import type {
  CommandSpec,
  ForkflowConfig,
  ForkflowConfigFile,
  IConfigManager,
} from './config_manager.types';

const SCHEMA_FILE = 'config_schema.yaml';

/**
 * The schema ships beside `src/` and `dist/`, so the same relative path
 * works from the sources and from the build.
 */
export function getConfigSchemaPath(): string {
  const schemaPath = path.resolve(__dirname, '../../schemas', SCHEMA_FILE);
  if (!existsSync(schemaPath)) {
    throw new Error(`Configuration schema not found at ${schemaPath}`);
  }
  return schemaPath;
}

/**
 * @throws ConfigValidationError
 */
export function validateConfigFile(data: unknown, configPath: string): ForkflowConfigFile {
  const validate = SchemaValidationCache.getValidator(getConfigSchemaPath());
  if (isConfigFile(data, validate)) {
    return data;
  }
  const errors = (validate.errors ?? []).map((error) => ({
    field: error.instancePath || 'root',
    message: error.message || 'Validation failed',
  }));
  throw new ConfigValidationError(configPath, errors);
}

function isConfigFile(data: unknown, validate: (data: unknown) => boolean): data is ForkflowConfigFile {
  return validate(data);
}

function toCommand(input: { command: string; args?: string[] } | null | undefined, fallback: CommandSpec | null): CommandSpec | null {
  if (input === undefined) return fallback;
  if (input === null) return null;
  return { command: input.command, args: input.args ?? [] };
}

/**
 * Merges a validated file layer over a base configuration.
 */
export function mergeConfig(base: ForkflowConfig, file: ForkflowConfigFile): ForkflowConfig {
  return {
    remotes: { ...base.remotes, ...file.remotes },
    branches: { ...base.branches, ...file.branches },
    protectedPathsFile: file.protectedPathsFile ?? base.protectedPathsFile,
    changelogFile: file.changelogFile ?? base.changelogFile,
    testCommand: toCommand(file.testCommand, base.testCommand),
    requireTests: file.requireTests ?? base.requireTests,
    build: {
      installCommand: toCommand(file.build?.installCommand, base.build.installCommand),
      installFallbackCommand: toCommand(file.build?.installFallbackCommand, base.build.installFallbackCommand),
      buildCommand: toCommand(file.build?.buildCommand, base.build.buildCommand),
      outputDir: file.build?.outputDir ?? base.build.outputDir,
      marker: file.build?.marker !== undefined ? file.build.marker : base.build.marker,
      markerSources: file.build?.markerSources ?? base.build.markerSources,
    },
    service: {
      statusCommand: toCommand(file.service?.statusCommand, base.service.statusCommand),
      restartCommand: toCommand(file.service?.restartCommand, base.service.restartCommand),
      healthCommand: toCommand(file.service?.healthCommand, base.service.healthCommand),
      healthAttempts: file.service?.healthAttempts ?? base.service.healthAttempts,
      healthIntervalMs: file.service?.healthIntervalMs ?? base.service.healthIntervalMs,
    },
    notification: {
      command: toCommand(file.notification?.command, base.notification.command),
      channel: file.notification?.channel ?? base.notification.channel,
      target: file.notification?.target !== undefined ? file.notification.target : base.notification.target,
      profile: file.notification?.profile ?? base.notification.profile,
      maxNotableCommits: file.notification?.maxNotableCommits ?? base.notification.maxNotableCommits,
    },
    lease: { ...base.lease, ...file.lease },
    healthCheck: { ...base.healthCheck, ...file.healthCheck },
    logFile: file.logFile ?? base.logFile,
  };
}

/**
 * Environment variables win over the file.
 *
 * - FORKFLOW_LOG_FILE
 * - FORKFLOW_PROFILE
 * - FORKFLOW_NOTIFY_TARGET
 * - FORKFLOW_NOTIFY_CHANNEL
 */
export function applyEnvironment(config: ForkflowConfig, env: NodeJS.ProcessEnv): ForkflowConfig {
  return {
    ...config,
    logFile: env['FORKFLOW_LOG_FILE'] || config.logFile,
    notification: {
      ...config.notification,
      profile: env['FORKFLOW_PROFILE'] || config.notification.profile,
      target: env['FORKFLOW_NOTIFY_TARGET'] || config.notification.target,
      channel: env['FORKFLOW_NOTIFY_CHANNEL'] || config.notification.channel,
    },
  };
}

/**
 * Configuration Manager Class
 *
 * @example
 * ```typescript
 * // Production usage
 * const configManager = new ConfigManager(new FsConfigStore('/path/to/fork'));
 *
 * // Test usage
 * const configStore = new MemoryConfigStore();
 * configStore.setConfig({ requireTests: true });
 * const configManager = new ConfigManager(configStore, {});
 * ```
 */
export class ConfigManager implements IConfigManager {
  private readonly configStore: ConfigStore;
  private readonly env: NodeJS.ProcessEnv;
  private cached: ForkflowConfig | null = null;

  constructor(configStore: ConfigStore, env: NodeJS.ProcessEnv = process.env) {
    this.configStore = configStore;
    this.env = env;
  }

  async loadConfig(): Promise<ForkflowConfig> {
    if (this.cached) {
      return this.cached;
    }

    const raw = await this.configStore.loadConfig();
    const file = raw === null ? {} : validateConfigFile(raw, this.configStore.location);
    this.cached = applyEnvironment(mergeConfig(createDefaultConfig(), file), this.env);
    return this.cached;
  }

  async saveConfig(config: ForkflowConfigFile): Promise<void> {
    validateConfigFile(config, this.configStore.location);
    await this.configStore.saveConfig(config);
    this.cached = null;
  }
}
