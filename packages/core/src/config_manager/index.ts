/**
 * Configuration - defaults, .forkflow/config.json and environment
 */

export {
  ConfigManager,
  mergeConfig,
  applyEnvironment,
  validateConfigFile,
  getConfigSchemaPath,
} from './config_manager';
export { createDefaultConfig } from './defaults';
export { ConfigValidationError } from './errors';
export type {
  BranchRole,
  CommandSpec,
  ForkflowConfig,
  ForkflowConfigFile,
  IConfigManager,
} from './config_manager.types';
