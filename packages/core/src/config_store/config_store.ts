/**
 * ConfigStore Interface
 *
 * Abstraction for .forkflow/config.json persistence (filesystem, or memory
 * for tests). The store hands back the parsed document untouched; schema
 * validation and defaults belong to ConfigManager.
 */

import type { ForkflowConfigFile } from '../config_manager/config_manager.types';

/**
 * Implementations:
 * - FsConfigStore: Filesystem-based (.forkflow/config.json)
 * - MemoryConfigStore: In-memory for tests
 */
export interface ConfigStore {
  /** Where the configuration lives, for error messages */
  readonly location: string;

  /**
   * Load the parsed configuration document
   *
   * @returns The parsed JSON, or null when there is no config file
   * @throws ConfigValidationError when the file is not valid JSON
   */
  loadConfig(): Promise<unknown | null>;

  saveConfig(config: ForkflowConfigFile): Promise<void>;
}
