/**
 * MemoryConfigStore - In-memory implementation of ConfigStore
 */

import type { ConfigStore } from '../config_store';
import type { ForkflowConfigFile } from '../../config_manager/config_manager.types';

/**
 * In-memory ConfigStore implementation for tests.
 *
 * @example
 * ```typescript
 * const configStore = new MemoryConfigStore();
 * configStore.setConfig({ branches: { production: 'release' } });
 * const manager = new ConfigManager(configStore, {});
 * ```
 */
export class MemoryConfigStore implements ConfigStore {
  readonly location = 'memory://.forkflow/config.json';
  private config: unknown | null = null;

  async loadConfig(): Promise<unknown | null> {
    return this.config;
  }

  async saveConfig(config: ForkflowConfigFile): Promise<void> {
    this.config = config;
  }

  // ==================== Test Helper Methods ====================

  /**
   * Set the raw document directly; accepts invalid shapes so validation can be tested
   */
  setConfig(config: unknown | null): void {
    this.config = config;
  }

  getConfig(): unknown | null {
    return this.config;
  }

  clear(): void {
    this.config = null;
  }
}
