/**
 * FsConfigStore - Filesystem implementation of ConfigStore
 *
 * Handles persistence of .forkflow/config.json to the local filesystem.
 * Also provides the static project root lookup used by the CLI.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { existsSync } from 'fs';
import type { ConfigStore } from '../config_store';
import type { ForkflowConfigFile } from '../../config_manager/config_manager.types';
import { ConfigManager } from '../../config_manager/config_manager';
import { ConfigValidationError } from '../../config_manager/errors';

export const CONFIG_DIR = '.forkflow';
export const CONFIG_FILE = 'config.json';

/**
 * Filesystem-based ConfigStore implementation.
 *
 * A missing file is not an error: the defaults apply.
 *
 * @example
 * ```typescript
 * const store = new FsConfigStore('/path/to/fork');
 * const raw = await store.loadConfig();
 * ```
 */
export class FsConfigStore implements ConfigStore {
  readonly location: string;

  constructor(projectRootPath: string) {
    this.location = path.join(projectRootPath, CONFIG_DIR, CONFIG_FILE);
  }

  async loadConfig(): Promise<unknown | null> {
    let content: string;
    try {
      content = await fs.readFile(this.location, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return null;
      }
      throw error;
    }

    try {
      const parsed: unknown = JSON.parse(content);
      return parsed;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigValidationError(this.location, [{ field: 'root', message: `Invalid JSON: ${message}` }]);
    }
  }

  async saveConfig(config: ForkflowConfigFile): Promise<void> {
    await fs.mkdir(path.dirname(this.location), { recursive: true });
    await fs.writeFile(this.location, `${JSON.stringify(config, null, 2)}\n`, 'utf-8');
  }

  // ==================== Static Utility Methods ====================

  /**
   * Finds the project root by searching upwards for a .git entry.
   *
   * @param startPath - Starting path (default: process.cwd())
   * @returns Absolute path to project root, or null if not found
   */
  static findProjectRoot(startPath: string = process.cwd()): string | null {
    let currentPath = path.resolve(startPath);

    while (currentPath !== path.parse(currentPath).root) {
      if (existsSync(path.join(currentPath, '.git'))) {
        return currentPath;
      }
      currentPath = path.dirname(currentPath);
    }

    if (existsSync(path.join(currentPath, '.git'))) {
      return currentPath;
    }

    return null;
  }
}

/**
 * Create a ConfigManager instance for the current project.
 *
 * @param projectRoot - Optional project root path (auto-detected if not provided)
 */
export function createConfigManager(projectRoot?: string, env: NodeJS.ProcessEnv = process.env): ConfigManager {
  const resolvedRoot = projectRoot || FsConfigStore.findProjectRoot() || process.cwd();
  return new ConfigManager(new FsConfigStore(resolvedRoot), env);
}
