/**
 * FsWorkspace - Filesystem-based Workspace implementation
 *
 * Uses fast-glob for pattern matching and fs/promises for file operations.
 *
 * @module workspace/fs
 */

import fg from 'fast-glob';
import * as fs from 'fs/promises';
import * as path from 'path';
import type { ListOptions, Workspace } from '../workspace';
import { WorkspaceError } from '../workspace';

export type FsWorkspaceOptions = {
  /** Base directory for all operations */
  cwd: string;
};

export class FsWorkspace implements Workspace {
  readonly root: string;

  constructor(options: FsWorkspaceOptions) {
    this.root = path.resolve(options.cwd);
  }

  async list(patterns: string[], options?: ListOptions): Promise<string[]> {
    for (const pattern of patterns) {
      this.validatePath(pattern);
    }

    const files = await fg(patterns, {
      cwd: this.root,
      ignore: options?.ignore ?? [],
      onlyFiles: true,
      dot: true,
    });
    return files.sort();
  }

  async exists(filePath: string): Promise<boolean> {
    this.validatePath(filePath);

    try {
      await fs.access(path.join(this.root, filePath));
      return true;
    } catch {
      return false;
    }
  }

  async isDirectory(filePath: string): Promise<boolean> {
    this.validatePath(filePath);

    try {
      const stats = await fs.stat(path.join(this.root, filePath));
      return stats.isDirectory();
    } catch {
      return false;
    }
  }

  async read(filePath: string): Promise<string> {
    this.validatePath(filePath);

    try {
      return await fs.readFile(path.join(this.root, filePath), 'utf-8');
    } catch (err: unknown) {
      const error = err as NodeJS.ErrnoException;
      if (error.code === 'ENOENT') {
        throw new WorkspaceError(`File not found: ${filePath}`, 'FILE_NOT_FOUND', filePath);
      }
      throw new WorkspaceError(`Read error: ${error.message}`, 'READ_ERROR', filePath);
    }
  }

  async write(filePath: string, content: string): Promise<void> {
    this.validatePath(filePath);
    const fullPath = path.join(this.root, filePath);

    try {
      await fs.mkdir(path.dirname(fullPath), { recursive: true });
      await fs.writeFile(fullPath, content, 'utf-8');
    } catch (err: unknown) {
      const error = err as NodeJS.ErrnoException;
      throw new WorkspaceError(`Write error: ${error.message}`, 'WRITE_ERROR', filePath);
    }
  }

  async append(filePath: string, content: string): Promise<void> {
    this.validatePath(filePath);
    const fullPath = path.join(this.root, filePath);

    try {
      await fs.mkdir(path.dirname(fullPath), { recursive: true });
      await fs.appendFile(fullPath, content, 'utf-8');
    } catch (err: unknown) {
      const error = err as NodeJS.ErrnoException;
      throw new WorkspaceError(`Write error: ${error.message}`, 'WRITE_ERROR', filePath);
    }
  }

  /**
   * Rejects traversal and absolute paths so nothing escapes the root.
   */
  private validatePath(filePath: string): void {
    if (filePath.split(/[\\/]/).includes('..')) {
      throw new WorkspaceError(`Invalid path: path traversal not allowed: ${filePath}`, 'INVALID_PATH', filePath);
    }
    if (path.isAbsolute(filePath)) {
      throw new WorkspaceError(`Invalid path: absolute paths not allowed: ${filePath}`, 'INVALID_PATH', filePath);
    }
  }
}
