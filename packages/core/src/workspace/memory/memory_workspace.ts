/**
 * MemoryWorkspace - In-memory Workspace for testing
 *
 * Files live in a Map; directories exist when added explicitly or when a
 * file lives below them.
 *
 * @module workspace/memory
 */

import picomatch from 'picomatch';
import type { ListOptions, Workspace } from '../workspace';
import { WorkspaceError } from '../workspace';

export type MemoryWorkspaceOptions = {
  root?: string;
  /** Map of filePath -> content */
  files?: Map<string, string> | Record<string, string>;
  /** Empty directories */
  directories?: string[];
};

function trimSlashes(value: string): string {
  return value.replace(/^\/+|\/+$/g, '');
}

/**
 * @example
 * ```typescript
 * const workspace = new MemoryWorkspace({
 *   files: { 'package.json': '{"scripts":{"test":"jest"}}' },
 *   directories: ['tests'],
 * });
 * ```
 */
export class MemoryWorkspace implements Workspace {
  readonly root: string;
  private readonly files: Map<string, string>;
  private readonly directories: Set<string>;

  constructor(options: MemoryWorkspaceOptions = {}) {
    this.root = options.root ?? '/test/repo';
    if (options.files instanceof Map) {
      this.files = new Map(options.files);
    } else if (options.files) {
      this.files = new Map(Object.entries(options.files));
    } else {
      this.files = new Map();
    }
    this.directories = new Set((options.directories ?? []).map(trimSlashes));
  }

  async list(patterns: string[], options?: ListOptions): Promise<string[]> {
    const isMatch = picomatch(patterns, { dot: true });
    const ignore = options?.ignore?.length ? picomatch(options.ignore, { dot: true }) : null;

    return Array.from(this.files.keys())
      .filter((filePath) => isMatch(filePath) && !(ignore && ignore(filePath)))
      .sort();
  }

  async exists(filePath: string): Promise<boolean> {
    return this.files.has(trimSlashes(filePath)) || (await this.isDirectory(filePath));
  }

  async isDirectory(filePath: string): Promise<boolean> {
    const dir = trimSlashes(filePath);
    if (this.directories.has(dir)) {
      return true;
    }
    const prefix = `${dir}/`;
    return Array.from(this.files.keys()).some((file) => file.startsWith(prefix));
  }

  async read(filePath: string): Promise<string> {
    const content = this.files.get(trimSlashes(filePath));
    if (content === undefined) {
      throw new WorkspaceError(`File not found: ${filePath}`, 'FILE_NOT_FOUND', filePath);
    }
    return content;
  }

  async write(filePath: string, content: string): Promise<void> {
    this.files.set(trimSlashes(filePath), content);
  }

  async append(filePath: string, content: string): Promise<void> {
    const key = trimSlashes(filePath);
    this.files.set(key, (this.files.get(key) ?? '') + content);
  }

  // ============================================
  // Testing utilities
  // ============================================

  addFile(filePath: string, content: string): void {
    this.files.set(trimSlashes(filePath), content);
  }

  addDirectory(dirPath: string): void {
    this.directories.add(trimSlashes(dirPath));
  }

  removeFile(filePath: string): boolean {
    return this.files.delete(trimSlashes(filePath));
  }

  getFile(filePath: string): string | undefined {
    return this.files.get(trimSlashes(filePath));
  }
}
