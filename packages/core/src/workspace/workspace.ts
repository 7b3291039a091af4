/**
 * Workspace Interface
 *
 * Abstracts the files of the checked-out repository (package.json, Makefile,
 * the protected-paths list, the changelog, build output) so the pipeline can
 * run against the real filesystem or an in-memory tree in tests.
 *
 * @module workspace
 */

/**
 * Error codes for Workspace operations.
 */
export type WorkspaceErrorCode =
  | 'FILE_NOT_FOUND'
  | 'READ_ERROR'
  | 'WRITE_ERROR'
  | 'INVALID_PATH';

/**
 * Error thrown when file operations fail.
 */
export class WorkspaceError extends Error {
  constructor(
    message: string,
    public readonly code: WorkspaceErrorCode,
    public readonly filePath?: string
  ) {
    super(message);
    this.name = 'WorkspaceError';
    Object.setPrototypeOf(this, WorkspaceError.prototype);
  }
}

/**
 * Options for file listing.
 */
export type ListOptions = {
  /** Glob patterns to ignore (e.g., ['node_modules/**']) */
  ignore?: string[];
};

/**
 * Files of the repository checkout, addressed by paths relative to its root.
 *
 * @example
 * ```typescript
 * // Filesystem backend
 * const workspace = new FsWorkspace({ cwd: '/path/to/fork' });
 *
 * // Memory backend (testing)
 * const workspace = new MemoryWorkspace({ files: { 'package.json': '{}' } });
 *
 * const built = await workspace.list(['dist/**']);
 * ```
 */
export interface Workspace {
  /** Absolute root of the workspace */
  readonly root: string;

  /** Files matching glob patterns, relative to the root, sorted */
  list(patterns: string[], options?: ListOptions): Promise<string[]>;

  /** True for an existing file or directory */
  exists(filePath: string): Promise<boolean>;

  isDirectory(filePath: string): Promise<boolean>;

  /**
   * @throws WorkspaceError FILE_NOT_FOUND
   */
  read(filePath: string): Promise<string>;

  /** Writes a file, creating parent directories */
  write(filePath: string, content: string): Promise<void>;

  /** Appends to a file, creating it and its parent directories */
  append(filePath: string, content: string): Promise<void>;
}
