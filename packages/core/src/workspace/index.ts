/**
 * Workspace - files of the repository checkout
 *
 * @module workspace
 */

export type { Workspace, ListOptions, WorkspaceErrorCode } from './workspace';
export { WorkspaceError } from './workspace';
export { FsWorkspace } from './fs/fs_workspace';
export type { FsWorkspaceOptions } from './fs/fs_workspace';
export { MemoryWorkspace } from './memory/memory_workspace';
export type { MemoryWorkspaceOptions } from './memory/memory_workspace';
