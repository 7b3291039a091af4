/**
 * Memory Git Module - in-process commit graph for tests
 *
 * @module git/memory
 */

export { MemoryGitModule } from './memory_git_module';
export type { FileChanges, MemoryGitModuleOptions } from './memory_git_module';
