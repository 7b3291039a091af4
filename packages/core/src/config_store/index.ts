/**
 * ConfigStore - Configuration persistence abstraction
 */

export type { ConfigStore } from './config_store';
export { FsConfigStore, createConfigManager } from './fs/fs_config_store';
export { MemoryConfigStore } from './memory/memory_config_store';
