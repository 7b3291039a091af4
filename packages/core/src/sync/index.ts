export { SyncPipeline } from './sync_pipeline';
export type { SyncPipelineDependencies } from './sync_pipeline';
export { formatSessionSummary, sessionExitCode } from './summary';
export type { SyncSession, SyncStatus } from './sync.types';
