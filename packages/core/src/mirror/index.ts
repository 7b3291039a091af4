export { MirrorUpdater } from './mirror_updater';
export type { MirrorUpdateResult, MirrorUpdateStatus, MirrorUpdaterDependencies } from './mirror_updater';
