export {
  SyncError,
  EnvironmentError,
  DirtyStateError,
  FetchError,
  TestFailureError,
  BuildVerificationError,
  LeaseHeldError,
  ConflictMarkersPresentError,
  UnresolvedConflictsError,
} from './sync_errors';
export type { SyncStage } from './sync_errors';
