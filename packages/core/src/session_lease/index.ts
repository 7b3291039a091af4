export { SessionLeaseManager, withLease } from './session_lease';
export type { SessionLeaseManagerOptions } from './session_lease';
export type { SessionLease, LeaseStore, LeaseStatus } from './session_lease.types';
export { FsLeaseStore, LEASE_FILE } from './fs/fs_lease_store';
export { MemoryLeaseStore } from './memory/memory_lease_store';
