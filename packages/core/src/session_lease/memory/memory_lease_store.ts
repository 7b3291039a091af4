import type { LeaseStore, SessionLease } from '../session_lease.types';

/**
 * In-memory LeaseStore for tests.
 */
export class MemoryLeaseStore implements LeaseStore {
  readonly location = 'memory://forkflow.lease.json';
  private lease: SessionLease | null = null;

  async create(lease: SessionLease): Promise<boolean> {
    if (this.lease) {
      return false;
    }
    this.lease = { ...lease };
    return true;
  }

  async read(): Promise<SessionLease | null> {
    return this.lease ? { ...this.lease } : null;
  }

  async remove(): Promise<void> {
    this.lease = null;
  }

  // ==================== Test Helper Methods ====================

  setLease(lease: SessionLease | null): void {
    this.lease = lease;
  }

  getLease(): SessionLease | null {
    return this.lease;
  }
}
