/**
 * Exclusive lease held by one forkflow invocation while it mutates refs.
 */
export type SessionLease = {
  /** Unique token of the holder */
  owner: string;
  /** Command that took the lease (sync, rollback, ...) */
  command: string;
  pid: number;
  hostname: string;
  acquiredAt: string;
  expiresAt: string;
};

/**
 * Persistence for the single lease record.
 */
export interface LeaseStore {
  /** Where the lease lives, for messages */
  readonly location: string;

  /**
   * Writes the lease only if none exists.
   * @returns false when a lease record is already present
   */
  create(lease: SessionLease): Promise<boolean>;

  /** Current lease, or null */
  read(): Promise<SessionLease | null>;

  remove(): Promise<void>;
}

export type LeaseStatus = {
  lease: SessionLease;
  expired: boolean;
};
