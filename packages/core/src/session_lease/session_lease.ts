/**
 * SessionLeaseManager - cross-invocation mutual exclusion
 *
 * Every mutating command acquires the lease first and releases it in a
 * finally block. A live lease held by someone else fails fast; an expired
 * one is taken over with a warning.
 */

import { randomUUID } from 'crypto';
import * as os from 'os';
import { LeaseHeldError } from '../errors';
import { createLogger } from '../logger/logger';
import type { LeaseStatus, LeaseStore, SessionLease } from './session_lease.types';

const logger = createLogger('[SessionLease] ');

export type SessionLeaseManagerOptions = {
  store: LeaseStore;
  ttlSeconds: number;
  now?: () => Date;
  pid?: number;
  hostname?: string;
};

export class SessionLeaseManager {
  private readonly store: LeaseStore;
  private readonly ttlSeconds: number;
  private readonly now: () => Date;
  private readonly pid: number;
  private readonly hostname: string;

  constructor(options: SessionLeaseManagerOptions) {
    this.store = options.store;
    this.ttlSeconds = options.ttlSeconds;
    this.now = options.now ?? (() => new Date());
    this.pid = options.pid ?? process.pid;
    this.hostname = options.hostname ?? os.hostname();
  }

  /**
   * @throws LeaseHeldError when another live lease exists
   */
  async acquire(command: string): Promise<SessionLease> {
    const acquiredAt = this.now();
    const lease: SessionLease = {
      owner: `${this.hostname}:${this.pid}:${randomUUID()}`,
      command,
      pid: this.pid,
      hostname: this.hostname,
      acquiredAt: acquiredAt.toISOString(),
      expiresAt: new Date(acquiredAt.getTime() + this.ttlSeconds * 1000).toISOString(),
    };

    if (await this.store.create(lease)) {
      logger.debug(`Lease acquired for ${command}`);
      return lease;
    }

    const existing = await this.store.read();
    if (existing && !this.isExpired(existing)) {
      throw new LeaseHeldError(existing.owner, existing.command, existing.expiresAt, this.store.location);
    }

    if (existing) {
      logger.warn(
        `Taking over expired lease of ${existing.command} (pid ${existing.pid} on ${existing.hostname}, expired ${existing.expiresAt})`
      );
      // Only the expired record is removed; a taker that replaced it keeps its lease
      const current = await this.store.read();
      if (current?.owner === existing.owner) {
        await this.store.remove();
      }
    }

    if (await this.store.create(lease)) {
      return lease;
    }

    // Someone else won the takeover race
    const winner = await this.store.read();
    throw new LeaseHeldError(
      winner?.owner ?? 'unknown',
      winner?.command ?? 'unknown',
      winner?.expiresAt ?? 'unknown',
      this.store.location
    );
  }

  /**
   * Removes the lease if it still belongs to the given holder.
   */
  async release(lease: SessionLease): Promise<void> {
    const current = await this.store.read();
    if (current && current.owner === lease.owner) {
      await this.store.remove();
      logger.debug(`Lease released for ${lease.command}`);
    } else {
      logger.warn(`Lease for ${lease.command} was taken over before release`);
    }
  }

  /** Read-only view for diagnostics */
  async inspect(): Promise<LeaseStatus | null> {
    const lease = await this.store.read();
    return lease ? { lease, expired: this.isExpired(lease) } : null;
  }

  private isExpired(lease: SessionLease): boolean {
    const expiresAt = Date.parse(lease.expiresAt);
    return Number.isNaN(expiresAt) || expiresAt <= this.now().getTime();
  }
}

/**
 * Runs `fn` while holding the lease.
 */
export async function withLease<T>(
  manager: SessionLeaseManager,
  command: string,
  fn: (lease: SessionLease) => Promise<T>
): Promise<T> {
  const lease = await manager.acquire(command);
  try {
    return await fn(lease);
  } finally {
    await manager.release(lease);
  }
}
