/**
 * Session arbiter: at most one live execution per session.
 *
 * Ownership is a lease in a shared {@link LeaseStore}; acquisition is a
 * compare-and-set there, so arbiters in different processes coordinate
 * through the store alone.
 */

import { randomUUID } from 'node:crypto';
import { setTimeout as sleep } from 'node:timers/promises';

import type { SessionLease } from './types/checkpoint.types';
import { Clock, DEFAULT_LEASE_TTL_MS, systemClock } from './constants';
import { LeaseLostError, SessionBusyError } from './errors';
import { LeaseStore } from './persistence/lease-store';
import { Logger, silentLogger } from './logger';

export type AcquireOptions = {
  ttlMs?: number;
  /** Keep polling for up to this long instead of failing at once */
  waitMs?: number;
  pollMs?: number;
};

export class SessionArbiter {
  private readonly store: LeaseStore;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly defaultTtlMs: number;

  constructor(
    store: LeaseStore,
    options: { clock?: Clock; logger?: Logger; defaultTtlMs?: number } = {}
  ) {
    this.store = store;
    this.clock = options.clock ?? systemClock;
    this.logger = (options.logger ?? silentLogger()).child({ component: 'session-arbiter' });
    this.defaultTtlMs = options.defaultTtlMs ?? DEFAULT_LEASE_TTL_MS;
  }

  /**
   * Single compare-and-set attempt
   * @returns The lease, or null when a live lease is held elsewhere
   */
  async tryAcquire(
    sessionId: string,
    executorId: string,
    ttlMs: number = this.defaultTtlMs
  ): Promise<SessionLease | null> {
    const outcome = await this.attempt(sessionId, executorId, ttlMs);
    return outcome.acquired ? outcome.lease : null;
  }

  /**
   * Acquire the session or throw {@link SessionBusyError}. With `waitMs` the
   * caller queues: the attempt repeats every `pollMs` until the wait is over.
   */
  async acquire(
    sessionId: string,
    executorId: string,
    options: AcquireOptions = {}
  ): Promise<SessionLease> {
    const ttlMs = options.ttlMs ?? this.defaultTtlMs;
    const pollMs = Math.max(options.pollMs ?? 50, 1);
    const attempts = 1 + Math.ceil(Math.max(options.waitMs ?? 0, 0) / pollMs);

    let holder: SessionLease | null = null;
    for (let attempt = 1; attempt <= attempts; attempt++) {
      const outcome = await this.attempt(sessionId, executorId, ttlMs);
      if (outcome.acquired) {
        this.logger.debug(
          { sessionId, executorId, expiresAt: outcome.lease.expiresAt.toISOString() },
          'lease acquired'
        );
        return outcome.lease;
      }
      holder = outcome.holder;
      if (attempt < attempts) await sleep(pollMs);
    }

    this.logger.warn({ sessionId, executorId, holder: holder?.executorId }, 'session busy');
    throw new SessionBusyError(
      sessionId,
      holder?.executorId ?? 'unknown',
      holder?.expiresAt ?? new Date(this.clock())
    );
  }

  /**
   * Push the expiry forward
   * @throws LeaseLostError when the lease was taken over or released
   */
  async renew(lease: SessionLease, ttlMs: number = this.defaultTtlMs): Promise<SessionLease> {
    const expiresAt = new Date(this.clock() + ttlMs);
    const renewed = await this.store.renew(lease, expiresAt);
    if (!renewed) {
      this.logger.warn({ sessionId: lease.sessionId, executorId: lease.executorId }, 'lease lost');
      throw new LeaseLostError(lease.sessionId, lease.executorId);
    }
    return { ...lease, expiresAt };
  }

  /**
   * Give the session up. Releasing a lease that is already gone is a no-op.
   */
  async release(lease: SessionLease): Promise<void> {
    const released = await this.store.release(lease);
    this.logger.debug(
      { sessionId: lease.sessionId, executorId: lease.executorId, released },
      'lease released'
    );
  }

  /**
   * The live lease on a session, if any
   */
  async holder(sessionId: string): Promise<SessionLease | null> {
    const lease = await this.store.get(sessionId);
    if (!lease || lease.expiresAt.getTime() <= this.clock()) return null;
    return lease;
  }

  private attempt(sessionId: string, executorId: string, ttlMs: number) {
    const now = this.clock();
    const candidate: SessionLease = {
      sessionId,
      executorId,
      token: randomUUID(),
      acquiredAt: new Date(now),
      expiresAt: new Date(now + ttlMs),
    };
    return this.store.tryAcquire(candidate, new Date(now));
  }
}
