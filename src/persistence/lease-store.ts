import type { SessionLease } from '../types/checkpoint.types';

export type AcquireOutcome =
  | { acquired: true; lease: SessionLease }
  /** `holder` is null when the lease changed hands while it was being read */
  | { acquired: false; holder: SessionLease | null };

/**
 * Backing store for session leases. `tryAcquire` must be a single atomic
 * compare-and-set against the stored lease.
 */
export abstract class LeaseStore {
  /**
   * Store `candidate` if the session has no lease or its lease expired at
   * `now`. A live lease is never taken over, even by the same executor.
   */
  abstract tryAcquire(candidate: SessionLease, now: Date): Promise<AcquireOutcome>;

  /**
   * Extend a lease whose token still matches
   * @returns false when the lease was released or taken over
   */
  abstract renew(lease: SessionLease, expiresAt: Date): Promise<boolean>;

  /**
   * Remove a lease whose token still matches
   * @returns false when there was nothing to release
   */
  abstract release(lease: SessionLease): Promise<boolean>;

  abstract get(sessionId: string): Promise<SessionLease | null>;
}
