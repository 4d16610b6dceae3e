/**
 * In-memory stores for development and testing
 * Data is lost when the process ends
 */

import type { Checkpoint, SessionLease } from '../types/checkpoint.types';
import { CheckpointConflictError } from '../errors';
import {
  CheckpointRecord,
  CheckpointStore,
  fromCheckpointRecord,
  sameCheckpointRecord,
  toCheckpointRecord,
} from './checkpoint-store';
import { AcquireOutcome, LeaseStore } from './lease-store';
import { CheckpointSerializer, defaultSerializer } from './serializer';

/**
 * Memory-based checkpoint store
 * Keeps serialized records, so a checkpoint handed out can never alter history
 */
export class MemoryCheckpointStore extends CheckpointStore {
  private storage: Map<string, CheckpointRecord[]> = new Map();
  private readonly serializer: CheckpointSerializer;

  constructor(serializer: CheckpointSerializer = defaultSerializer) {
    super();
    this.serializer = serializer;
  }

  async append(checkpoint: Checkpoint): Promise<void> {
    const record = toCheckpointRecord(checkpoint, this.serializer);
    const records = this.storage.get(record.sessionId) ?? [];

    const existing = records.find((r) => r.seq === record.seq);
    if (existing) {
      if (sameCheckpointRecord(existing, record)) return;
      throw new CheckpointConflictError(
        record.sessionId,
        record.seq,
        'a different checkpoint already holds this sequence number'
      );
    }

    const expected = (records.at(-1)?.seq ?? 0) + 1;
    if (record.seq !== expected) {
      throw new CheckpointConflictError(
        record.sessionId,
        record.seq,
        `expected sequence number ${expected}`
      );
    }

    records.push(record);
    this.storage.set(record.sessionId, records);
  }

  async latest(sessionId: string): Promise<Checkpoint | null> {
    const record = this.storage.get(sessionId)?.at(-1);
    return record ? fromCheckpointRecord(record, this.serializer) : null;
  }

  async get(sessionId: string, seq: number): Promise<Checkpoint | null> {
    const record = this.storage.get(sessionId)?.find((r) => r.seq === seq);
    return record ? fromCheckpointRecord(record, this.serializer) : null;
  }

  async history(sessionId: string, limit?: number): Promise<Checkpoint[]> {
    const records = [...(this.storage.get(sessionId) ?? [])].reverse();
    const selected = limit !== undefined && limit > 0 ? records.slice(0, limit) : records;
    return selected.map((record) => fromCheckpointRecord(record, this.serializer));
  }

  async count(sessionId: string): Promise<number> {
    return this.storage.get(sessionId)?.length ?? 0;
  }

  async prune(sessionId: string, keepLast: number): Promise<number> {
    const records = this.storage.get(sessionId);
    if (!records || records.length <= keepLast) {
      return 0; // Nothing to prune
    }

    // The newest record always stays, sequence allocation depends on it
    const keep = Math.max(keepLast, 1);
    const removed = records.length - keep;
    this.storage.set(sessionId, records.slice(removed));
    return removed;
  }

  async delete(sessionId: string): Promise<void> {
    this.storage.delete(sessionId);
  }

  /**
   * Clear all data from memory (useful for testing)
   */
  clearAll(): void {
    this.storage.clear();
  }

  /**
   * Get all session IDs in storage (useful for debugging)
   */
  getAllSessionIds(): string[] {
    return Array.from(this.storage.keys());
  }
}

/**
 * Memory-based lease store. Compare-and-set is atomic because nothing awaits
 * between the read and the write.
 */
export class MemoryLeaseStore extends LeaseStore {
  private leases: Map<string, SessionLease> = new Map();

  async tryAcquire(candidate: SessionLease, now: Date): Promise<AcquireOutcome> {
    const current = this.leases.get(candidate.sessionId);
    if (current && current.expiresAt.getTime() > now.getTime()) {
      return { acquired: false, holder: { ...current } };
    }
    this.leases.set(candidate.sessionId, { ...candidate });
    return { acquired: true, lease: { ...candidate } };
  }

  async renew(lease: SessionLease, expiresAt: Date): Promise<boolean> {
    const current = this.leases.get(lease.sessionId);
    if (!current || current.token !== lease.token) return false;
    this.leases.set(lease.sessionId, { ...current, expiresAt });
    return true;
  }

  async release(lease: SessionLease): Promise<boolean> {
    const current = this.leases.get(lease.sessionId);
    if (!current || current.token !== lease.token) return false;
    this.leases.delete(lease.sessionId);
    return true;
  }

  async get(sessionId: string): Promise<SessionLease | null> {
    const current = this.leases.get(sessionId);
    return current ? { ...current } : null;
  }

  clearAll(): void {
    this.leases.clear();
  }
}
