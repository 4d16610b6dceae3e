/**
 * Checkpoint store interface and the record format shared by its adapters
 */

import { z } from 'zod';
import type { Checkpoint } from '../types/checkpoint.types';
import { CheckpointSerializer } from './serializer';

const CheckpointErrorSchema = z.object({
  name: z.string(),
  code: z.string(),
  message: z.string(),
  recoverable: z.boolean(),
  nodeId: z.string().optional(),
});

const CheckpointInterruptSchema = z.object({
  reason: z.enum(['node', 'after', 'cancelled']),
  value: z.unknown().optional(),
});

/**
 * Persisted form of a checkpoint. State and interrupt payloads are
 * serialized text so any backend can hold them verbatim.
 */
export const CheckpointRecordSchema = z.object({
  sessionId: z.string().min(1),
  seq: z.number().int().positive(),
  graphId: z.string(),
  node: z.string(),
  next: z.string(),
  status: z.enum(['running', 'interrupted', 'completed', 'failed']),
  state: z.string(),
  interrupt: z.string().optional(),
  error: CheckpointErrorSchema.optional(),
  createdAt: z.coerce.date(),
});

export type CheckpointRecord = z.infer<typeof CheckpointRecordSchema>;

export function toCheckpointRecord(
  checkpoint: Checkpoint,
  serializer: CheckpointSerializer
): CheckpointRecord {
  const record: CheckpointRecord = {
    sessionId: checkpoint.sessionId,
    seq: checkpoint.seq,
    graphId: checkpoint.graphId,
    node: checkpoint.node,
    next: checkpoint.next,
    status: checkpoint.status,
    state: serializer.encode(checkpoint.state),
    createdAt: new Date(checkpoint.createdAt),
  };
  if (checkpoint.interrupt) record.interrupt = serializer.encode(checkpoint.interrupt);
  if (checkpoint.error) record.error = { ...checkpoint.error };
  return record;
}

export function fromCheckpointRecord(
  raw: unknown,
  serializer: CheckpointSerializer
): Checkpoint {
  const record = CheckpointRecordSchema.parse(raw);
  const checkpoint: Checkpoint = {
    sessionId: record.sessionId,
    seq: record.seq,
    graphId: record.graphId,
    node: record.node,
    next: record.next,
    status: record.status,
    state: serializer.decode(record.state),
    createdAt: record.createdAt,
  };
  if (record.interrupt !== undefined) {
    checkpoint.interrupt = CheckpointInterruptSchema.parse(serializer.decode(record.interrupt));
  }
  if (record.error) checkpoint.error = record.error;
  return checkpoint;
}

/**
 * Whether two records describe the same checkpoint. Used to make a repeated
 * append of an identical checkpoint a no-op.
 */
export function sameCheckpointRecord(a: CheckpointRecord, b: CheckpointRecord): boolean {
  return (
    a.sessionId === b.sessionId &&
    a.seq === b.seq &&
    a.graphId === b.graphId &&
    a.node === b.node &&
    a.next === b.next &&
    a.status === b.status &&
    a.state === b.state &&
    a.interrupt === b.interrupt &&
    JSON.stringify(a.error ?? null) === JSON.stringify(b.error ?? null)
  );
}

/**
 * Abstract checkpoint store
 * Implement this interface to create custom storage backends
 */
export abstract class CheckpointStore {
  /**
   * Append the next checkpoint of a session.
   * Re-appending an identical checkpoint is a no-op; a different checkpoint
   * with a stored sequence number, or one that is not `latest + 1`, throws
   * `CheckpointConflictError`.
   */
  abstract append(checkpoint: Checkpoint): Promise<void>;

  /**
   * Load the checkpoint with the highest sequence number
   * @returns The checkpoint or null if the session has none
   */
  abstract latest(sessionId: string): Promise<Checkpoint | null>;

  /**
   * Load one checkpoint by sequence number
   */
  abstract get(sessionId: string, seq: number): Promise<Checkpoint | null>;

  /**
   * Load the history of a session
   * @param limit Optional limit on number of checkpoints to return
   * @returns Checkpoints ordered by sequence number (newest first)
   */
  abstract history(sessionId: string, limit?: number): Promise<Checkpoint[]>;

  /**
   * Get the number of stored checkpoints for a session
   */
  abstract count(sessionId: string): Promise<number>;

  /**
   * Drop old checkpoints, keeping the most recent `keepLast`
   * @returns How many checkpoints were removed
   */
  abstract prune(sessionId: string, keepLast: number): Promise<number>;

  /**
   * Delete all checkpoints for a session
   */
  abstract delete(sessionId: string): Promise<void>;
}
