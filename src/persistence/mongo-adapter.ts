/**
 * MongoDB adapters for checkpoints, session leases and long-term records.
 *
 * Each adapter takes a collection obtained from one process-wide
 * `MongoClient` (see `createFlowRuntime`). The collection types below name
 * only the driver methods the adapters call, so a `Collection` from the
 * `mongodb` package satisfies them directly.
 */

import type {
  CreateIndexesOptions,
  Filter,
  IndexSpecification,
  UpdateFilter,
} from 'mongodb';
import { z } from 'zod';

import type { Checkpoint, SessionLease } from '../types/checkpoint.types';
import {
  CheckpointConflictError,
  DocumentConflictError,
  DocumentNotFoundError,
} from '../errors';
import {
  CheckpointRecord,
  CheckpointRecordSchema,
  CheckpointStore,
  fromCheckpointRecord,
  sameCheckpointRecord,
  toCheckpointRecord,
} from './checkpoint-store';
import { AcquireOutcome, LeaseStore } from './lease-store';
import { DocumentShape, DocumentStore } from './document-store';
import { CheckpointSerializer, defaultSerializer } from './serializer';

type FindOptionsLite = {
  sort?: Record<string, 1 | -1>;
  limit?: number;
};

export type CheckpointDocument = CheckpointRecord & { _id: string };

export interface CheckpointCollection {
  insertOne(doc: CheckpointDocument): Promise<unknown>;
  findOne(
    filter: Filter<CheckpointDocument>,
    options?: FindOptionsLite
  ): Promise<CheckpointDocument | null>;
  find(
    filter: Filter<CheckpointDocument>,
    options?: FindOptionsLite
  ): { toArray(): Promise<CheckpointDocument[]> };
  deleteMany(filter: Filter<CheckpointDocument>): Promise<{ deletedCount: number }>;
  countDocuments(filter: Filter<CheckpointDocument>): Promise<number>;
  createIndex(spec: IndexSpecification, options?: CreateIndexesOptions): Promise<string>;
}

export type LeaseDocument = {
  _id: string;
  executorId: string;
  token: string;
  acquiredAt: Date;
  expiresAt: Date;
};

export interface LeaseCollection {
  insertOne(doc: LeaseDocument): Promise<unknown>;
  findOne(filter: Filter<LeaseDocument>): Promise<LeaseDocument | null>;
  updateOne(
    filter: Filter<LeaseDocument>,
    update: UpdateFilter<LeaseDocument>
  ): Promise<{ matchedCount: number; modifiedCount: number }>;
  deleteOne(filter: Filter<LeaseDocument>): Promise<{ deletedCount: number }>;
  createIndex(spec: IndexSpecification, options?: CreateIndexesOptions): Promise<string>;
}

export type StoredDocument = { _id: string; [field: string]: unknown };

export interface DocumentCollection {
  insertOne(doc: StoredDocument): Promise<unknown>;
  findOne(filter: Filter<StoredDocument>): Promise<StoredDocument | null>;
  /** The driver resolves to an `UpdateResult` or a raw server reply */
  replaceOne(filter: Filter<StoredDocument>, doc: StoredDocument): Promise<unknown>;
  deleteOne(filter: Filter<StoredDocument>): Promise<{ deletedCount: number }>;
}

/** E11000: unique index violation */
export function isDuplicateKeyError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 11000
  );
}

function checkpointId(sessionId: string, seq: number): string {
  return `${sessionId}:${seq}`;
}

/**
 * MongoDB-based checkpoint store
 * One document per checkpoint, `_id` = `sessionId:seq`
 */
export class MongoCheckpointStore extends CheckpointStore {
  private readonly collection: CheckpointCollection;
  private readonly serializer: CheckpointSerializer;

  constructor(collection: CheckpointCollection, serializer: CheckpointSerializer = defaultSerializer) {
    super();
    this.collection = collection;
    this.serializer = serializer;
  }

  /**
   * Create indexes for efficient queries
   */
  async ensureIndexes(): Promise<void> {
    await this.collection.createIndex({ sessionId: 1, seq: -1 }, { unique: true });
  }

  async append(checkpoint: Checkpoint): Promise<void> {
    const record = toCheckpointRecord(checkpoint, this.serializer);
    const id = checkpointId(record.sessionId, record.seq);

    const previous = await this.collection.findOne(
      { sessionId: record.sessionId },
      { sort: { seq: -1 } }
    );
    const expected = (previous?.seq ?? 0) + 1;

    if (record.seq !== expected) {
      if (record.seq < expected && (await this.isStored(id, record))) return;
      throw new CheckpointConflictError(
        record.sessionId,
        record.seq,
        record.seq < expected
          ? 'a different checkpoint already holds this sequence number'
          : `expected sequence number ${expected}`
      );
    }

    try {
      await this.collection.insertOne({ ...record, _id: id });
    } catch (error) {
      if (!isDuplicateKeyError(error)) throw error;
      if (await this.isStored(id, record)) return;
      throw new CheckpointConflictError(
        record.sessionId,
        record.seq,
        'a concurrent writer stored this sequence number'
      );
    }
  }

  async latest(sessionId: string): Promise<Checkpoint | null> {
    const doc = await this.collection.findOne({ sessionId }, { sort: { seq: -1 } });
    return doc ? fromCheckpointRecord(doc, this.serializer) : null;
  }

  async get(sessionId: string, seq: number): Promise<Checkpoint | null> {
    const doc = await this.collection.findOne({ _id: checkpointId(sessionId, seq) });
    return doc ? fromCheckpointRecord(doc, this.serializer) : null;
  }

  async history(sessionId: string, limit?: number): Promise<Checkpoint[]> {
    const docs = await this.collection
      .find(
        { sessionId },
        {
          sort: { seq: -1 },
          limit: limit || 0, // 0 means no limit
        }
      )
      .toArray();
    return docs.map((doc) => fromCheckpointRecord(doc, this.serializer));
  }

  async count(sessionId: string): Promise<number> {
    return await this.collection.countDocuments({ sessionId });
  }

  async prune(sessionId: string, keepLast: number): Promise<number> {
    const kept = await this.collection
      .find({ sessionId }, { sort: { seq: -1 }, limit: Math.max(keepLast, 1) })
      .toArray();
    const oldestKept = kept.at(-1);
    if (!oldestKept) return 0;

    const result = await this.collection.deleteMany({
      sessionId,
      seq: { $lt: oldestKept.seq },
    });
    return result.deletedCount;
  }

  async delete(sessionId: string): Promise<void> {
    await this.collection.deleteMany({ sessionId });
  }

  private async isStored(id: string, record: CheckpointRecord): Promise<boolean> {
    const existing = await this.collection.findOne({ _id: id });
    return existing !== null && sameCheckpointRecord(CheckpointRecordSchema.parse(existing), record);
  }
}

function toLeaseDocument(lease: SessionLease): LeaseDocument {
  return {
    _id: lease.sessionId,
    executorId: lease.executorId,
    token: lease.token,
    acquiredAt: lease.acquiredAt,
    expiresAt: lease.expiresAt,
  };
}

function fromLeaseDocument(doc: LeaseDocument): SessionLease {
  return {
    sessionId: doc._id,
    executorId: doc.executorId,
    token: doc.token,
    acquiredAt: new Date(doc.acquiredAt),
    expiresAt: new Date(doc.expiresAt),
  };
}

/**
 * MongoDB-based lease store, one document per session.
 * A free session is taken by insert; an expired lease by a conditional
 * update on `expiresAt`. Both are single atomic operations.
 */
export class MongoLeaseStore extends LeaseStore {
  private static readonly MAX_ATTEMPTS = 3;

  constructor(private readonly collection: LeaseCollection) {
    super();
  }

  async ensureIndexes(): Promise<void> {
    await this.collection.createIndex({ expiresAt: 1 });
  }

  async tryAcquire(candidate: SessionLease, now: Date): Promise<AcquireOutcome> {
    const doc = toLeaseDocument(candidate);

    for (let attempt = 0; attempt < MongoLeaseStore.MAX_ATTEMPTS; attempt++) {
      try {
        await this.collection.insertOne(doc);
        return { acquired: true, lease: { ...candidate } };
      } catch (error) {
        if (!isDuplicateKeyError(error)) throw error;
      }

      const result = await this.collection.updateOne(
        { _id: doc._id, expiresAt: { $lte: now } },
        {
          $set: {
            executorId: doc.executorId,
            token: doc.token,
            acquiredAt: doc.acquiredAt,
            expiresAt: doc.expiresAt,
          },
        }
      );
      if (result.modifiedCount === 1) {
        return { acquired: true, lease: { ...candidate } };
      }

      const holder = await this.collection.findOne({ _id: doc._id });
      if (holder) {
        return { acquired: false, holder: fromLeaseDocument(holder) };
      }
      // released between the insert and the read; try again
    }

    return { acquired: false, holder: null };
  }

  async renew(lease: SessionLease, expiresAt: Date): Promise<boolean> {
    const result = await this.collection.updateOne(
      { _id: lease.sessionId, token: lease.token },
      { $set: { expiresAt } }
    );
    return result.matchedCount === 1;
  }

  async release(lease: SessionLease): Promise<boolean> {
    const result = await this.collection.deleteOne({ _id: lease.sessionId, token: lease.token });
    return result.deletedCount === 1;
  }

  async get(sessionId: string): Promise<SessionLease | null> {
    const doc = await this.collection.findOne({ _id: sessionId });
    return doc ? fromLeaseDocument(doc) : null;
  }
}

/**
 * MongoDB-based document store; the record id is stored as `_id`
 */
export class MongoDocumentStore<T extends DocumentShape> extends DocumentStore<T> {
  constructor(
    private readonly name: string,
    private readonly collection: DocumentCollection,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ) {
    super();
  }

  async create(doc: T): Promise<T> {
    const parsed = this.schema.parse(doc);
    try {
      await this.collection.insertOne(this.toStored(parsed));
    } catch (error) {
      if (isDuplicateKeyError(error)) throw new DocumentConflictError(this.name, parsed.id);
      throw error;
    }
    return parsed;
  }

  async read(id: string): Promise<T | null> {
    const stored = await this.collection.findOne({ _id: id });
    return stored ? this.fromStored(stored) : null;
  }

  async update(id: string, patch: Partial<Omit<T, 'id'>>): Promise<T> {
    const current = await this.read(id);
    if (!current) {
      throw new DocumentNotFoundError(this.name, id);
    }
    const next = this.schema.parse({ ...current, ...patch, id });
    const result = await this.collection.replaceOne({ _id: id }, this.toStored(next));
    if (
      typeof result === 'object' &&
      result !== null &&
      'matchedCount' in result &&
      result.matchedCount === 0
    ) {
      throw new DocumentNotFoundError(this.name, id);
    }
    return next;
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.collection.deleteOne({ _id: id });
    return result.deletedCount === 1;
  }

  private toStored(doc: T): StoredDocument {
    const stored: StoredDocument = { _id: doc.id };
    for (const [field, value] of Object.entries(doc)) {
      if (field !== 'id') stored[field] = value;
    }
    return stored;
  }

  private fromStored(stored: StoredDocument): T {
    const { _id, ...fields } = stored;
    return this.schema.parse({ ...fields, id: _id });
  }
}
