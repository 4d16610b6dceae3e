/**
 * Long-term records kept outside the checkpoint log (user and session
 * metadata, conversation archives). The engine never reads them; flows and
 * transports do.
 */

import { z } from 'zod';
import { DocumentConflictError, DocumentNotFoundError } from '../errors';

export type DocumentShape = { id: string };

/**
 * Abstract document store with create/read/update-by-id semantics
 */
export abstract class DocumentStore<T extends DocumentShape> {
  /**
   * Insert a new record
   * @throws DocumentConflictError when the id is taken
   */
  abstract create(doc: T): Promise<T>;

  abstract read(id: string): Promise<T | null>;

  /**
   * Shallow-merge `patch` into an existing record and re-validate it
   * @throws DocumentNotFoundError when the id is unknown
   */
  abstract update(id: string, patch: Partial<Omit<T, 'id'>>): Promise<T>;

  abstract delete(id: string): Promise<boolean>;
}

export const ChannelSchema = z.enum(['web', 'websocket', 'chat', 'sms', 'voice']);

export type Channel = z.infer<typeof ChannelSchema>;

/**
 * Per-session metadata written by transports
 */
export const SessionRecordSchema = z.object({
  id: z.string().min(1),
  channel: ChannelSchema,
  userId: z.string().optional(),
  graphId: z.string(),
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
  metadata: z.record(z.unknown()).default({}),
});

export type SessionRecord = z.infer<typeof SessionRecordSchema>;

/**
 * Memory-based document store
 */
export class MemoryDocumentStore<T extends DocumentShape> extends DocumentStore<T> {
  private documents: Map<string, T> = new Map();

  constructor(
    private readonly name: string,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ) {
    super();
  }

  async create(doc: T): Promise<T> {
    const parsed = this.schema.parse(doc);
    if (this.documents.has(parsed.id)) {
      throw new DocumentConflictError(this.name, parsed.id);
    }
    this.documents.set(parsed.id, parsed);
    return this.schema.parse(parsed);
  }

  async read(id: string): Promise<T | null> {
    const doc = this.documents.get(id);
    return doc ? this.schema.parse(doc) : null;
  }

  async update(id: string, patch: Partial<Omit<T, 'id'>>): Promise<T> {
    const current = this.documents.get(id);
    if (!current) {
      throw new DocumentNotFoundError(this.name, id);
    }
    const next = this.schema.parse({ ...current, ...patch, id });
    this.documents.set(id, next);
    return this.schema.parse(next);
  }

  async delete(id: string): Promise<boolean> {
    return this.documents.delete(id);
  }
}
