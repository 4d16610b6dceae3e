/**
 * In-process stand-in for the MongoDB collection methods the adapters use.
 * Supports equality, `$lt`, `$lte` and `$in` filters, sort/limit, `$set`
 * updates and duplicate `_id` errors (code 11000).
 */

import type { CreateIndexesOptions, Filter, IndexSpecification, UpdateFilter } from 'mongodb';

type Sort = Record<string, 1 | -1>;

export class DuplicateKeyError extends Error {
  readonly code = 11000;
}

function field(doc: object, key: string): unknown {
  return Reflect.get(doc, key);
}

function comparable(value: unknown): unknown {
  return value instanceof Date ? value.getTime() : value;
}

function same(a: unknown, b: unknown): boolean {
  return comparable(a) === comparable(b);
}

function order(a: unknown, b: unknown): number | null {
  const x = comparable(a);
  const y = comparable(b);
  if (typeof x === 'number' && typeof y === 'number') return x - y;
  if (typeof x === 'string' && typeof y === 'string') return x < y ? -1 : x > y ? 1 : 0;
  return null;
}

function isOperatorObject(value: unknown): value is object {
  return (
    typeof value === 'object' &&
    value !== null &&
    !(value instanceof Date) &&
    Object.keys(value).some((key) => key.startsWith('$'))
  );
}

function matchesCondition(actual: unknown, condition: unknown): boolean {
  if (!isOperatorObject(condition)) return same(actual, condition);

  return Object.entries(condition).every(([operator, expected]) => {
    switch (operator) {
      case '$lt': {
        const result = order(actual, expected);
        return result !== null && result < 0;
      }
      case '$lte': {
        const result = order(actual, expected);
        return result !== null && result <= 0;
      }
      case '$in':
        return Array.isArray(expected) && expected.some((item) => same(actual, item));
      default:
        throw new Error(`fake collection does not support ${operator}`);
    }
  });
}

export function matches(doc: object, filter: object): boolean {
  return Object.entries(filter).every(([key, condition]) =>
    matchesCondition(field(doc, key), condition)
  );
}

export class FakeCollection<T extends { _id: string }> {
  readonly docs: T[] = [];
  readonly indexes: { spec: IndexSpecification; options?: CreateIndexesOptions }[] = [];
  calls = 0;

  async insertOne(doc: T): Promise<{ insertedId: string }> {
    this.calls++;
    if (this.docs.some((existing) => existing._id === doc._id)) {
      throw new DuplicateKeyError(`E11000 duplicate key error dup key: { _id: "${doc._id}" }`);
    }
    this.docs.push(structuredClone(doc));
    return { insertedId: doc._id };
  }

  async findOne(filter: Filter<T>, options: { sort?: Sort } = {}): Promise<T | null> {
    this.calls++;
    return this.select(filter, options.sort, 1)[0] ?? null;
  }

  find(filter: Filter<T>, options: { sort?: Sort; limit?: number } = {}): { toArray(): Promise<T[]> } {
    this.calls++;
    const docs = this.select(filter, options.sort, options.limit);
    return { toArray: async () => docs };
  }

  async countDocuments(filter: Filter<T>): Promise<number> {
    this.calls++;
    return this.docs.filter((doc) => matches(doc, filter)).length;
  }

  async deleteMany(filter: Filter<T>): Promise<{ deletedCount: number }> {
    this.calls++;
    const keep = this.docs.filter((doc) => !matches(doc, filter));
    const deletedCount = this.docs.length - keep.length;
    this.docs.splice(0, this.docs.length, ...keep);
    return { deletedCount };
  }

  async deleteOne(filter: Filter<T>): Promise<{ deletedCount: number }> {
    this.calls++;
    const index = this.docs.findIndex((doc) => matches(doc, filter));
    if (index === -1) return { deletedCount: 0 };
    this.docs.splice(index, 1);
    return { deletedCount: 1 };
  }

  async updateOne(
    filter: Filter<T>,
    update: UpdateFilter<T>
  ): Promise<{ matchedCount: number; modifiedCount: number }> {
    this.calls++;
    const doc = this.docs.find((candidate) => matches(candidate, filter));
    if (!doc) return { matchedCount: 0, modifiedCount: 0 };
    for (const [key, value] of Object.entries(update.$set ?? {})) {
      Reflect.set(doc, key, value);
    }
    return { matchedCount: 1, modifiedCount: 1 };
  }

  async replaceOne(filter: Filter<T>, replacement: T): Promise<{ matchedCount: number }> {
    this.calls++;
    const index = this.docs.findIndex((doc) => matches(doc, filter));
    if (index === -1) return { matchedCount: 0 };
    this.docs[index] = structuredClone(replacement);
    return { matchedCount: 1 };
  }

  async createIndex(spec: IndexSpecification, options?: CreateIndexesOptions): Promise<string> {
    this.indexes.push({ spec, options });
    return `index_${this.indexes.length}`;
  }

  private select(filter: object, sort: Sort | undefined, limit: number | undefined): T[] {
    let docs = this.docs.filter((doc) => matches(doc, filter));
    if (sort) {
      const keys = Object.entries(sort);
      docs = [...docs].sort((a, b) => {
        for (const [key, direction] of keys) {
          const result = order(field(a, key), field(b, key)) ?? 0;
          if (result !== 0) return result * direction;
        }
        return 0;
      });
    }
    if (limit) docs = docs.slice(0, limit);
    return docs.map((doc) => structuredClone(doc));
  }
}
