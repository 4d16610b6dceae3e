/**
 * JSON serialization for checkpoint state.
 *
 * Plain JSON loses `Date`, `Map`, `Set`, `bigint`, `undefined` and the
 * non-finite numbers (and `-0`). Those are written as tagged objects
 * `{ "__type": ..., "value": ... }` and restored on decode, so a state
 * survives a round trip through any store unchanged. A plain object that
 * already has a `__type` key is wrapped in an `Object` tag so it is never
 * read back as one of the others.
 */

const TYPE_KEY = '__type';

type Tagged =
  | { [TYPE_KEY]: 'Date'; value: string }
  | { [TYPE_KEY]: 'Map'; value: [unknown, unknown][] }
  | { [TYPE_KEY]: 'Set'; value: unknown[] }
  | { [TYPE_KEY]: 'BigInt'; value: string }
  | { [TYPE_KEY]: 'Number'; value: string }
  | { [TYPE_KEY]: 'Undefined' }
  | { [TYPE_KEY]: 'Object'; value: Record<string, unknown> };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class CheckpointSerializer {
  encode(value: unknown): string {
    return JSON.stringify(this.toTagged(value));
  }

  decode(text: string): unknown {
    const parsed: unknown = JSON.parse(text);
    return this.fromTagged(parsed);
  }

  private toTagged(value: unknown): unknown {
    if (value === undefined) return { [TYPE_KEY]: 'Undefined' } satisfies Tagged;
    if (typeof value === 'number' && (!Number.isFinite(value) || Object.is(value, -0))) {
      const text = Object.is(value, -0) ? '-0' : String(value);
      return { [TYPE_KEY]: 'Number', value: text } satisfies Tagged;
    }
    if (typeof value === 'bigint') {
      return { [TYPE_KEY]: 'BigInt', value: value.toString() } satisfies Tagged;
    }
    if (value instanceof Date) {
      return { [TYPE_KEY]: 'Date', value: value.toISOString() } satisfies Tagged;
    }
    if (value instanceof Map) {
      return {
        [TYPE_KEY]: 'Map',
        value: Array.from(value.entries(), ([k, v]) => [this.toTagged(k), this.toTagged(v)]),
      };
    }
    if (value instanceof Set) {
      return { [TYPE_KEY]: 'Set', value: Array.from(value, (item) => this.toTagged(item)) };
    }
    if (Array.isArray(value)) {
      return value.map((item) => this.toTagged(item));
    }
    if (isRecord(value)) {
      const out: Record<string, unknown> = {};
      for (const [key, item] of Object.entries(value)) {
        out[key] = this.toTagged(item);
      }
      return TYPE_KEY in value ? ({ [TYPE_KEY]: 'Object', value: out } satisfies Tagged) : out;
    }
    if (typeof value === 'function' || typeof value === 'symbol') {
      throw new TypeError(`Cannot serialize a ${typeof value} into a checkpoint`);
    }
    return value;
  }

  private fromTagged(value: unknown): unknown {
    if (Array.isArray(value)) {
      return value.map((item) => this.fromTagged(item));
    }
    if (!isRecord(value)) return value;

    switch (value[TYPE_KEY]) {
      case 'Undefined':
        return undefined;
      case 'Number':
        return Number(String(value.value));
      case 'Object':
        return isRecord(value.value) ? this.fromEntries(value.value) : {};
      case 'BigInt':
        return BigInt(String(value.value));
      case 'Date':
        return new Date(String(value.value));
      case 'Map': {
        const entries = Array.isArray(value.value) ? value.value : [];
        return new Map(
          entries.map((entry: unknown): [unknown, unknown] => {
            const pair = Array.isArray(entry) ? entry : [];
            return [this.fromTagged(pair[0]), this.fromTagged(pair[1])];
          })
        );
      }
      case 'Set': {
        const items = Array.isArray(value.value) ? value.value : [];
        return new Set(items.map((item: unknown) => this.fromTagged(item)));
      }
      default:
        return this.fromEntries(value);
    }
  }

  private fromEntries(value: Record<string, unknown>): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      out[key] = this.fromTagged(item);
    }
    return out;
  }
}

export const defaultSerializer = new CheckpointSerializer();
