/**
 * State schema for strongly-typed flow state using Zod.
 *
 * Every field declares how deltas are merged into it. The mapping is total:
 * a field without a policy is rejected when the schema is defined, so no
 * delta can be silently dropped or overwrite history by accident.
 */

import { z } from 'zod';
import { GraphValidationError, StateValidationError } from '../errors';

/**
 * Custom reducer that folds a delta value into the previous value
 */
export type ReducerConfig<T = unknown> = {
  reduce(prevValue: T, newValue: T): T;
};

/**
 * - `overwrite`: the delta value replaces the current value
 * - `append`: list field; delta arrays are concatenated, single values pushed
 * - reducer: custom fold
 */
export type MergePolicy<T = unknown> = 'overwrite' | 'append' | ReducerConfig<T>;

/** One policy per field, every field required */
export type MergePolicies<T> = { [K in keyof T]-?: MergePolicy<T[K]> };

/**
 * Zod object schema describing the flow state
 */
export type StateShape = z.AnyZodObject;

/**
 * Infer the TypeScript type from a Zod state schema
 */
export type InferState<S extends StateShape> = z.infer<S>;

export function isMergePolicy(value: unknown): value is MergePolicy {
  if (value === 'overwrite' || value === 'append') return true;
  return (
    typeof value === 'object' &&
    value !== null &&
    'reduce' in value &&
    typeof value.reduce === 'function'
  );
}

function isArrayField(schema: z.ZodTypeAny): boolean {
  if (schema instanceof z.ZodArray) return true;
  if (schema instanceof z.ZodDefault) return isArrayField(schema.removeDefault());
  if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) {
    return isArrayField(schema.unwrap());
  }
  return false;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

/**
 * Validated state schema with explicit per-field merge policies
 *
 * @example
 * ```typescript
 * const schema = defineStateSchema(
 *   z.object({
 *     text: z.string().default(''),
 *     intent: z.string().optional(),
 *     messages: z.array(z.string()).default([]),
 *   }),
 *   { text: 'overwrite', intent: 'overwrite', messages: 'append' }
 * );
 * ```
 */
export class StateSchema<S extends StateShape> {
  readonly zod: S;
  private readonly policies = new Map<string, MergePolicy>();

  constructor(zod: S, policies: MergePolicies<z.infer<S>>) {
    this.zod = zod;

    const shape: Record<string, unknown> = zod.shape;
    const issues: string[] = [];

    for (const [field, policy] of Object.entries(policies)) {
      if (!(field in shape)) {
        issues.push(`merge policy declared for unknown field "${field}"`);
        continue;
      }
      if (!isMergePolicy(policy)) {
        issues.push(`field "${field}" has an invalid merge policy`);
        continue;
      }
      this.policies.set(field, policy);
    }

    for (const [field, fieldSchema] of Object.entries(shape)) {
      const policy = this.policies.get(field);
      if (!policy) {
        if (!issues.some((issue) => issue.includes(`"${field}"`))) {
          issues.push(`field "${field}" has no merge policy`);
        }
        continue;
      }
      if (
        policy === 'append' &&
        fieldSchema instanceof z.ZodType &&
        !isArrayField(fieldSchema)
      ) {
        issues.push(`field "${field}" uses "append" but is not a list`);
      }
    }

    if (issues.length > 0) {
      throw new GraphValidationError('state schema', issues);
    }
  }

  /** Field names in declaration order */
  get fields(): string[] {
    return Object.keys(this.zod.shape);
  }

  policyOf(field: string): MergePolicy | undefined {
    return this.policies.get(field);
  }

  /**
   * Validate an untyped value (decoded checkpoint, caller input) as state
   */
  parse(value: unknown): z.infer<S> {
    const result = this.zod.safeParse(value);
    if (!result.success) {
      throw new StateValidationError(formatIssues(result.error), { cause: result.error });
    }
    return result.data;
  }

  /**
   * Create initial state from schema defaults, then overrides
   */
  createInitialState(overrides: Partial<z.infer<S>> = {}): z.infer<S> {
    return this.parse({ ...overrides });
  }

  /**
   * Initial state of a new session: schema defaults with the input merged
   * in as the first delta
   */
  seed(input: Partial<z.infer<S>>): z.infer<S> {
    const defaults: Record<string, unknown> = {};
    const shape: Record<string, unknown> = this.zod.shape;
    for (const [field, fieldSchema] of Object.entries(shape)) {
      if (!(fieldSchema instanceof z.ZodType)) continue;
      const fallback = fieldSchema.safeParse(undefined);
      if (fallback.success && fallback.data !== undefined) {
        defaults[field] = fallback.data;
      }
    }
    return this.parse(this.fold(defaults, input));
  }

  /**
   * Merge a delta field-wise according to the declared policies and
   * re-validate the result
   */
  merge(current: z.infer<S>, delta: Partial<z.infer<S>>): z.infer<S> {
    return this.parse(this.fold({ ...current }, delta));
  }

  private fold(
    merged: Record<string, unknown>,
    delta: Partial<z.infer<S>>
  ): Record<string, unknown> {
    for (const [field, value] of Object.entries(delta)) {
      const next: unknown = value;
      if (next === undefined) continue;

      const policy = this.policies.get(field);
      if (!policy) {
        throw new StateValidationError([`field "${field}" is not part of the state schema`]);
      }

      const previous = merged[field];
      if (policy === 'overwrite') {
        merged[field] = next;
      } else if (policy === 'append') {
        const base = Array.isArray(previous) ? previous : [];
        merged[field] = Array.isArray(next) ? [...base, ...next] : [...base, next];
      } else {
        merged[field] = policy.reduce(previous, next);
      }
    }
    return merged;
  }
}

/**
 * Build a state schema, failing fast on a partial or invalid policy map
 */
export function defineStateSchema<S extends StateShape>(
  zod: S,
  policies: MergePolicies<z.infer<S>>
): StateSchema<S> {
  return new StateSchema(zod, policies);
}
