/**
 * JSON graph definitions.
 *
 * A definition names its nodes' behaviors by key in a {@link NodeCatalog}
 * and expresses edge guards as declarative conditions, so flows can be
 * stored as data and assembled at startup:
 *
 * ```json
 * {
 *   "id": "support",
 *   "nodes": [
 *     { "id": "classify", "kind": "transform" },
 *     { "id": "respond", "kind": "transform", "terminal": true },
 *     { "id": "escalate", "kind": "transform", "terminal": true }
 *   ],
 *   "edges": [
 *     { "from": "__START__", "to": "classify" },
 *     {
 *       "from": "classify",
 *       "to": {
 *         "conditions": [{ "field": "intent", "operator": "equals", "value": "faq", "goto": "respond" }],
 *         "default": "escalate"
 *       }
 *     }
 *   ]
 * }
 * ```
 */

import { z } from 'zod';

import type { ExternalNode, Guard, RouterNode, TransformNode } from '../types/graph.types';
import { GraphValidationError } from '../errors';
import { FlowGraph, FlowGraphBuilder } from '../graph';
import { InferState, StateSchema, StateShape } from './state-schema';

export const OperatorSchema = z.enum([
  'equals',
  'not_equals',
  'gt',
  'gte',
  'lt',
  'lte',
  'contains',
  'not_contains',
  'in',
  'not_in',
  'regex',
  'exists',
]);

export type Operator = z.infer<typeof OperatorSchema>;

export type FieldCondition = {
  /** Dot path into the state, e.g. `profile.tier` */
  field: string;
  operator: Operator;
  value?: unknown;
};

export type Condition = FieldCondition | { all: Condition[] } | { any: Condition[] };

const FieldConditionSchema = z.object({
  field: z.string().min(1),
  operator: OperatorSchema,
  value: z.unknown().optional(),
});

export const ConditionSchema: z.ZodType<Condition> = z.lazy(() =>
  z.union([
    FieldConditionSchema,
    z.object({ all: z.array(ConditionSchema).min(1) }),
    z.object({ any: z.array(ConditionSchema).min(1) }),
  ])
);

const RouteSchema = z.union([
  FieldConditionSchema.extend({ goto: z.string().min(1) }),
  z.object({ all: z.array(ConditionSchema).min(1), goto: z.string().min(1) }),
  z.object({ any: z.array(ConditionSchema).min(1), goto: z.string().min(1) }),
]);

type Route = z.infer<typeof RouteSchema>;

const NodeDefinitionSchema = z.object({
  id: z.string().min(1),
  kind: z.enum(['transform', 'external', 'router']),
  /** Catalog key; the node id when absent */
  behavior: z.string().min(1).optional(),
  terminal: z.boolean().optional(),
  ends: z.array(z.string().min(1)).optional(),
  timeoutMs: z.number().int().positive().optional(),
  description: z.string().optional(),
});

const EdgeDefinitionSchema = z.object({
  from: z.string().min(1),
  to: z.union([
    z.string().min(1),
    z.object({
      conditions: z.array(RouteSchema).min(1),
      default: z.string().min(1).optional(),
    }),
  ]),
  label: z.string().optional(),
});

export const GraphDefinitionSchema = z.object({
  id: z.string().min(1),
  maxSteps: z.number().int().positive().optional(),
  interruptAfter: z.array(z.string()).optional(),
  nodes: z.array(NodeDefinitionSchema).min(1),
  edges: z.array(EdgeDefinitionSchema).min(1),
});

export type GraphDefinition = z.infer<typeof GraphDefinitionSchema>;

/**
 * Behaviors a definition may refer to, keyed by name
 */
export type NodeCatalog<T> = {
  transforms?: Record<string, TransformNode<T>['run']>;
  externals?: Record<string, Pick<ExternalNode<T>, 'call' | 'apply'>>;
  routers?: Record<string, NonNullable<RouterNode<T>['route']>>;
};

export function readField(state: unknown, path: string): unknown {
  let current: unknown = state;
  for (const key of path.split('.')) {
    if (typeof current !== 'object' || current === null || !(key in current)) {
      return undefined;
    }
    current = Reflect.get(current, key);
  }
  return current;
}

function sameValue(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (typeof a === 'object' && typeof b === 'object' && a !== null && b !== null) {
    return JSON.stringify(a) === JSON.stringify(b);
  }
  return false;
}

function compare(actual: unknown, expected: unknown): number | null {
  if (typeof actual === 'number' && typeof expected === 'number') return actual - expected;
  if (typeof actual === 'string' && typeof expected === 'string') {
    return actual < expected ? -1 : actual > expected ? 1 : 0;
  }
  return null;
}

function contains(container: unknown, item: unknown): boolean {
  if (typeof container === 'string') return typeof item === 'string' && container.includes(item);
  if (Array.isArray(container)) return container.some((entry) => sameValue(entry, item));
  return false;
}

function applyOperator(operator: Operator, actual: unknown, expected: unknown): boolean {
  switch (operator) {
    case 'equals':
      return sameValue(actual, expected);
    case 'not_equals':
      return !sameValue(actual, expected);
    case 'gt': {
      const order = compare(actual, expected);
      return order !== null && order > 0;
    }
    case 'gte': {
      const order = compare(actual, expected);
      return order !== null && order >= 0;
    }
    case 'lt': {
      const order = compare(actual, expected);
      return order !== null && order < 0;
    }
    case 'lte': {
      const order = compare(actual, expected);
      return order !== null && order <= 0;
    }
    case 'contains':
      return contains(actual, expected);
    case 'not_contains':
      return !contains(actual, expected);
    case 'in':
      return contains(expected, actual);
    case 'not_in':
      return !contains(expected, actual);
    case 'regex':
      return typeof actual === 'string' && typeof expected === 'string' && new RegExp(expected).test(actual);
    case 'exists': {
      const present = actual !== undefined && actual !== null;
      return expected === false ? !present : present;
    }
  }
}

/**
 * Evaluate a declarative condition against a state value
 */
export function evaluateCondition(condition: Condition, state: unknown): boolean {
  if ('all' in condition) return condition.all.every((c) => evaluateCondition(c, state));
  if ('any' in condition) return condition.any.some((c) => evaluateCondition(c, state));
  return applyOperator(condition.operator, readField(state, condition.field), condition.value);
}

function checkCondition(condition: Condition, fields: readonly string[], where: string, issues: string[]): void {
  if ('all' in condition || 'any' in condition) {
    const parts = 'all' in condition ? condition.all : condition.any;
    for (const part of parts) checkCondition(part, fields, where, issues);
    return;
  }

  const root = condition.field.split('.')[0];
  if (!fields.includes(root)) {
    issues.push(`${where}: condition field "${condition.field}" is not part of the state`);
  }
  if (condition.operator === 'regex') {
    if (typeof condition.value !== 'string') {
      issues.push(`${where}: regex condition needs a string pattern`);
    } else {
      try {
        new RegExp(condition.value);
      } catch (error) {
        issues.push(`${where}: invalid pattern "${condition.value}" (${String(error)})`);
      }
    }
  }
  if ((condition.operator === 'in' || condition.operator === 'not_in') && !Array.isArray(condition.value)) {
    issues.push(`${where}: ${condition.operator} condition needs an array value`);
  }
}

function routeCondition(route: Route): Condition {
  if ('all' in route) return { all: route.all };
  if ('any' in route) return { any: route.any };
  return { field: route.field, operator: route.operator, value: route.value };
}

/**
 * Build and compile a graph from an untrusted definition. Definition,
 * catalog and graph problems are all reported as {@link GraphValidationError}.
 */
export function assembleGraph<S extends StateShape>(
  schema: StateSchema<S>,
  definition: unknown,
  catalog: NodeCatalog<InferState<S>>
): FlowGraph<S> {
  const parsed = GraphDefinitionSchema.safeParse(definition);
  if (!parsed.success) {
    throw new GraphValidationError(
      'definition',
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }

  const def = parsed.data;
  const issues: string[] = [];
  const builder = new FlowGraphBuilder(schema);

  for (const node of def.nodes) {
    const key = node.behavior ?? node.id;
    const options = { terminal: node.terminal, description: node.description };

    switch (node.kind) {
      case 'transform': {
        const run = catalog.transforms?.[key];
        if (!run) {
          issues.push(`node "${node.id}": no transform "${key}" in the catalog`);
          break;
        }
        builder.addTransform(node.id, run, { ...options, ends: node.ends });
        break;
      }
      case 'external': {
        const external = catalog.externals?.[key];
        if (!external) {
          issues.push(`node "${node.id}": no external "${key}" in the catalog`);
          break;
        }
        builder.addExternal(
          node.id,
          { call: external.call, apply: external.apply, timeoutMs: node.timeoutMs },
          { ...options, ends: node.ends }
        );
        break;
      }
      case 'router': {
        const route = node.behavior ? catalog.routers?.[key] : undefined;
        if (node.behavior && !route) {
          issues.push(`node "${node.id}": no router "${key}" in the catalog`);
          break;
        }
        builder.addRouter(node.id, route, options);
        break;
      }
    }
  }

  const fields = schema.fields;
  def.edges.forEach((edge, index) => {
    if (typeof edge.to === 'string') {
      builder.addEdge(edge.from, edge.to, undefined, edge.label);
      return;
    }
    for (const route of edge.to.conditions) {
      const condition = routeCondition(route);
      checkCondition(condition, fields, `edge #${index} from "${edge.from}"`, issues);
      const guard: Guard<InferState<S>> = (state) => evaluateCondition(condition, state);
      builder.addEdge(edge.from, route.goto, guard, edge.label);
    }
    if (edge.to.default !== undefined) {
      builder.addEdge(edge.from, edge.to.default, undefined, edge.label);
    }
  });

  if (issues.length > 0) {
    throw new GraphValidationError(def.id, issues);
  }

  return builder.compile({
    id: def.id,
    maxSteps: def.maxSteps,
    interruptAfter: def.interruptAfter,
  });
}
