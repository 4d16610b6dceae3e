import type {
  Edge,
  EdgeTarget,
  ExternalNode,
  FlowNode,
  Guard,
  NodeContext,
  NodeUpdate,
  RouterNode,
  TransformNode,
} from './types/graph.types';

import { START, END } from './constants';
import { InferState, StateSchema, StateShape } from './schema/state-schema';
import {
  GraphValidationError,
  NoRouteMatchedError,
  NodeContractViolationError,
} from './errors';

type NodeOptions = {
  terminal?: boolean;
  ends?: readonly string[];
  description?: string;
};

export type CompileOptions = {
  id: string;
  /** Per-call step budget; the engine default applies when absent */
  maxSteps?: number;
  /** Nodes after which the session pauses with reason `after` */
  interruptAfter?: readonly string[];
};

/**
 * Immutable, validated flow graph. Built once at startup with
 * {@link FlowGraphBuilder} and shared by every session that runs it.
 */
export class FlowGraph<S extends StateShape> {
  readonly id: string;
  readonly state: StateSchema<S>;
  readonly entry: string;
  readonly maxSteps?: number;
  private readonly nodes: ReadonlyMap<string, FlowNode<InferState<S>>>;
  private readonly edges: ReadonlyMap<string, readonly Edge<InferState<S>>[]>;
  private readonly interruptAfter: ReadonlySet<string>;

  /** @internal use {@link FlowGraphBuilder.compile} */
  constructor(init: {
    id: string;
    state: StateSchema<S>;
    entry: string;
    nodes: ReadonlyMap<string, FlowNode<InferState<S>>>;
    edges: ReadonlyMap<string, readonly Edge<InferState<S>>[]>;
    maxSteps?: number;
    interruptAfter?: readonly string[];
  }) {
    this.id = init.id;
    this.state = init.state;
    this.entry = init.entry;
    this.nodes = init.nodes;
    this.edges = init.edges;
    this.maxSteps = init.maxSteps;
    this.interruptAfter = new Set(init.interruptAfter ?? []);
    Object.freeze(this);
  }

  get nodeIds(): string[] {
    return Array.from(this.nodes.keys());
  }

  node(id: string): FlowNode<InferState<S>> | undefined {
    return this.nodes.get(id);
  }

  outgoing(id: string): readonly Edge<InferState<S>>[] {
    return this.edges.get(id) ?? [];
  }

  isTerminal(id: string): boolean {
    return this.nodes.get(id)?.terminal === true;
  }

  shouldInterruptAfter(id: string): boolean {
    return this.interruptAfter.has(id);
  }

  /**
   * Resolve the node after `from` by evaluating its edges against `state`.
   * Guarded edges are tried in declaration order; the unconditional edge is
   * the fallback.
   */
  resolveNext(from: string, state: InferState<S>): EdgeTarget {
    const edges = this.outgoing(from);
    let fallback: EdgeTarget | undefined;

    for (const edge of edges) {
      if (!edge.guard) {
        fallback ??= edge.to;
        continue;
      }
      if (this.evaluate(from, edge.guard, state)) {
        return edge.to;
      }
    }

    if (fallback !== undefined) return fallback;
    throw new NoRouteMatchedError(
      from,
      edges.map((edge) => edge.to)
    );
  }

  /**
   * Pick the first candidate reachable from `from`: either a declared
   * `ends` target or an edge whose guard (if any) holds.
   */
  resolveCandidates(
    from: string,
    candidates: readonly string[],
    state: InferState<S>
  ): EdgeTarget {
    const node = this.nodes.get(from);
    const ends: readonly string[] = node && node.kind !== 'router' ? node.ends ?? [] : [];

    for (const candidate of candidates) {
      if (ends.includes(candidate)) return candidate;
      const edge = this.outgoing(from).find(
        (e) => e.to === candidate && (!e.guard || this.evaluate(from, e.guard, state))
      );
      if (edge) return edge.to;
    }

    throw new NoRouteMatchedError(from, candidates);
  }

  /**
   * Validate an explicit target chosen by a node. It must be declared as an
   * edge target or in the node's `ends`.
   */
  resolveGoto(from: string, target: string): EdgeTarget {
    const node = this.nodes.get(from);
    const ends: readonly string[] = node && node.kind !== 'router' ? node.ends ?? [] : [];
    const declared =
      ends.includes(target) || this.outgoing(from).some((edge) => edge.to === target);

    if (!declared || (target !== END && !this.nodes.has(target))) {
      throw new NoRouteMatchedError(from, [target]);
    }
    return target;
  }

  private evaluate(from: string, guard: Guard<InferState<S>>, state: InferState<S>): boolean {
    try {
      return guard(state);
    } catch (error) {
      throw new NodeContractViolationError(from, error);
    }
  }
}

/**
 * Typed builder for flow graphs
 *
 * @example
 * ```typescript
 * const graph = new FlowGraphBuilder(schema)
 *   .addTransform('classify', (state) => ({
 *     intent: /password/.test(state.text) ? 'faq' : 'other',
 *   }))
 *   .addTransform('respond', () => ({ reply: 'See the reset page.' }), { terminal: true })
 *   .addTransform('escalate', () => ({ reply: 'Connecting you to an agent.' }), { terminal: true })
 *   .addEdge(START, 'classify')
 *   .addEdge('classify', 'respond', (state) => state.intent === 'faq')
 *   .addEdge('classify', 'escalate')
 *   .compile({ id: 'support' });
 * ```
 */
export class FlowGraphBuilder<S extends StateShape> {
  private readonly schema: StateSchema<S>;
  private readonly nodes: FlowNode<InferState<S>>[] = [];
  private readonly edges: Edge<InferState<S>>[] = [];

  constructor(schema: StateSchema<S>) {
    this.schema = schema;
  }

  /**
   * Adds a node to the graph
   *
   * @returns The builder for chaining
   */
  addNode(node: FlowNode<InferState<S>>): this {
    this.nodes.push(node);
    return this;
  }

  addTransform(
    id: string,
    run: (state: Readonly<InferState<S>>, context: NodeContext) => NodeUpdate<InferState<S>>,
    options: NodeOptions = {}
  ): this {
    const node: TransformNode<InferState<S>> = { kind: 'transform', id, run, ...options };
    return this.addNode(node);
  }

  addExternal<R>(
    id: string,
    spec: Pick<ExternalNode<InferState<S>, R>, 'call' | 'apply' | 'timeoutMs'>,
    options: NodeOptions = {}
  ): this {
    const node: ExternalNode<InferState<S>, R> = {
      kind: 'external',
      id,
      call: spec.call,
      apply: spec.apply,
      timeoutMs: spec.timeoutMs,
      ...options,
    };
    return this.addNode(node);
  }

  addRouter(
    id: string,
    route?: RouterNode<InferState<S>>['route'],
    options: Omit<NodeOptions, 'ends'> = {}
  ): this {
    const node: RouterNode<InferState<S>> = { kind: 'router', id, route, ...options };
    return this.addNode(node);
  }

  /**
   * Adds a directed edge, optionally guarded by a predicate over state
   *
   * @param from - Source node ID or `START`
   * @param to - Target node ID or `END`
   */
  addEdge(from: string, to: EdgeTarget, guard?: Guard<InferState<S>>, label?: string): this {
    this.edges.push({ from, to, guard, label });
    return this;
  }

  /**
   * Validate eagerly and freeze the graph. All problems are reported at once.
   */
  compile(options: CompileOptions): FlowGraph<S> {
    const issues: string[] = [];
    const nodes = new Map<string, FlowNode<InferState<S>>>();

    for (const node of this.nodes) {
      if (node.id === START || node.id === END) {
        issues.push(`node id "${node.id}" is reserved`);
      } else if (nodes.has(node.id)) {
        issues.push(`duplicate node "${node.id}"`);
      } else {
        nodes.set(node.id, node);
      }
    }

    const entryEdges = this.edges.filter((edge) => edge.from === START);
    if (entryEdges.length !== 1) {
      issues.push(`expected exactly one edge from ${START}, found ${entryEdges.length}`);
    }
    const entry = entryEdges[0]?.to;
    if (entryEdges.some((edge) => edge.guard)) {
      issues.push(`the edge from ${START} cannot be guarded`);
    }
    if (entry !== undefined && !nodes.has(entry)) {
      issues.push(`entry edge targets undefined node "${entry}"`);
    }

    const outgoing = new Map<string, Edge<InferState<S>>[]>();
    for (const edge of this.edges) {
      if (edge.from === START) continue;
      if (!nodes.has(edge.from)) {
        issues.push(`edge from undefined node "${edge.from}"`);
        continue;
      }
      if (edge.to !== END && !nodes.has(edge.to)) {
        issues.push(`edge ${edge.from} -> ${edge.to} targets an undefined node`);
      }
      const list = outgoing.get(edge.from) ?? [];
      list.push(edge);
      outgoing.set(edge.from, list);
    }

    for (const node of nodes.values()) {
      const edges = outgoing.get(node.id) ?? [];
      const ends: readonly string[] = node.kind === 'router' ? [] : node.ends ?? [];

      for (const target of ends) {
        if (target !== END && !nodes.has(target)) {
          issues.push(`node "${node.id}" declares undefined goto target "${target}"`);
        }
      }

      if (node.terminal) {
        if (edges.some((edge) => edge.to !== END) || ends.some((target) => target !== END)) {
          issues.push(`terminal node "${node.id}" has outgoing edges`);
        }
        continue;
      }

      if (edges.length === 0 && ends.length === 0) {
        issues.push(`node "${node.id}" is not terminal and has no outgoing edges`);
      }
      if (node.kind === 'router' && edges.length === 0) {
        issues.push(`router "${node.id}" has no outgoing edges`);
      }
      if (edges.filter((edge) => !edge.guard).length > 1) {
        issues.push(`node "${node.id}" has more than one unconditional edge`);
      }
    }

    if (entry !== undefined && nodes.has(entry)) {
      const reached = new Set<string>([entry]);
      const queue = [entry];
      while (queue.length > 0) {
        const current = queue.shift();
        if (current === undefined) break;
        const node = nodes.get(current);
        const targets = [
          ...(outgoing.get(current) ?? []).map((edge) => edge.to),
          ...(node && node.kind !== 'router' ? node.ends ?? [] : []),
        ];
        for (const target of targets) {
          if (target !== END && nodes.has(target) && !reached.has(target)) {
            reached.add(target);
            queue.push(target);
          }
        }
      }
      for (const id of nodes.keys()) {
        if (!reached.has(id)) issues.push(`node "${id}" is unreachable from "${entry}"`);
      }
    }

    for (const id of options.interruptAfter ?? []) {
      if (!nodes.has(id)) issues.push(`interruptAfter names undefined node "${id}"`);
    }

    if (
      options.maxSteps !== undefined &&
      (!Number.isInteger(options.maxSteps) || options.maxSteps < 1)
    ) {
      issues.push(`maxSteps must be a positive integer, got ${options.maxSteps}`);
    }

    if (issues.length > 0 || entry === undefined) {
      throw new GraphValidationError(options.id, issues);
    }

    const frozenEdges = new Map<string, readonly Edge<InferState<S>>[]>();
    for (const [from, list] of outgoing) {
      frozenEdges.set(from, Object.freeze([...list]));
    }

    return new FlowGraph({
      id: options.id,
      state: this.schema,
      entry,
      nodes,
      edges: frozenEdges,
      maxSteps: options.maxSteps,
      interruptAfter: options.interruptAfter,
    });
  }
}
