import type { END } from '../constants';

export type NodeKind = 'transform' | 'external' | 'router';

/**
 * Context handed to every node invocation
 */
export type NodeContext = {
  sessionId: string;
  nodeId: string;
  /** 1-based step number inside the current run/resume call */
  step: number;
};

export type ExternalCallContext = NodeContext & {
  /** Aborted when the call's deadline passes */
  signal: AbortSignal;
  timeoutMs: number;
};

/**
 * Explicit instruction returned by a node: a delta plus optional routing or
 * a pause request. Plain partial states are deltas routed by edges.
 */
export class Command<T> {
  readonly update?: Partial<T>;
  /** One target, or several candidates narrowed by edge guards */
  readonly goto?: string | readonly string[];
  /** Present when the node asks to pause for outside input */
  readonly interrupt?: { value: unknown };

  constructor(init: {
    update?: Partial<T>;
    goto?: string | readonly string[];
    interrupt?: { value: unknown };
  }) {
    this.update = init.update;
    this.goto = init.goto;
    this.interrupt = init.interrupt;
  }
}

/** Pause after this node commits; `value` is handed back to the caller */
export function interrupt<T>(value: unknown, update?: Partial<T>): Command<T> {
  return new Command<T>({ update, interrupt: { value } });
}

/** Route to `target` (or the first matching candidate) after applying `update` */
export function goto<T>(target: string | readonly string[], update?: Partial<T>): Command<T> {
  return new Command<T>({ update, goto: target });
}

export type NodeUpdate<T> = Partial<T> | Command<T> | void;

type NodeBase = {
  id: string;
  /** Loop ends after this node; it may not have outgoing edges */
  terminal?: boolean;
  /** Targets reachable through `goto` without a declared edge */
  ends?: readonly string[];
  description?: string;
};

/**
 * Deterministic, synchronous function of the state. Throwing is a defect.
 */
export type TransformNode<T> = NodeBase & {
  kind: 'transform';
  run(state: Readonly<T>, context: NodeContext): NodeUpdate<T>;
};

/**
 * One external invocation (model or tool) under a deadline, then a pure
 * `apply` turning the response into an update.
 */
export type ExternalNode<T, R = unknown> = NodeBase & {
  kind: 'external';
  timeoutMs?: number;
  call(state: Readonly<T>, context: ExternalCallContext): Promise<R>;
  apply(state: Readonly<T>, response: R, context: NodeContext): NodeUpdate<T>;
};

/**
 * Chooses the next node without touching state. Without `route`, the
 * outgoing edge guards decide.
 */
export type RouterNode<T> = Omit<NodeBase, 'ends'> & {
  kind: 'router';
  route?(state: Readonly<T>, context: NodeContext): string | readonly string[];
};

export type FlowNode<T> = TransformNode<T> | ExternalNode<T> | RouterNode<T>;

export type Guard<T> = (state: Readonly<T>) => boolean;

export type EdgeTarget = string | typeof END;

export type Edge<T> = {
  from: string;
  to: EdgeTarget;
  /** Unconditional when absent */
  guard?: Guard<T>;
  label?: string;
};

/**
 * What the executor tells the engine about where to go next
 */
export type Routing =
  | { type: 'edges' }
  | { type: 'goto'; target: string }
  | { type: 'candidates'; targets: readonly string[] };

export type NodeExecution<T> = {
  delta: Partial<T>;
  routing: Routing;
  interrupt?: { value: unknown };
};
