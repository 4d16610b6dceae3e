import type {
  ExternalNode,
  FlowNode,
  NodeContext,
  NodeExecution,
  NodeUpdate,
  RouterNode,
  TransformNode,
} from './types/graph.types';
import { Command } from './types/graph.types';

import { DEFAULT_EXTERNAL_TIMEOUT_MS } from './constants';
import { FlowGraph } from './graph';
import { InferState, StateShape } from './schema/state-schema';
import { ExternalCallFailedError, NodeContractViolationError } from './errors';
import { Logger, silentLogger } from './logger';

export type ExecutionContext = {
  sessionId: string;
  step: number;
};

function isThenable(value: unknown): boolean {
  return (
    typeof value === 'object' &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}

/**
 * Runs one node of a graph against the current state and reports the delta
 * and routing decision. Dispatches on the node kind; never merges or
 * persists anything itself.
 */
export class NodeExecutor<S extends StateShape> {
  private readonly graph: FlowGraph<S>;
  private readonly defaultTimeoutMs: number;
  private readonly logger: Logger;

  constructor(
    graph: FlowGraph<S>,
    options: { defaultTimeoutMs?: number; logger?: Logger } = {}
  ) {
    this.graph = graph;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_EXTERNAL_TIMEOUT_MS;
    this.logger = options.logger ?? silentLogger();
  }

  async execute(
    nodeId: string,
    state: InferState<S>,
    context: ExecutionContext
  ): Promise<NodeExecution<InferState<S>>> {
    const node: FlowNode<InferState<S>> | undefined = this.graph.node(nodeId);
    if (!node) {
      throw new NodeContractViolationError(nodeId, new Error('node is not defined in the graph'), {
        sessionId: context.sessionId,
        state,
      });
    }

    const frozen: Readonly<InferState<S>> = Object.freeze({ ...state });
    const nodeContext: NodeContext = { sessionId: context.sessionId, nodeId, step: context.step };

    switch (node.kind) {
      case 'transform':
        return this.runTransform(node, frozen, nodeContext);
      case 'external':
        return this.runExternal(node, frozen, nodeContext);
      case 'router':
        return this.runRouter(node, frozen, nodeContext);
    }
  }

  private runTransform(
    node: TransformNode<InferState<S>>,
    state: Readonly<InferState<S>>,
    context: NodeContext
  ): NodeExecution<InferState<S>> {
    const update = this.guarded(context, state, () => node.run(state, context));
    if (isThenable(update)) {
      // a late rejection of the refused promise is only logged
      Promise.resolve(update).catch((error: unknown) => {
        this.logger.warn(
          { err: error, sessionId: context.sessionId, nodeId: node.id },
          'refused async transform rejected'
        );
      });
      throw new NodeContractViolationError(
        node.id,
        new Error('transform nodes must return synchronously'),
        { sessionId: context.sessionId, state }
      );
    }
    return this.normalize(update, context, state);
  }

  private async runExternal(
    node: ExternalNode<InferState<S>>,
    state: Readonly<InferState<S>>,
    context: NodeContext
  ): Promise<NodeExecution<InferState<S>>> {
    const timeoutMs = node.timeoutMs ?? this.defaultTimeoutMs;
    const controller = new AbortController();
    const started = Date.now();

    const response = await new Promise<unknown>((resolve, reject) => {
      const timer = setTimeout(() => {
        controller.abort();
        reject(
          new ExternalCallFailedError(node.id, 'timeout', {
            timeoutMs,
            sessionId: context.sessionId,
          })
        );
      }, timeoutMs);

      Promise.resolve()
        .then(() => node.call(state, { ...context, signal: controller.signal, timeoutMs }))
        .then(
          (value) => {
            clearTimeout(timer);
            resolve(value);
          },
          (error: unknown) => {
            clearTimeout(timer);
            reject(
              error instanceof ExternalCallFailedError
                ? error
                : new ExternalCallFailedError(node.id, 'transport', {
                    cause: error,
                    sessionId: context.sessionId,
                  })
            );
          }
        );
    });

    this.logger.debug(
      { sessionId: context.sessionId, nodeId: node.id, durationMs: Date.now() - started },
      'external call completed'
    );

    const update = this.guarded(context, state, () => node.apply(state, response, context));
    return this.normalize(update, context, state);
  }

  private runRouter(
    node: RouterNode<InferState<S>>,
    state: Readonly<InferState<S>>,
    context: NodeContext
  ): NodeExecution<InferState<S>> {
    const route = node.route;
    if (!route) {
      return { delta: {}, routing: { type: 'edges' } };
    }
    const choice = this.guarded(context, state, () => route.call(node, state, context));
    const targets = typeof choice === 'string' ? [choice] : [...choice];
    return { delta: {}, routing: { type: 'candidates', targets } };
  }

  private normalize(
    update: NodeUpdate<InferState<S>>,
    context: NodeContext,
    state: Readonly<InferState<S>>
  ): NodeExecution<InferState<S>> {
    if (!update) {
      return { delta: {}, routing: { type: 'edges' } };
    }

    if (update instanceof Command) {
      const delta = update.update ?? {};
      this.assertDelta(delta, context, state);
      const execution: NodeExecution<InferState<S>> = {
        delta,
        routing:
          update.goto === undefined
            ? { type: 'edges' }
            : typeof update.goto === 'string'
              ? { type: 'goto', target: update.goto }
              : { type: 'candidates', targets: [...update.goto] },
      };
      if (update.interrupt) execution.interrupt = update.interrupt;
      return execution;
    }

    this.assertDelta(update, context, state);
    return { delta: update, routing: { type: 'edges' } };
  }

  private assertDelta(delta: unknown, context: NodeContext, state: unknown): void {
    if (typeof delta !== 'object' || delta === null || Array.isArray(delta)) {
      throw new NodeContractViolationError(
        context.nodeId,
        new Error('a node update must be an object of state fields'),
        { sessionId: context.sessionId, state }
      );
    }
  }

  /** Any exception from node code is a contract violation */
  private guarded<R>(context: NodeContext, state: unknown, fn: () => R): R {
    try {
      return fn();
    } catch (error) {
      throw new NodeContractViolationError(context.nodeId, error, {
        sessionId: context.sessionId,
        state,
      });
    }
  }
}
