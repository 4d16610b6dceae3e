/**
 * Execution engine: drives a session through a compiled graph, committing a
 * checkpoint after every step so any executor can continue the session from
 * its latest checkpoint.
 *
 * One call (`run` or `resume`) holds the session lease for its whole
 * duration. Steps run strictly one after another.
 */

import { randomUUID } from 'node:crypto';

import type {
  Checkpoint,
  CheckpointInterrupt,
  CheckpointStatus,
  ExecutionResult,
  SessionLease,
} from './types/checkpoint.types';
import type { NodeExecution } from './types/graph.types';
import {
  Clock,
  DEFAULT_EXTERNAL_TIMEOUT_MS,
  DEFAULT_LEASE_TTL_MS,
  DEFAULT_MAX_STEPS,
  END,
  START,
  systemClock,
} from './constants';
import {
  CheckpointConflictError,
  ExternalCallFailedError,
  FlowError,
  LeaseLostError,
  NodeContractViolationError,
  NodeExecutionFailedError,
  SessionNotFoundError,
  StateValidationError,
  StepLimitExceededError,
  toCheckpointError,
} from './errors';
import { FlowGraph } from './graph';
import { CheckpointManager } from './checkpoint-manager';
import { CheckpointStore } from './persistence/checkpoint-store';
import { InferState, StateShape } from './schema/state-schema';
import { NodeExecutor } from './node-executor';
import { SessionArbiter } from './session-arbiter';
import { Logger, silentLogger } from './logger';

export type EngineOptions = {
  checkpoints: CheckpointStore;
  arbiter: SessionArbiter;
  logger?: Logger;
  /** Identifies this process in leases; random when absent */
  executorId?: string;
  /** Default step budget per call; a graph's own `maxSteps` wins */
  maxSteps?: number;
  leaseTtlMs?: number;
  /** How long `run`/`resume` wait for a busy session before SessionBusy */
  acquireWaitMs?: number;
  externalTimeoutMs?: number;
  clock?: Clock;
};

export type RunOptions = {
  /** Checked between steps; aborting pauses the session with reason `cancelled` */
  signal?: AbortSignal;
  maxSteps?: number;
};

export type ResumeOptions<T> = RunOptions & {
  /** Merged into the state (and checkpointed) before execution continues */
  input?: Partial<T>;
};

/**
 * Keeps the lease alive while a call runs: renewed before every commit and
 * by a heartbeat every third of the TTL while a node is busy.
 */
class LeaseKeeper {
  private lease: SessionLease;
  private lost: LeaseLostError | null = null;
  private pending: Promise<void> = Promise.resolve();
  private timer: NodeJS.Timeout | undefined;

  constructor(
    lease: SessionLease,
    private readonly arbiter: SessionArbiter,
    private readonly ttlMs: number,
    private readonly logger: Logger
  ) {
    this.lease = lease;
  }

  start(): void {
    this.timer = setInterval(() => {
      this.pending = this.beat();
    }, Math.max(Math.floor(this.ttlMs / 3), 1));
    this.timer.unref();
  }

  assertHeld(): void {
    if (this.lost) throw this.lost;
  }

  /**
   * Extend the lease, confirming it is still ours before a write
   * @throws LeaseLostError
   */
  async renew(): Promise<void> {
    await this.pending;
    this.assertHeld();
    try {
      this.lease = await this.arbiter.renew(this.lease, this.ttlMs);
    } catch (error) {
      if (error instanceof LeaseLostError) this.lost = error;
      throw error;
    }
  }

  async stop(): Promise<void> {
    clearInterval(this.timer);
    await this.pending;
    if (this.lost) return;
    try {
      await this.arbiter.release(this.lease);
    } catch (error) {
      // the lease runs out on its own
      this.logger.warn({ err: error, sessionId: this.lease.sessionId }, 'lease release failed');
    }
  }

  private async beat(): Promise<void> {
    if (this.lost) return;
    try {
      this.lease = await this.arbiter.renew(this.lease, this.ttlMs);
    } catch (error) {
      this.lost =
        error instanceof LeaseLostError
          ? error
          : new LeaseLostError(this.lease.sessionId, this.lease.executorId);
      this.logger.warn({ err: error, sessionId: this.lease.sessionId }, 'lease heartbeat failed');
    }
  }
}

type Drive<S extends StateShape> = {
  sessionId: string;
  graph: FlowGraph<S>;
  manager: CheckpointManager<S>;
  keeper: LeaseKeeper;
  logger: Logger;
  budget: number;
  signal?: AbortSignal;
};

export class ExecutionEngine {
  readonly executorId: string;
  private readonly checkpoints: CheckpointStore;
  private readonly arbiter: SessionArbiter;
  private readonly logger: Logger;
  private readonly maxSteps: number;
  private readonly leaseTtlMs: number;
  private readonly acquireWaitMs: number;
  private readonly externalTimeoutMs: number;
  private readonly clock: Clock;

  constructor(options: EngineOptions) {
    this.checkpoints = options.checkpoints;
    this.arbiter = options.arbiter;
    this.executorId = options.executorId ?? `executor-${randomUUID()}`;
    this.logger = (options.logger ?? silentLogger()).child({
      component: 'engine',
      executorId: this.executorId,
    });
    this.maxSteps = options.maxSteps ?? DEFAULT_MAX_STEPS;
    this.leaseTtlMs = options.leaseTtlMs ?? DEFAULT_LEASE_TTL_MS;
    this.acquireWaitMs = options.acquireWaitMs ?? 0;
    this.externalTimeoutMs = options.externalTimeoutMs ?? DEFAULT_EXTERNAL_TIMEOUT_MS;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Feed input to a session and execute until it completes or pauses.
   *
   * A new session starts at the graph's entry node. A completed session
   * starts a new turn at the entry node with its state carried over; any
   * other session continues at its recorded next node. The input is
   * committed as its own checkpoint before the first step.
   */
  async run<S extends StateShape>(
    sessionId: string,
    input: Partial<InferState<S>>,
    graph: FlowGraph<S>,
    options: RunOptions = {}
  ): Promise<ExecutionResult<InferState<S>>> {
    return this.withSession(sessionId, graph, options, async (drive) => {
      const latest = await drive.manager.latest(sessionId);

      const state = latest ? graph.state.merge(latest.state, input) : graph.state.seed(input);
      const next = !latest || latest.status === 'completed' ? graph.entry : latest.next;

      const start = await drive.manager.commit(sessionId, latest, {
        node: START,
        next,
        status: 'running',
        state,
      });
      drive.logger.info({ seq: start.seq, next, turn: latest ? 'continue' : 'new' }, 'run started');

      return this.drive(drive, start);
    });
  }

  /**
   * Continue a session from its latest checkpoint. Completed and failed
   * sessions are returned as stored without executing anything.
   *
   * @throws SessionNotFoundError when the session has no checkpoint
   */
  async resume<S extends StateShape>(
    sessionId: string,
    graph: FlowGraph<S>,
    options: ResumeOptions<InferState<S>> = {}
  ): Promise<ExecutionResult<InferState<S>>> {
    return this.withSession(sessionId, graph, options, async (drive) => {
      const latest = await drive.manager.latest(sessionId);
      if (!latest) {
        throw new SessionNotFoundError(sessionId);
      }
      if (latest.status === 'completed' || latest.status === 'failed') {
        drive.logger.debug({ seq: latest.seq, status: latest.status }, 'nothing to resume');
        return this.settle(latest, []);
      }

      let from = latest;
      if (options.input !== undefined) {
        from = await drive.manager.commit(sessionId, latest, {
          node: START,
          next: latest.next,
          status: 'running',
          state: graph.state.merge(latest.state, options.input),
        });
      }
      drive.logger.info({ seq: from.seq, next: from.next }, 'resuming');

      return this.drive(drive, from);
    });
  }

  /**
   * Latest checkpoint of a session, or null when it has none
   */
  async inspect<S extends StateShape>(
    sessionId: string,
    graph: FlowGraph<S>
  ): Promise<Checkpoint<InferState<S>> | null> {
    return new CheckpointManager(this.checkpoints, graph, this.clock).latest(sessionId);
  }

  /**
   * Checkpoints of a session, newest first
   */
  async history<S extends StateShape>(
    sessionId: string,
    graph: FlowGraph<S>,
    limit?: number
  ): Promise<Checkpoint<InferState<S>>[]> {
    return new CheckpointManager(this.checkpoints, graph, this.clock).history(sessionId, limit);
  }

  private async withSession<S extends StateShape>(
    sessionId: string,
    graph: FlowGraph<S>,
    options: RunOptions,
    body: (drive: Drive<S>) => Promise<ExecutionResult<InferState<S>>>
  ): Promise<ExecutionResult<InferState<S>>> {
    const lease = await this.arbiter.acquire(sessionId, this.executorId, {
      ttlMs: this.leaseTtlMs,
      waitMs: this.acquireWaitMs,
    });
    const logger = this.logger.child({ sessionId, graphId: graph.id });
    const keeper = new LeaseKeeper(lease, this.arbiter, this.leaseTtlMs, logger);
    keeper.start();

    try {
      return await body({
        sessionId,
        graph,
        manager: new CheckpointManager(this.checkpoints, graph, this.clock),
        keeper,
        logger,
        budget: options.maxSteps ?? graph.maxSteps ?? this.maxSteps,
        signal: options.signal,
      });
    } catch (error) {
      if (error instanceof CheckpointConflictError) {
        logger.fatal({ err: error, seq: error.seq }, 'checkpoint conflict');
      }
      throw error;
    } finally {
      await keeper.stop();
    }
  }

  private async drive<S extends StateShape>(
    drive: Drive<S>,
    from: Checkpoint<InferState<S>>
  ): Promise<ExecutionResult<InferState<S>>> {
    const { sessionId, graph, manager, keeper, logger } = drive;
    const executor = new NodeExecutor(graph, {
      defaultTimeoutMs: this.externalTimeoutMs,
      logger,
    });
    const trace: string[] = [];
    let last = from;
    let steps = 0;

    for (;;) {
      const nodeId = last.next;

      if (nodeId === END) {
        // reached when a pause was requested by the node that routed to END
        await keeper.renew();
        last = await manager.commit(sessionId, last, {
          node: last.node,
          next: END,
          status: 'completed',
          state: last.state,
        });
        return this.settle(last, trace);
      }

      if (drive.signal?.aborted) {
        await keeper.renew();
        last = await manager.commit(sessionId, last, {
          node: last.node,
          next: nodeId,
          status: 'interrupted',
          state: last.state,
          interrupt: { reason: 'cancelled' },
        });
        logger.info({ seq: last.seq, next: nodeId }, 'cancelled');
        return this.settle(last, trace);
      }

      if (steps >= drive.budget) {
        const error = new StepLimitExceededError(drive.budget, {
          sessionId,
          nodeId,
          state: last.state,
        });
        await this.fail(drive, last, nodeId, error);
        throw error;
      }
      steps++;

      let execution: NodeExecution<InferState<S>>;
      let state: InferState<S>;
      let next: string;
      try {
        execution = await executor.execute(nodeId, last.state, { sessionId, step: steps });
        state = this.applyDelta(graph, nodeId, last.state, execution.delta);
        next = this.route(graph, nodeId, execution, state);
      } catch (error) {
        if (error instanceof ExternalCallFailedError) {
          logger.warn({ err: error, nodeId, seq: last.seq }, 'node failed, nothing committed');
          throw new NodeExecutionFailedError(sessionId, nodeId, last.seq, error);
        }
        if (error instanceof FlowError && !error.recoverable) {
          await this.fail(drive, last, nodeId, error);
        }
        throw error;
      }

      trace.push(nodeId);
      const interrupt = this.pauseFor(graph, nodeId, execution);
      const status: CheckpointStatus = interrupt
        ? 'interrupted'
        : next === END
          ? 'completed'
          : 'running';

      await keeper.renew();
      last = await manager.commit(sessionId, last, {
        node: nodeId,
        next,
        status,
        state,
        interrupt,
      });
      logger.debug({ seq: last.seq, nodeId, next, status }, 'step committed');

      if (status !== 'running') {
        logger.info({ seq: last.seq, status, steps }, status === 'completed' ? 'completed' : 'paused');
        return this.settle(last, trace);
      }
    }
  }

  private applyDelta<S extends StateShape>(
    graph: FlowGraph<S>,
    nodeId: string,
    state: InferState<S>,
    delta: Partial<InferState<S>>
  ): InferState<S> {
    try {
      return graph.state.merge(state, delta);
    } catch (error) {
      if (error instanceof StateValidationError) {
        throw new NodeContractViolationError(nodeId, error, { state });
      }
      throw error;
    }
  }

  private route<S extends StateShape>(
    graph: FlowGraph<S>,
    nodeId: string,
    execution: NodeExecution<InferState<S>>,
    state: InferState<S>
  ): string {
    const { routing } = execution;
    switch (routing.type) {
      case 'goto':
        return graph.resolveGoto(nodeId, routing.target);
      case 'candidates':
        return graph.resolveCandidates(nodeId, routing.targets, state);
      case 'edges':
        return graph.isTerminal(nodeId) ? END : graph.resolveNext(nodeId, state);
    }
  }

  private pauseFor<S extends StateShape>(
    graph: FlowGraph<S>,
    nodeId: string,
    execution: NodeExecution<InferState<S>>
  ): CheckpointInterrupt | undefined {
    if (execution.interrupt) {
      return { reason: 'node', value: execution.interrupt.value };
    }
    if (graph.shouldInterruptAfter(nodeId)) {
      return { reason: 'after' };
    }
    return undefined;
  }

  /**
   * Record a fatal failure: the state before the failing node, with the
   * error, so operators can inspect the session
   */
  private async fail<S extends StateShape>(
    drive: Drive<S>,
    last: Checkpoint<InferState<S>>,
    nodeId: string,
    error: FlowError
  ): Promise<void> {
    await drive.keeper.renew();
    const failed = await drive.manager.commit(drive.sessionId, last, {
      node: nodeId,
      next: nodeId,
      status: 'failed',
      state: last.state,
      error: toCheckpointError(error),
    });
    drive.logger.error({ err: error, nodeId, seq: failed.seq }, 'session failed');
  }

  private settle<T>(checkpoint: Checkpoint<T>, trace: readonly string[]): ExecutionResult<T> {
    const base = {
      sessionId: checkpoint.sessionId,
      graphId: checkpoint.graphId,
      node: checkpoint.node,
      next: checkpoint.next,
      seq: checkpoint.seq,
      state: checkpoint.state,
      trace,
    };

    switch (checkpoint.status) {
      case 'completed':
        return { ...base, status: 'completed' };
      case 'interrupted':
        return { ...base, status: 'interrupted', interrupt: checkpoint.interrupt ?? { reason: 'node' } };
      case 'failed':
        return {
          ...base,
          status: 'failed',
          error: checkpoint.error ?? toCheckpointError(new Error('unknown failure')),
        };
      case 'running':
        throw new Error(`checkpoint ${checkpoint.seq} of ${checkpoint.sessionId} is still running`);
    }
  }
}
