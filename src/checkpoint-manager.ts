/**
 * Typed view of a session's checkpoint log for one graph.
 * Allocates sequence numbers and validates stored state against the
 * graph's state schema on the way out.
 */

import type {
  Checkpoint,
  CheckpointInterrupt,
  CheckpointStatus,
} from './types/checkpoint.types';
import { Clock, systemClock } from './constants';
import { CheckpointError, GraphValidationError } from './errors';
import { FlowGraph } from './graph';
import { CheckpointStore } from './persistence/checkpoint-store';
import { InferState, StateShape } from './schema/state-schema';

export type CheckpointDraft<T> = {
  node: string;
  next: string;
  status: CheckpointStatus;
  state: T;
  interrupt?: CheckpointInterrupt;
  error?: CheckpointError;
};

export class CheckpointManager<S extends StateShape> {
  private readonly store: CheckpointStore;
  private readonly graph: FlowGraph<S>;
  private readonly clock: Clock;

  constructor(store: CheckpointStore, graph: FlowGraph<S>, clock: Clock = systemClock) {
    this.store = store;
    this.graph = graph;
    this.clock = clock;
  }

  /**
   * Append the checkpoint following `previous` (seq 1 when there is none)
   */
  async commit(
    sessionId: string,
    previous: Checkpoint<InferState<S>> | null,
    draft: CheckpointDraft<InferState<S>>
  ): Promise<Checkpoint<InferState<S>>> {
    const checkpoint: Checkpoint<InferState<S>> = {
      sessionId,
      seq: (previous?.seq ?? 0) + 1,
      graphId: this.graph.id,
      node: draft.node,
      next: draft.next,
      status: draft.status,
      state: draft.state,
      createdAt: new Date(this.clock()),
    };
    if (draft.interrupt) checkpoint.interrupt = draft.interrupt;
    if (draft.error) checkpoint.error = draft.error;

    await this.store.append(checkpoint);
    return checkpoint;
  }

  async latest(sessionId: string): Promise<Checkpoint<InferState<S>> | null> {
    const checkpoint = await this.store.latest(sessionId);
    return checkpoint ? this.typed(checkpoint) : null;
  }

  async get(sessionId: string, seq: number): Promise<Checkpoint<InferState<S>> | null> {
    const checkpoint = await this.store.get(sessionId, seq);
    return checkpoint ? this.typed(checkpoint) : null;
  }

  /**
   * Newest first
   */
  async history(sessionId: string, limit?: number): Promise<Checkpoint<InferState<S>>[]> {
    const checkpoints = await this.store.history(sessionId, limit);
    return checkpoints.map((checkpoint) => this.typed(checkpoint));
  }

  /**
   * Drop all but the newest `keepLast` checkpoints; the latest always stays
   * @returns How many were removed
   */
  async prune(sessionId: string, keepLast: number): Promise<number> {
    return this.store.prune(sessionId, keepLast);
  }

  async exists(sessionId: string): Promise<boolean> {
    return (await this.store.count(sessionId)) > 0;
  }

  private typed(checkpoint: Checkpoint): Checkpoint<InferState<S>> {
    if (checkpoint.graphId !== this.graph.id) {
      throw new GraphValidationError(this.graph.id, [
        `session ${checkpoint.sessionId} was recorded by graph "${checkpoint.graphId}"`,
      ]);
    }
    return { ...checkpoint, state: this.graph.state.parse(checkpoint.state) };
  }
}
