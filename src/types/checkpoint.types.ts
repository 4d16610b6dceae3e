import type { CheckpointError } from '../errors';

export type CheckpointStatus = 'running' | 'interrupted' | 'completed' | 'failed';

/**
 * Why a session paused:
 * - `node`: a node returned an interrupt command
 * - `after`: the node is listed in the graph's `interruptAfter`
 * - `cancelled`: the caller's abort signal fired between steps
 */
export type InterruptReason = 'node' | 'after' | 'cancelled';

export type CheckpointInterrupt = {
  reason: InterruptReason;
  value?: unknown;
};

/**
 * Immutable snapshot written after every step
 */
export interface Checkpoint<T = unknown> {
  sessionId: string;
  /** Gapless, starting at 1 */
  seq: number;
  graphId: string;
  /** Node whose completion produced this checkpoint (`__START__` for input) */
  node: string;
  /** Node about to run (`__END__` once completed) */
  next: string;
  status: CheckpointStatus;
  state: T;
  interrupt?: CheckpointInterrupt;
  error?: CheckpointError;
  createdAt: Date;
}

/**
 * Exclusive, time-bounded ownership of a session's execution
 */
export interface SessionLease {
  sessionId: string;
  executorId: string;
  /** Distinguishes successive leases by the same executor */
  token: string;
  acquiredAt: Date;
  expiresAt: Date;
}

type ResultBase<T> = {
  sessionId: string;
  graphId: string;
  /** Terminal, interrupting or failing node */
  node: string;
  next: string;
  seq: number;
  state: T;
  /** Nodes executed by this call, in order */
  trace: readonly string[];
};

export type CompletedResult<T> = ResultBase<T> & { status: 'completed' };

export type InterruptedResult<T> = ResultBase<T> & {
  status: 'interrupted';
  interrupt: CheckpointInterrupt;
};

export type FailedResult<T> = ResultBase<T> & {
  status: 'failed';
  error: CheckpointError;
};

export type ExecutionResult<T> = CompletedResult<T> | InterruptedResult<T> | FailedResult<T>;
