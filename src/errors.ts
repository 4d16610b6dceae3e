/**
 * Error taxonomy for the flow runtime.
 *
 * Every error raised by the engine, executor, arbiter and stores extends
 * {@link FlowError}. `recoverable` tells the caller whether retrying (or
 * resuming from the last checkpoint) can succeed without operator action.
 */

export type FlowErrorCode =
  | 'SESSION_BUSY'
  | 'SESSION_NOT_FOUND'
  | 'LEASE_LOST'
  | 'NODE_EXECUTION_FAILED'
  | 'EXTERNAL_CALL_FAILED'
  | 'STEP_LIMIT_EXCEEDED'
  | 'NO_ROUTE_MATCHED'
  | 'NODE_CONTRACT_VIOLATION'
  | 'CHECKPOINT_CONFLICT'
  | 'GRAPH_VALIDATION'
  | 'STATE_VALIDATION'
  | 'UNKNOWN_MODEL'
  | 'DUPLICATE_TOOL'
  | 'DOCUMENT_CONFLICT'
  | 'DOCUMENT_NOT_FOUND'
  | 'CONFIGURATION';

/** Where in a session the error happened */
export interface FlowErrorContext {
  sessionId?: string;
  nodeId?: string;
  /** State snapshot at the time of failure, for operators */
  state?: unknown;
}

export class FlowError extends Error {
  readonly code: FlowErrorCode;
  readonly recoverable: boolean;
  readonly context: FlowErrorContext;

  constructor(
    message: string,
    code: FlowErrorCode,
    recoverable: boolean,
    options: { cause?: unknown; context?: FlowErrorContext } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'FlowError';
    this.code = code;
    this.recoverable = recoverable;
    this.context = options.context ?? {};
  }
}

export class SessionBusyError extends FlowError {
  readonly holderId: string;
  readonly expiresAt: Date;

  constructor(sessionId: string, holderId: string, expiresAt: Date) {
    super(
      `Session ${sessionId} is held by ${holderId} until ${expiresAt.toISOString()}`,
      'SESSION_BUSY',
      true,
      { context: { sessionId } }
    );
    this.name = 'SessionBusyError';
    this.holderId = holderId;
    this.expiresAt = expiresAt;
  }
}

export class SessionNotFoundError extends FlowError {
  constructor(sessionId: string) {
    super(`No checkpoint exists for session ${sessionId}`, 'SESSION_NOT_FOUND', false, {
      context: { sessionId },
    });
    this.name = 'SessionNotFoundError';
  }
}

export class LeaseLostError extends FlowError {
  constructor(sessionId: string, executorId: string) {
    super(
      `Executor ${executorId} no longer holds the lease for session ${sessionId}`,
      'LEASE_LOST',
      true,
      { context: { sessionId } }
    );
    this.name = 'LeaseLostError';
  }
}

export type ExternalFailureReason = 'timeout' | 'transport';

export class ExternalCallFailedError extends FlowError {
  readonly reason: ExternalFailureReason;
  readonly timeoutMs?: number;

  constructor(
    nodeId: string,
    reason: ExternalFailureReason,
    options: { cause?: unknown; timeoutMs?: number; sessionId?: string } = {}
  ) {
    const detail =
      reason === 'timeout'
        ? `timed out after ${options.timeoutMs ?? '?'}ms`
        : `failed: ${describeCause(options.cause)}`;
    super(`External call in node ${nodeId} ${detail}`, 'EXTERNAL_CALL_FAILED', true, {
      cause: options.cause,
      context: { nodeId, sessionId: options.sessionId },
    });
    this.name = 'ExternalCallFailedError';
    this.reason = reason;
    this.timeoutMs = options.timeoutMs;
  }
}

/**
 * Recoverable node failure surfaced by the engine. Nothing was committed for
 * the failing node; `resume` re-attempts it.
 */
export class NodeExecutionFailedError extends FlowError {
  readonly lastSeq: number;

  constructor(sessionId: string, nodeId: string, lastSeq: number, cause: unknown) {
    super(
      `Node ${nodeId} failed in session ${sessionId}: ${describeCause(cause)}`,
      'NODE_EXECUTION_FAILED',
      true,
      { cause, context: { sessionId, nodeId } }
    );
    this.name = 'NodeExecutionFailedError';
    this.lastSeq = lastSeq;
  }
}

export class StepLimitExceededError extends FlowError {
  readonly limit: number;

  constructor(limit: number, context: FlowErrorContext) {
    super(
      `Step limit of ${limit} exceeded${context.sessionId ? ` in session ${context.sessionId}` : ''}`,
      'STEP_LIMIT_EXCEEDED',
      false,
      { context }
    );
    this.name = 'StepLimitExceededError';
    this.limit = limit;
  }
}

export class NoRouteMatchedError extends FlowError {
  readonly candidates: readonly string[];

  constructor(nodeId: string, candidates: readonly string[], context: FlowErrorContext = {}) {
    const tried = candidates.length > 0 ? ` (candidates: ${candidates.join(', ')})` : '';
    super(`No route matched after node ${nodeId}${tried}`, 'NO_ROUTE_MATCHED', false, {
      context: { ...context, nodeId },
    });
    this.name = 'NoRouteMatchedError';
    this.candidates = candidates;
  }
}

export class NodeContractViolationError extends FlowError {
  constructor(nodeId: string, cause: unknown, context: FlowErrorContext = {}) {
    super(
      `Node ${nodeId} violated its contract: ${describeCause(cause)}`,
      'NODE_CONTRACT_VIOLATION',
      false,
      { cause, context: { ...context, nodeId } }
    );
    this.name = 'NodeContractViolationError';
  }
}

export class CheckpointConflictError extends FlowError {
  readonly seq: number;

  constructor(sessionId: string, seq: number, detail: string) {
    super(
      `Checkpoint conflict for session ${sessionId} at seq ${seq}: ${detail}`,
      'CHECKPOINT_CONFLICT',
      false,
      { context: { sessionId } }
    );
    this.name = 'CheckpointConflictError';
    this.seq = seq;
  }
}

export class GraphValidationError extends FlowError {
  readonly issues: readonly string[];

  constructor(graphId: string, issues: readonly string[]) {
    super(
      `Graph ${graphId} is invalid:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`,
      'GRAPH_VALIDATION',
      false
    );
    this.name = 'GraphValidationError';
    this.issues = issues;
  }
}

export class StateValidationError extends FlowError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[], options: { cause?: unknown } = {}) {
    super(`Invalid state: ${issues.join('; ')}`, 'STATE_VALIDATION', false, options);
    this.name = 'StateValidationError';
    this.issues = issues;
  }
}

export class UnknownModelError extends FlowError {
  constructor(alias: string, known: readonly string[]) {
    super(
      `Unknown model alias "${alias}" (known: ${known.join(', ') || 'none'})`,
      'UNKNOWN_MODEL',
      false
    );
    this.name = 'UnknownModelError';
  }
}

export class DuplicateToolError extends FlowError {
  constructor(name: string) {
    super(`Tool "${name}" is already registered`, 'DUPLICATE_TOOL', false);
    this.name = 'DuplicateToolError';
  }
}

export class DocumentConflictError extends FlowError {
  constructor(collection: string, id: string) {
    super(`Document ${id} already exists in ${collection}`, 'DOCUMENT_CONFLICT', false);
    this.name = 'DocumentConflictError';
  }
}

export class DocumentNotFoundError extends FlowError {
  constructor(collection: string, id: string) {
    super(`Document ${id} not found in ${collection}`, 'DOCUMENT_NOT_FOUND', false);
    this.name = 'DocumentNotFoundError';
  }
}

export class ConfigurationError extends FlowError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`, 'CONFIGURATION', false);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/** Whether retrying or resuming may succeed */
export function isRecoverable(error: unknown): boolean {
  return error instanceof FlowError && error.recoverable;
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}

/** Shape persisted in a failed or diagnostic checkpoint */
export type CheckpointError = {
  name: string;
  code: string;
  message: string;
  recoverable: boolean;
  nodeId?: string;
};

export function toCheckpointError(error: unknown): CheckpointError {
  if (error instanceof FlowError) {
    return {
      name: error.name,
      code: error.code,
      message: error.message,
      recoverable: error.recoverable,
      nodeId: error.context.nodeId,
    };
  }
  return {
    name: error instanceof Error ? error.name : 'Error',
    code: 'UNKNOWN',
    message: describeCause(error),
    recoverable: false,
  };
}
