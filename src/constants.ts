/**
 * Special node ID representing the start of a flow
 */
export const START = '__START__' as const;

/**
 * Special node ID representing the end of a flow
 */
export const END = '__END__' as const;

/** Steps one `run`/`resume` call may execute before aborting */
export const DEFAULT_MAX_STEPS = 25;

/** Lease lifetime when the caller does not pass one */
export const DEFAULT_LEASE_TTL_MS = 30_000;

/** Deadline for a single external call */
export const DEFAULT_EXTERNAL_TIMEOUT_MS = 60_000;

export const DEFAULT_CHECKPOINT_COLLECTION = 'flow_checkpoints';
export const DEFAULT_LEASE_COLLECTION = 'flow_session_leases';
export const DEFAULT_SESSION_COLLECTION = 'flow_sessions';

/** Milliseconds since epoch; injectable so tests can move time */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();
