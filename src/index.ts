/**
 * Flowstate Engine
 *
 * Durable execution of conversational flow graphs: typed state with merge
 * policies, a checkpoint after every step, and at most one live executor
 * per session.
 *
 * @packageDocumentation
 */

export * from './graph';
export * from './types/graph.types';
export type * from './types/checkpoint.types';
export * from './constants';
export * from './errors';

// State and graph definitions
export * from './schema/state-schema';
export * from './schema/graph-definition';

// Execution
export * from './node-executor';
export * from './checkpoint-manager';
export * from './session-arbiter';
export * from './engine';

// Persistence
export * from './persistence/serializer';
export * from './persistence/checkpoint-store';
export * from './persistence/lease-store';
export * from './persistence/document-store';
export * from './persistence/memory-adapter';
export * from './persistence/mongo-adapter';

// Models
export * from './model';

// Runtime
export * from './logger';
export * from './config';
export * from './runtime';
export * from './bootstrap';
