/**
 * Process-wide wiring: one logger, one set of stores, one engine.
 * Build it once at startup and share it between requests.
 */

import { MongoClient } from 'mongodb';

import { FlowConfig, loadConfig } from './config';
import { ExecutionEngine } from './engine';
import { createLogger, Logger } from './logger';
import { CheckpointStore } from './persistence/checkpoint-store';
import { LeaseStore } from './persistence/lease-store';
import {
  DocumentStore,
  MemoryDocumentStore,
  SessionRecord,
  SessionRecordSchema,
} from './persistence/document-store';
import { MemoryCheckpointStore, MemoryLeaseStore } from './persistence/memory-adapter';
import {
  CheckpointDocument,
  LeaseDocument,
  MongoCheckpointStore,
  MongoDocumentStore,
  MongoLeaseStore,
  StoredDocument,
} from './persistence/mongo-adapter';
import { SessionArbiter } from './session-arbiter';
import { ModelClient } from './model/model-client';
import { ModelRegistry, createModelRegistry } from './model/model-registry';
import { OpenAIModelClient } from './model/openai-client';

export interface FlowRuntime {
  config: FlowConfig;
  logger: Logger;
  checkpoints: CheckpointStore;
  leases: LeaseStore;
  sessions: DocumentStore<SessionRecord>;
  arbiter: SessionArbiter;
  engine: ExecutionEngine;
  models: ModelRegistry;
  /** Null when no OpenAI key is configured and none was injected */
  model: ModelClient | null;
  close(): Promise<void>;
}

export type RuntimeOverrides = {
  logger?: Logger;
  model?: ModelClient;
  mongoClient?: MongoClient;
};

type Stores = Pick<FlowRuntime, 'checkpoints' | 'leases' | 'sessions'> & {
  close(): Promise<void>;
};

async function connectStores(
  config: FlowConfig,
  overrides: RuntimeOverrides,
  logger: Logger
): Promise<Stores> {
  if (config.store.kind === 'memory') {
    return {
      checkpoints: new MemoryCheckpointStore(),
      leases: new MemoryLeaseStore(),
      sessions: new MemoryDocumentStore('sessions', SessionRecordSchema),
      close: async () => {},
    };
  }

  const client = overrides.mongoClient ?? new MongoClient(config.store.uri);
  try {
    await client.connect();
    const db = client.db(config.store.database);
    logger.info({ database: config.store.database }, 'connected to MongoDB');

    const checkpoints = new MongoCheckpointStore(
      db.collection<CheckpointDocument>(config.collections.checkpoints)
    );
    const leases = new MongoLeaseStore(db.collection<LeaseDocument>(config.collections.leases));
    await checkpoints.ensureIndexes();
    await leases.ensureIndexes();

    return {
      checkpoints,
      leases,
      sessions: new MongoDocumentStore(
        'sessions',
        db.collection<StoredDocument>(config.collections.sessions),
        SessionRecordSchema
      ),
      close: () => client.close(),
    };
  } catch (error) {
    logger.error({ err: error, database: config.store.database }, 'MongoDB setup failed');
    await client.close().catch((closeError: unknown) => {
      logger.warn({ err: closeError }, 'closing MongoDB client failed');
    });
    throw error;
  }
}

/**
 * Build the runtime from configuration, by default read from the
 * environment. `.env` files are the caller's concern (see `bootstrap`).
 */
export async function createFlowRuntime(
  config: FlowConfig = loadConfig(),
  overrides: RuntimeOverrides = {}
): Promise<FlowRuntime> {
  const logger =
    overrides.logger ??
    createLogger({ level: config.logging.level, pretty: config.logging.pretty, name: 'flowstate' });

  const stores = await connectStores(config, overrides, logger);
  const arbiter = new SessionArbiter(stores.leases, {
    logger,
    defaultTtlMs: config.engine.leaseTtlMs,
  });
  const engine = new ExecutionEngine({
    checkpoints: stores.checkpoints,
    arbiter,
    logger,
    executorId: config.engine.executorId,
    maxSteps: config.engine.maxSteps,
    leaseTtlMs: config.engine.leaseTtlMs,
    externalTimeoutMs: config.engine.externalTimeoutMs,
  });

  const model =
    overrides.model ??
    (config.openai.apiKey
      ? new OpenAIModelClient({
          apiKey: config.openai.apiKey,
          baseUrl: config.openai.baseUrl,
          logger,
        })
      : null);

  logger.info(
    { store: config.store.kind, executorId: engine.executorId, model: model !== null },
    'flow runtime ready'
  );

  return {
    config,
    logger,
    checkpoints: stores.checkpoints,
    leases: stores.leases,
    sessions: stores.sessions,
    arbiter,
    engine,
    models: createModelRegistry(config.models),
    model,
    close: async () => {
      await stores.close();
      logger.info('flow runtime closed');
    },
  };
}
