import { z } from 'zod';

import {
  DEFAULT_CHECKPOINT_COLLECTION,
  DEFAULT_EXTERNAL_TIMEOUT_MS,
  DEFAULT_LEASE_COLLECTION,
  DEFAULT_LEASE_TTL_MS,
  DEFAULT_MAX_STEPS,
  DEFAULT_SESSION_COLLECTION,
} from './constants';
import { ConfigurationError } from './errors';
import type { LogLevel } from './logger';
import type { ModelAlias } from './model/model-registry';

const flag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const EnvSchema = z
  .object({
    NODE_ENV: z.string().optional(),
    FLOW_STORE: z.enum(['memory', 'mongo']).default('memory'),
    MONGO_URI: z.string().optional(),
    MONGO_DATABASE: z.string().default('flowstate'),
    FLOW_CHECKPOINT_COLLECTION: z.string().default(DEFAULT_CHECKPOINT_COLLECTION),
    FLOW_LEASE_COLLECTION: z.string().default(DEFAULT_LEASE_COLLECTION),
    FLOW_SESSION_COLLECTION: z.string().default(DEFAULT_SESSION_COLLECTION),
    FLOW_EXECUTOR_ID: z.string().optional(),
    FLOW_MAX_STEPS: z.coerce.number().int().positive().default(DEFAULT_MAX_STEPS),
    FLOW_LEASE_TTL_MS: z.coerce.number().int().positive().default(DEFAULT_LEASE_TTL_MS),
    FLOW_EXTERNAL_TIMEOUT_MS: z.coerce
      .number()
      .int()
      .positive()
      .default(DEFAULT_EXTERNAL_TIMEOUT_MS),
    LOG_LEVEL: z
      .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
      .default('info'),
    LOG_PRETTY: flag.optional(),
    OPENAI_API_KEY: z.string().optional(),
    OPENAI_BASE_URL: z.string().optional(),
    MODEL_SMALL: z.string().default('gpt-4o-mini'),
    MODEL_LARGE: z.string().default('gpt-4o'),
    MODEL_PRIVATE: z.string().default('gpt-4o'),
  })
  .superRefine((env, ctx) => {
    if (env.FLOW_STORE === 'mongo' && !env.MONGO_URI) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['MONGO_URI'],
        message: 'required when FLOW_STORE is mongo',
      });
    }
  });

export type StoreConfig =
  | { kind: 'memory' }
  | { kind: 'mongo'; uri: string; database: string };

export interface FlowConfig {
  store: StoreConfig;
  collections: {
    checkpoints: string;
    leases: string;
    sessions: string;
  };
  engine: {
    executorId?: string;
    maxSteps: number;
    leaseTtlMs: number;
    externalTimeoutMs: number;
  };
  logging: {
    level: LogLevel;
    pretty: boolean;
  };
  openai: {
    apiKey?: string;
    baseUrl?: string;
  };
  models: Record<ModelAlias, string>;
}

/**
 * Read the runtime configuration from environment variables.
 * Empty variables count as unset.
 *
 * @throws ConfigurationError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): FlowConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  const vars = parsed.data;

  return {
    store:
      vars.FLOW_STORE === 'mongo' && vars.MONGO_URI
        ? { kind: 'mongo', uri: vars.MONGO_URI, database: vars.MONGO_DATABASE }
        : { kind: 'memory' },
    collections: {
      checkpoints: vars.FLOW_CHECKPOINT_COLLECTION,
      leases: vars.FLOW_LEASE_COLLECTION,
      sessions: vars.FLOW_SESSION_COLLECTION,
    },
    engine: {
      executorId: vars.FLOW_EXECUTOR_ID,
      maxSteps: vars.FLOW_MAX_STEPS,
      leaseTtlMs: vars.FLOW_LEASE_TTL_MS,
      externalTimeoutMs: vars.FLOW_EXTERNAL_TIMEOUT_MS,
    },
    logging: {
      level: vars.LOG_LEVEL,
      pretty: vars.LOG_PRETTY ?? vars.NODE_ENV !== 'production',
    },
    openai: {
      apiKey: vars.OPENAI_API_KEY,
      baseUrl: vars.OPENAI_BASE_URL,
    },
    models: {
      small: vars.MODEL_SMALL,
      large: vars.MODEL_LARGE,
      private: vars.MODEL_PRIVATE,
    },
  };
}
