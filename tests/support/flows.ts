import { z } from 'zod';

import {
  ExecutionEngine,
  FlowGraphBuilder,
  MemoryCheckpointStore,
  MemoryLeaseStore,
  SessionArbiter,
  START,
  defineStateSchema,
} from '../../src';
import type { Clock, EngineOptions } from '../../src';

export const SupportState = z.object({
  text: z.string().default(''),
  intent: z.string().optional(),
  reply: z.string().optional(),
  log: z.array(z.string()).default([]),
});

export type SupportStateType = z.infer<typeof SupportState>;

export const supportSchema = defineStateSchema(SupportState, {
  text: 'overwrite',
  intent: 'overwrite',
  reply: 'overwrite',
  log: 'append',
});

export const FAQ_REPLY = 'Use the reset link on the sign-in page.';
export const ESCALATE_REPLY = 'Connecting you to an agent.';

/**
 * classify -> respond when the intent is "faq", otherwise escalate
 */
export function buildSupportGraph(options: { interruptAfter?: string[] } = {}) {
  return new FlowGraphBuilder(supportSchema)
    .addTransform('classify', (state) => ({
      intent: /password|reset/i.test(state.text) ? 'faq' : 'other',
      log: ['classify'],
    }))
    .addTransform('respond', () => ({ reply: FAQ_REPLY, log: ['respond'] }), { terminal: true })
    .addTransform('escalate', () => ({ reply: ESCALATE_REPLY, log: ['escalate'] }), {
      terminal: true,
    })
    .addEdge(START, 'classify')
    .addEdge('classify', 'respond', (state) => state.intent === 'faq')
    .addEdge('classify', 'escalate')
    .compile({ id: 'support', interruptAfter: options.interruptAfter });
}

/** Manually advanced clock */
export function manualClock(start = Date.UTC(2024, 0, 1)): Clock & { advance(ms: number): void } {
  let now = start;
  const clock = () => now;
  return Object.assign(clock, {
    advance(ms: number) {
      now += ms;
    },
  });
}

export function createMemoryEngine(
  options: Omit<Partial<EngineOptions>, 'checkpoints' | 'arbiter'> = {}
) {
  const checkpoints = new MemoryCheckpointStore();
  const leases = new MemoryLeaseStore();
  const arbiter = new SessionArbiter(leases, { clock: options.clock });
  const engine = new ExecutionEngine({
    checkpoints,
    arbiter,
    executorId: 'executor-a',
    ...options,
  });
  return { checkpoints, leases, arbiter, engine };
}

/** Promise that a test resolves by hand */
export function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
