/**
 * Node executor tests
 * One test group per node kind plus the failure taxonomy
 */

import { describe, it, expect } from '@jest/globals';
import pino from 'pino';
import {
  Command,
  ExternalCallFailedError,
  FlowGraphBuilder,
  NodeContractViolationError,
  NodeExecutor,
  START,
  goto,
  interrupt,
} from '../src';
import { supportSchema, SupportStateType } from './support/flows';

const context = { sessionId: 'session-1', step: 1 };
const state = supportSchema.createInitialState({ text: 'hello' });

function single(
  configure: (builder: FlowGraphBuilder<typeof supportSchema.zod>) => FlowGraphBuilder<typeof supportSchema.zod>
) {
  const builder = configure(new FlowGraphBuilder(supportSchema))
    .addTransform('done', () => ({}), { terminal: true })
    .addEdge(START, 'node')
    .addEdge('node', 'done');
  return builder.compile({ id: 'single' });
}

describe('NodeExecutor', () => {
  describe('Transform nodes', () => {
    it('should return the delta with edge routing', async () => {
      const graph = single((b) => b.addTransform('node', (s) => ({ reply: s.text.toUpperCase() })));
      const execution = await new NodeExecutor(graph).execute('node', state, context);

      expect(execution).toEqual({ delta: { reply: 'HELLO' }, routing: { type: 'edges' } });
    });

    it('should treat no return value as an empty delta', async () => {
      const graph = single((b) => b.addTransform('node', () => undefined));
      const execution = await new NodeExecutor(graph).execute('node', state, context);

      expect(execution).toEqual({ delta: {}, routing: { type: 'edges' } });
    });

    it('should map a goto command to explicit routing', async () => {
      const graph = single((b) => b.addTransform('node', () => goto('done', { intent: 'faq' })));
      const execution = await new NodeExecutor(graph).execute('node', state, context);

      expect(execution).toEqual({
        delta: { intent: 'faq' },
        routing: { type: 'goto', target: 'done' },
      });
    });

    it('should map several goto targets to candidates', async () => {
      const graph = single((b) =>
        b.addTransform('node', () => new Command<SupportStateType>({ goto: ['elsewhere', 'done'] }))
      );
      const execution = await new NodeExecutor(graph).execute('node', state, context);

      expect(execution.routing).toEqual({ type: 'candidates', targets: ['elsewhere', 'done'] });
    });

    it('should pass interrupt requests through', async () => {
      const graph = single((b) =>
        b.addTransform('node', () => interrupt({ question: 'Which account?' }, { reply: 'asking' }))
      );
      const execution = await new NodeExecutor(graph).execute('node', state, context);

      expect(execution).toEqual({
        delta: { reply: 'asking' },
        routing: { type: 'edges' },
        interrupt: { value: { question: 'Which account?' } },
      });
    });

    it('should report a throwing transform as a contract violation', async () => {
      const graph = single((b) =>
        b.addTransform('node', () => {
          throw new Error('boom');
        })
      );

      await expect(new NodeExecutor(graph).execute('node', state, context)).rejects.toThrow(
        NodeContractViolationError
      );
    });

    it('should hand nodes a frozen copy of the state', async () => {
      const graph = single((b) =>
        b.addTransform('node', (s) => {
          Reflect.set(s, 'reply', 'mutated');
          return {};
        })
      );
      await new NodeExecutor(graph).execute('node', state, context);

      expect(state.reply).toBeUndefined();
    });

    it('should reject an unknown node id', async () => {
      const graph = single((b) => b.addTransform('node', () => ({})));

      await expect(new NodeExecutor(graph).execute('ghost', state, context)).rejects.toThrow(
        'Node ghost violated its contract: node is not defined in the graph'
      );
    });

    it('should refuse an async transform and log its later rejection', async () => {
      const lines: Record<string, unknown>[] = [];
      const logger = pino(
        { level: 'warn' },
        { write: (line: string) => lines.push(JSON.parse(line)) }
      );
      const late: () => void = async () => {
        throw new Error('late failure');
      };
      const graph = single((b) => b.addTransform('node', late));

      await expect(
        new NodeExecutor(graph, { logger }).execute('node', state, context)
      ).rejects.toThrow(
        'Node node violated its contract: transform nodes must return synchronously'
      );
      await new Promise((resolve) => setImmediate(resolve));

      expect(lines).toHaveLength(1);
      expect(lines[0]).toMatchObject({
        level: 40,
        sessionId: 'session-1',
        nodeId: 'node',
        err: { message: 'late failure' },
        msg: 'refused async transform rejected',
      });
    });
  });

  describe('External nodes', () => {
    it('should apply the response of a successful call', async () => {
      const graph = single((b) =>
        b.addExternal<string>('node', {
          call: async (s) => `echo:${s.text}`,
          apply: (_s, response) => ({ reply: response }),
        })
      );
      const execution = await new NodeExecutor(graph).execute('node', state, context);

      expect(execution.delta).toEqual({ reply: 'echo:hello' });
    });

    it('should fail with a timeout when the call outlives its deadline', async () => {
      let aborted = false;
      const graph = single((b) =>
        b.addExternal<string>('node', {
          timeoutMs: 20,
          call: (_s, ctx) =>
            new Promise<string>((resolve) => {
              ctx.signal.addEventListener('abort', () => {
                aborted = true;
              });
              setTimeout(() => resolve('late'), 200);
            }),
          apply: (_s, response) => ({ reply: response }),
        })
      );

      const failure = await new NodeExecutor(graph)
        .execute('node', state, context)
        .then(
          () => null,
          (error: unknown) => error
        );

      expect(failure).toBeInstanceOf(ExternalCallFailedError);
      if (failure instanceof ExternalCallFailedError) {
        expect(failure.reason).toBe('timeout');
        expect(failure.timeoutMs).toBe(20);
        expect(failure.recoverable).toBe(true);
      }
      expect(aborted).toBe(true);
    });

    it('should use the executor default deadline when the node has none', async () => {
      const graph = single((b) =>
        b.addExternal<string>('node', {
          call: () => new Promise<string>((resolve) => setTimeout(() => resolve('late'), 200)),
          apply: (_s, response) => ({ reply: response }),
        })
      );

      await expect(
        new NodeExecutor(graph, { defaultTimeoutMs: 10 }).execute('node', state, context)
      ).rejects.toThrow('External call in node node timed out after 10ms');
    });

    it('should classify a rejected call as a transport failure', async () => {
      const graph = single((b) =>
        b.addExternal<string>('node', {
          call: async () => {
            throw new Error('connection reset');
          },
          apply: (_s, response) => ({ reply: response }),
        })
      );

      await expect(new NodeExecutor(graph).execute('node', state, context)).rejects.toMatchObject({
        name: 'ExternalCallFailedError',
        reason: 'transport',
        message: 'External call in node node failed: connection reset',
      });
    });

    it('should report a throwing apply as a contract violation', async () => {
      const graph = single((b) =>
        b.addExternal<string>('node', {
          call: async () => 'ok',
          apply: () => {
            throw new Error('bad response shape');
          },
        })
      );

      await expect(new NodeExecutor(graph).execute('node', state, context)).rejects.toThrow(
        NodeContractViolationError
      );
    });
  });

  describe('Router nodes', () => {
    const routed = (route?: () => string | string[]) =>
      new FlowGraphBuilder(supportSchema)
        .addRouter('pick', route)
        .addTransform('left', () => ({}), { terminal: true })
        .addTransform('right', () => ({}), { terminal: true })
        .addEdge(START, 'pick')
        .addEdge('pick', 'left', (s) => s.text === 'left')
        .addEdge('pick', 'right')
        .compile({ id: 'routed' });

    it('should defer to edges without a route function', async () => {
      const execution = await new NodeExecutor(routed()).execute('pick', state, context);
      expect(execution).toEqual({ delta: {}, routing: { type: 'edges' } });
    });

    it('should return the chosen candidates without a delta', async () => {
      const execution = await new NodeExecutor(routed(() => ['left', 'right'])).execute(
        'pick',
        state,
        context
      );
      expect(execution).toEqual({
        delta: {},
        routing: { type: 'candidates', targets: ['left', 'right'] },
      });
    });

    it('should wrap a single choice as one candidate', async () => {
      const execution = await new NodeExecutor(routed(() => 'right')).execute('pick', state, context);
      expect(execution.routing).toEqual({ type: 'candidates', targets: ['right'] });
    });
  });
});
