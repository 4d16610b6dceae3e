import * as readline from 'node:readline/promises';
import { z } from 'zod';

import {
  FlowGraphBuilder,
  ModelClient,
  ModelRegistry,
  START,
  bootstrap,
  channelInstructions,
  defineStateSchema,
  interrupt,
  modelNode,
} from '../src';

/**
 * Interactive support desk on the terminal.
 *
 * Billing questions pause to collect an account number; everything else
 * goes straight to the answer node. With OPENAI_API_KEY set the answer
 * comes from the "small" model, otherwise a canned reply is used.
 * Settings come from `.env` (see `loadConfig`).
 */

const DeskState = z.object({
  channel: z.enum(['web', 'websocket', 'chat', 'sms', 'voice']).default('chat'),
  messages: z
    .array(z.object({ role: z.enum(['system', 'user', 'assistant']), content: z.string() }))
    .default([]),
  intent: z.enum(['billing', 'general']).optional(),
  account: z.string().optional(),
});

type Desk = z.infer<typeof DeskState>;

const desk = defineStateSchema(DeskState, {
  channel: 'overwrite',
  messages: 'append',
  intent: 'overwrite',
  account: 'overwrite',
});

const ACCOUNT_QUESTION = 'Sure, what is your account number?';

function lastUserText(state: Readonly<Desk>): string {
  return state.messages.filter((m) => m.role === 'user').at(-1)?.content ?? '';
}

function buildDeskGraph(model: ModelClient | null, models: ModelRegistry) {
  const builder = new FlowGraphBuilder(desk)
    .addTransform('classify', (state) => ({
      intent: /bill|invoice|charge|refund/i.test(lastUserText(state)) ? 'billing' : 'general',
    }))
    .addTransform('ask_account', () =>
      interrupt<Desk>(ACCOUNT_QUESTION, {
        messages: [{ role: 'assistant', content: ACCOUNT_QUESTION }],
      })
    )
    .addTransform('record_account', (state) => ({ account: lastUserText(state).trim() }));

  if (model) {
    builder.addExternal(
      'answer',
      modelNode<Desk>(model, {
        model: models.resolve('small'),
        system: (state) =>
          `You are a concise support assistant.${state.account ? ` The customer's account is ${state.account}.` : ''}${channelInstructions(state.channel)}`,
        messages: (state) => state.messages,
        apply: (_state, reply) => ({ messages: [{ role: 'assistant', content: reply.content }] }),
      }),
      { terminal: true }
    );
  } else {
    builder.addTransform(
      'answer',
      (state) => ({
        messages: [
          {
            role: 'assistant',
            content: `No model configured. You asked about ${state.intent ?? 'something'}: "${lastUserText(state)}"`,
          },
        ],
      }),
      { terminal: true }
    );
  }

  return builder
    .addEdge(START, 'classify')
    .addEdge('classify', 'ask_account', (state) => state.intent === 'billing' && !state.account)
    .addEdge('classify', 'answer')
    .addEdge('ask_account', 'record_account')
    .addEdge('record_account', 'answer')
    .compile({ id: 'support-desk' });
}

async function main() {
  const runtime = await bootstrap();
  const graph = buildDeskGraph(runtime.model, runtime.models);
  const sessionId = `terminal-${process.pid}`;
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });

  console.log('=== Support desk (empty line to quit) ===\n');

  try {
    for (;;) {
      const line = (await rl.question('you> ')).trim();
      if (!line) break;

      const result = await runtime.engine.run(
        sessionId,
        { messages: [{ role: 'user', content: line }] },
        graph
      );

      const reply = result.state.messages.at(-1);
      if (reply?.role === 'assistant') console.log(`desk> ${reply.content}`);
      runtime.logger.debug({ status: result.status, trace: result.trace, seq: result.seq }, 'turn finished');
    }
  } finally {
    rl.close();
    await runtime.close();
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
