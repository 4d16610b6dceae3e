import type { ExternalNode, NodeContext, NodeUpdate } from '../types/graph.types';
import { ChatMessage, ModelClient, ModelReply } from './model-client';
import type { ToolSpec } from './tools';

export type ModelNodeOptions<T> = {
  /** Provider model name; resolve aliases through a ModelRegistry first */
  model: string;
  messages: (state: Readonly<T>) => ChatMessage[];
  system?: string | ((state: Readonly<T>) => string);
  apply: (state: Readonly<T>, reply: ModelReply, context: NodeContext) => NodeUpdate<T>;
  timeoutMs?: number;
  temperature?: number;
  maxTokens?: number;
  /** Tools the model may ask for; see `toolNode` for running them */
  tools?: readonly ToolSpec[];
};

/**
 * External node behavior that sends the state's conversation to a model.
 * Pass the result to `addExternal` or list it in a catalog.
 *
 * @example
 * ```typescript
 * builder.addExternal(
 *   'answer',
 *   modelNode<State>(client, {
 *     model: registry.resolve('small'),
 *     system: (state) => `Be brief.${channelInstructions(state.channel)}`,
 *     messages: (state) => state.messages,
 *     apply: (_state, reply) => ({ messages: [{ role: 'assistant', content: reply.content }] }),
 *   })
 * );
 * ```
 */
export function modelNode<T>(
  client: ModelClient,
  options: ModelNodeOptions<T>
): Pick<ExternalNode<T, ModelReply>, 'call' | 'apply' | 'timeoutMs'> {
  return {
    timeoutMs: options.timeoutMs,
    call: (state, context) =>
      client.complete(
        {
          model: options.model,
          messages: options.messages(state),
          system: typeof options.system === 'function' ? options.system(state) : options.system,
          temperature: options.temperature,
          maxTokens: options.maxTokens,
          tools: options.tools,
        },
        { signal: context.signal, timeoutMs: context.timeoutMs }
      ),
    apply: (state, reply, context) => options.apply(state, reply, context),
  };
}
