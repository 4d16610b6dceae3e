import type { z } from 'zod';

import type { ExternalNode, NodeContext, NodeUpdate } from '../types/graph.types';
import { DuplicateToolError } from '../errors';
import { Logger, silentLogger } from '../logger';
import type { ChatMessage } from './model-client';

/** What the model sees of a tool */
export interface ToolSpec<P extends z.AnyZodObject = z.AnyZodObject> {
  name: string;
  description: string;
  parameters: P;
}

export type ToolContext<T> = {
  state: Readonly<T>;
  sessionId: string;
  nodeId: string;
  signal: AbortSignal;
};

export interface ToolDefinition<T, P extends z.AnyZodObject = z.AnyZodObject> extends ToolSpec<P> {
  handler(params: z.infer<P>, context: ToolContext<T>): Promise<string> | string;
}

/** A tool invocation requested by the model */
export type ToolCall = {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
};

export type ToolResult = {
  toolCallId: string;
  name: string;
  status: 'ok' | 'error';
  content: string;
};

export function defineTool<T, P extends z.AnyZodObject>(
  tool: ToolDefinition<T, P>
): ToolDefinition<T, P> {
  return tool;
}

/**
 * Named tools for one state type. Unknown tools, invalid arguments and
 * handler errors come back as `error` results for the model to read; only
 * an aborted call throws.
 */
export class ToolRegistry<T> {
  private readonly tools = new Map<string, ToolDefinition<T>>();
  private readonly logger: Logger;

  constructor(tools: readonly ToolDefinition<T>[] = [], options: { logger?: Logger } = {}) {
    this.logger = (options.logger ?? silentLogger()).child({ component: 'tools' });
    for (const tool of tools) this.register(tool);
  }

  register(tool: ToolDefinition<T>): this {
    if (this.tools.has(tool.name)) {
      throw new DuplicateToolError(tool.name);
    }
    this.tools.set(tool.name, tool);
    return this;
  }

  get(name: string): ToolDefinition<T> | undefined {
    return this.tools.get(name);
  }

  /** Specs to put on a model request */
  specs(): ToolSpec[] {
    return Array.from(this.tools.values(), ({ name, description, parameters }) => ({
      name,
      description,
      parameters,
    }));
  }

  async dispatch(call: ToolCall, context: ToolContext<T>): Promise<ToolResult> {
    const tool = this.tools.get(call.name);
    if (!tool) {
      return this.failed(call, `Tool ${call.name} failed: tool not found`);
    }

    const parsed = tool.parameters.safeParse(call.arguments);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) =>
          issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
        )
        .join('; ');
      return this.failed(call, `Invalid arguments for ${call.name}: ${issues}`);
    }

    try {
      const content = await tool.handler(parsed.data, context);
      this.logger.debug(
        { toolCallId: call.id, tool: call.name, sessionId: context.sessionId },
        'tool completed'
      );
      return { toolCallId: call.id, name: call.name, status: 'ok', content };
    } catch (error) {
      if (context.signal.aborted) throw error;
      this.logger.warn({ err: error, toolCallId: call.id, tool: call.name }, 'tool failed');
      const message = error instanceof Error ? error.message : String(error);
      return this.failed(call, `Tool ${call.name} failed: ${message}`);
    }
  }

  private failed(call: ToolCall, content: string): ToolResult {
    return { toolCallId: call.id, name: call.name, status: 'error', content };
  }
}

/** Tool results as `tool` messages answering the assistant's calls */
export function toolMessages(results: readonly ToolResult[]): ChatMessage[] {
  return results.map((result): ChatMessage => ({
    role: 'tool',
    content: result.content,
    toolCallId: result.toolCallId,
  }));
}

export type ToolNodeOptions<T> = {
  /** Calls still waiting for results, usually those of the last assistant message */
  calls: (state: Readonly<T>) => readonly ToolCall[];
  apply: (state: Readonly<T>, results: ToolResult[], context: NodeContext) => NodeUpdate<T>;
  timeoutMs?: number;
};

/**
 * External node behavior that runs the tool calls a model asked for, one
 * after another, and hands the results to `apply`.
 *
 * @example
 * ```typescript
 * builder.addExternal(
 *   'tools',
 *   toolNode<State>(registry, {
 *     calls: (state) => state.messages.at(-1)?.toolCalls ?? [],
 *     apply: (_state, results) => ({ messages: toolMessages(results) }),
 *   })
 * );
 * ```
 */
export function toolNode<T>(
  registry: ToolRegistry<T>,
  options: ToolNodeOptions<T>
): Pick<ExternalNode<T, ToolResult[]>, 'call' | 'apply' | 'timeoutMs'> {
  return {
    timeoutMs: options.timeoutMs,
    call: async (state, context) => {
      const results: ToolResult[] = [];
      for (const call of options.calls(state)) {
        results.push(
          await registry.dispatch(call, {
            state,
            sessionId: context.sessionId,
            nodeId: context.nodeId,
            signal: context.signal,
          })
        );
      }
      return results;
    },
    apply: (state, results, context) => options.apply(state, results, context),
  };
}

/** Whether the model asked for tools in its last message */
export function hasPendingToolCalls(messages: readonly ChatMessage[]): boolean {
  const last = messages.at(-1);
  return last?.role === 'assistant' && (last.toolCalls?.length ?? 0) > 0;
}
