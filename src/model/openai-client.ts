import OpenAI from 'openai';
import { zodFunction } from 'openai/helpers/zod';
import { z } from 'zod';

import { Logger, silentLogger } from '../logger';
import { cleanResponse, contentText } from './clean-response';
import {
  ChatMessage,
  CompleteOptions,
  ModelClient,
  ModelReply,
  ModelRequest,
  withSystemPrompt,
} from './model-client';
import type { ToolCall, ToolSpec } from './tools';

type OpenAIMessage = OpenAI.Chat.Completions.ChatCompletionMessageParam;

type OpenAIToolCall = OpenAI.Chat.Completions.ChatCompletionMessageToolCall;

/** The part of the SDK client this adapter calls */
export interface ChatCompletionsApi {
  chat: {
    completions: {
      create(
        body: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming,
        options?: { signal?: AbortSignal; timeout?: number }
      ): Promise<OpenAI.Chat.Completions.ChatCompletion>;
    };
  };
}

export function toOpenAIMessages(messages: readonly ChatMessage[]): OpenAIMessage[] {
  return messages.map((message): OpenAIMessage => {
    switch (message.role) {
      case 'system':
        return { role: 'system', content: message.content };
      case 'user':
        return { role: 'user', content: message.content };
      case 'assistant':
        return message.toolCalls && message.toolCalls.length > 0
          ? {
              role: 'assistant',
              content: message.content,
              tool_calls: message.toolCalls.map(
                (call): OpenAIToolCall => ({
                  id: call.id,
                  type: 'function',
                  function: { name: call.name, arguments: JSON.stringify(call.arguments) },
                })
              ),
            }
          : { role: 'assistant', content: message.content };
      case 'tool':
        return {
          role: 'tool',
          content: message.content,
          tool_call_id: message.toolCallId ?? 'tool',
        };
    }
  });
}

export function toOpenAITools(
  tools: readonly ToolSpec[]
): OpenAI.Chat.Completions.ChatCompletionTool[] {
  return tools.map((tool) =>
    zodFunction({ name: tool.name, description: tool.description, parameters: tool.parameters })
  );
}

function parseArguments(raw: string, logger: Logger): Record<string, unknown> {
  if (!raw) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    logger.warn({ err: error }, 'tool call arguments are not JSON');
    return {};
  }
  const record = z.record(z.unknown()).safeParse(parsed);
  return record.success ? record.data : {};
}

export function fromOpenAIToolCalls(
  calls: readonly OpenAIToolCall[] | undefined,
  logger: Logger = silentLogger()
): ToolCall[] {
  return (calls ?? [])
    .filter((call) => call.type === 'function')
    .map((call) => ({
      id: call.id,
      name: call.function.name,
      arguments: parseArguments(call.function.arguments, logger),
    }));
}

export class OpenAIModelClient implements ModelClient {
  private readonly client: ChatCompletionsApi;
  private readonly clean: boolean;
  private readonly logger: Logger;

  public constructor(opts: {
    apiKey?: string;
    baseUrl?: string;
    client?: ChatCompletionsApi;
    /** Strip `<thinking>` blocks from replies; on by default */
    cleanResponse?: boolean;
    logger?: Logger;
  }) {
    this.client =
      opts.client ??
      new OpenAI({
        baseURL: opts.baseUrl,
        apiKey: opts.apiKey,
      });
    this.clean = opts.cleanResponse ?? true;
    this.logger = (opts.logger ?? silentLogger()).child({ component: 'openai' });
  }

  public async complete(request: ModelRequest, options: CompleteOptions = {}): Promise<ModelReply> {
    const start = Date.now();

    const params: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming = {
      model: request.model,
      messages: toOpenAIMessages(withSystemPrompt(request.messages, request.system)),
    };
    if (request.temperature !== undefined) {
      params.temperature = request.temperature;
    }
    if (request.maxTokens !== undefined) {
      params.max_tokens = request.maxTokens;
    }
    if (request.tools && request.tools.length > 0) {
      params.tools = toOpenAITools(request.tools);
    }

    const response = await this.client.chat.completions.create(params, {
      signal: options.signal,
      timeout: options.timeoutMs,
    });

    const message = response.choices[0]?.message;
    const raw = contentText(message?.content);
    const reply: ModelReply = {
      content: this.clean ? cleanResponse(raw) : raw,
      model: response.model,
    };
    const toolCalls = fromOpenAIToolCalls(message?.tool_calls, this.logger);
    if (toolCalls.length > 0) {
      reply.toolCalls = toolCalls;
    }
    if (response.usage) {
      reply.usage = {
        promptTokens: response.usage.prompt_tokens,
        completionTokens: response.usage.completion_tokens,
      };
    }

    this.logger.debug(
      {
        model: response.model,
        messages: params.messages.length,
        latencyMs: Date.now() - start,
        usage: reply.usage,
        toolCalls: toolCalls.length,
      },
      'completion received'
    );
    return reply;
  }
}
