import type { ToolCall, ToolSpec } from './tools';

export type ChatRole = 'system' | 'user' | 'assistant' | 'tool';

export type ChatMessage = {
  role: ChatRole;
  content: string;
  /** On assistant messages: tools the model asked for */
  toolCalls?: ToolCall[];
  /** On tool messages: the call this result answers */
  toolCallId?: string;
};

export type ModelRequest = {
  /** Provider model name, see {@link ModelRegistry.resolve} */
  model: string;
  messages: readonly ChatMessage[];
  /** Prepended to the first system message, or sent as one */
  system?: string;
  temperature?: number;
  maxTokens?: number;
  tools?: readonly ToolSpec[];
};

export type ModelUsage = {
  promptTokens: number;
  completionTokens: number;
};

export type ModelReply = {
  content: string;
  model: string;
  usage?: ModelUsage;
  /** Present when the model asked for tools instead of, or besides, answering */
  toolCalls?: ToolCall[];
};

export type CompleteOptions = {
  signal?: AbortSignal;
  timeoutMs?: number;
};

/**
 * Port for chat-style language model providers
 */
export interface ModelClient {
  complete(request: ModelRequest, options?: CompleteOptions): Promise<ModelReply>;
}

export function withSystemPrompt(
  messages: readonly ChatMessage[],
  system: string | undefined
): ChatMessage[] {
  const copy = messages.map((message) => ({ ...message }));
  if (!system) return copy;

  const existing = copy.find((message) => message.role === 'system');
  if (existing) {
    existing.content = `${system}\n\n${existing.content}`;
    return copy;
  }
  return [{ role: 'system', content: system }, ...copy];
}
