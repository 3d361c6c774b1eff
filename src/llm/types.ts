import type { Tool } from '../mcp-clients/types';

export type ToolCallRequest = {
  id: string;
  name: string;
  /** JSON string exactly as the model produced it. */
  arguments: string;
};

export type ConversationMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string; toolCalls?: ToolCallRequest[] }
  | { role: 'tool'; toolCallId: string; content: string };

export type ModelReply =
  | { kind: 'text'; text: string }
  | { kind: 'tool_calls'; text: string; calls: ToolCallRequest[] };

/**
 * Chat model contract used by the session loop. Implementations throw
 * `ModelError` for every provider or network failure.
 */
export interface ModelClient {
  readonly model: string;
  complete(
    messages: readonly ConversationMessage[],
    tools: readonly Tool[]
  ): Promise<ModelReply>;
}
