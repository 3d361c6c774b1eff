import OpenAI from 'openai';
import type {
  ChatCompletionMessageParam,
  ChatCompletionTool,
} from 'openai/resources/chat/completions';
import type { AppConfig } from '../config/schema';
import { ModelError, describeError } from '../core/errors';
import type { Tool } from '../mcp-clients/types';
import type {
  ConversationMessage,
  ModelClient,
  ModelReply,
  ToolCallRequest,
} from './types';

export type {
  ConversationMessage,
  ModelClient,
  ModelReply,
  ToolCallRequest,
} from './types';

export function toChatMessage(
  message: ConversationMessage
): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
    case 'user':
      return { role: message.role, content: message.content };
    case 'assistant':
      if (!message.toolCalls?.length) {
        return { role: 'assistant', content: message.content };
      }
      return {
        role: 'assistant',
        content: message.content || null,
        tool_calls: message.toolCalls.map((call) => ({
          id: call.id,
          type: 'function',
          function: { name: call.name, arguments: call.arguments },
        })),
      };
    case 'tool':
      return {
        role: 'tool',
        tool_call_id: message.toolCallId,
        content: message.content,
      };
  }
}

export function toChatTool(tool: Tool): ChatCompletionTool {
  return {
    type: 'function',
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.input_schema,
    },
  };
}

export type OpenAICompatibleOptions = {
  apiKey: string;
  model: string;
  baseUrl?: string;
  maxRetries?: number;
  fetch?: typeof fetch;
};

/** Chat-completions client for OpenAI and any endpoint that speaks its API. */
export class OpenAICompatibleClient implements ModelClient {
  readonly model: string;
  private readonly client: OpenAI;

  constructor(options: OpenAICompatibleOptions) {
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseUrl,
      maxRetries: options.maxRetries,
      fetch: options.fetch,
    });
    this.model = options.model;
  }

  async complete(
    messages: readonly ConversationMessage[],
    tools: readonly Tool[]
  ): Promise<ModelReply> {
    let response: OpenAI.Chat.Completions.ChatCompletion;
    try {
      response = await this.client.chat.completions.create({
        model: this.model,
        messages: messages.map(toChatMessage),
        ...(tools.length > 0
          ? { tools: tools.map(toChatTool), tool_choice: 'auto' as const }
          : {}),
      });
    } catch (e) {
      throw new ModelError(`Model request failed: ${describeError(e)}`, e);
    }

    const choice = response.choices[0];
    if (!choice) {
      throw new ModelError('Model returned no choices');
    }

    const text = choice.message.content ?? '';
    const calls: ToolCallRequest[] = [];
    for (const call of choice.message.tool_calls ?? []) {
      if (call.type !== 'function') continue;
      calls.push({
        id: call.id,
        name: call.function.name,
        arguments: call.function.arguments,
      });
    }

    if (calls.length > 0) {
      return { kind: 'tool_calls', text, calls };
    }
    return { kind: 'text', text };
  }
}

export function createModelClient(config: AppConfig): ModelClient {
  return new OpenAICompatibleClient({
    apiKey: config.apiKey,
    model: config.model,
    baseUrl: config.baseUrl,
  });
}
