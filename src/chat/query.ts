import { InvocationError, ModelError, describeError } from '../core/errors';
import type {
  ConversationMessage,
  ModelClient,
  ToolCallRequest,
} from '../llm/types';
import { parseToolArguments } from '../mcp-clients/arguments';
import type { ToolRegistry } from '../mcp-clients/registry';
import type { Tool } from '../mcp-clients/types';
import {
  buildExecutionPrompt,
  buildPlannerPrompt,
  extractPlan,
} from './plan';
import { buildSystemPrompt } from './prompts';
import type { Turn } from './sessions';

export type QueryDeps = {
  model: ModelClient;
  tools: ToolRegistry;
  maxToolIterations: number;
  systemPrompt?: string;
  /** Ask the model for a plan before letting it call tools. */
  planFirst?: boolean;
  /** Progress lines shown while tools run. */
  onProgress?: (line: string) => void;
};

async function runToolCall(
  call: ToolCallRequest,
  deps: QueryDeps
): Promise<string> {
  try {
    const args = parseToolArguments(call.name, call.arguments);
    deps.onProgress?.(`🔧 ${call.name} ${JSON.stringify(args)}`);
    const output = await deps.tools.invoke(call.name, args);
    return output.text;
  } catch (e) {
    const message =
      e instanceof InvocationError
        ? e.message
        : `Error calling tool ${call.name}: ${describeError(e)}`;
    deps.onProgress?.(`❌ ${message}`);
    return message;
  }
}

async function runToolLoop(
  messages: ConversationMessage[],
  tools: readonly Tool[],
  deps: QueryDeps
): Promise<string> {
  for (let round = 0; ; round++) {
    const reply = await deps.model.complete(messages, tools);
    if (reply.kind === 'text') {
      return reply.text;
    }

    if (round >= deps.maxToolIterations) {
      throw new ModelError(
        `No final answer after ${deps.maxToolIterations} rounds of tool calls`
      );
    }

    messages.push({
      role: 'assistant',
      content: reply.text,
      toolCalls: reply.calls,
    });
    for (const call of reply.calls) {
      messages.push({
        role: 'tool',
        toolCallId: call.id,
        content: await runToolCall(call, deps),
      });
    }
  }
}

/**
 * Sends the session history plus the new query to the model and resolves
 * tool calls until the model answers in text. Tool failures go back to the
 * model as tool output; model failures throw `ModelError`.
 *
 * With `planFirst`, a planning call without tools comes first. A reply that
 * carries no plan is the answer; otherwise the plan is handed to the tool
 * loop.
 */
export async function answerQuery(
  history: readonly Turn[],
  query: string,
  deps: QueryDeps
): Promise<string> {
  const tools = deps.tools.tools();
  const past = history.map(({ role, content }) => ({ role, content }));
  const messages: ConversationMessage[] = [
    { role: 'system', content: buildSystemPrompt(tools, deps.systemPrompt) },
    ...past,
    { role: 'user', content: query },
  ];

  if (deps.planFirst) {
    const planning = await deps.model.complete(
      [
        { role: 'system', content: buildPlannerPrompt(tools) },
        ...past,
        { role: 'user', content: query },
      ],
      []
    );
    const plan = extractPlan(planning.text);
    if (!plan) return planning.text;

    deps.onProgress?.(`📋 Plan: ${plan.task_description}`);
    if (plan.required_tools.length > 0) {
      deps.onProgress?.(`🧰 Tools: ${plan.required_tools.join(', ')}`);
    }
    messages.push(
      { role: 'assistant', content: planning.text },
      { role: 'user', content: buildExecutionPrompt(plan) }
    );
  }

  return runToolLoop(messages, tools, deps);
}
