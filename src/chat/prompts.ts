import type { Tool } from '../mcp-clients/types';

/** One `- name (server): description` line per tool, or `(none)`. */
export function formatToolList(tools: readonly Tool[]): string {
  if (tools.length === 0) return '(none)';
  return tools
    .map((tool) => `- ${tool.name} (${tool.server}): ${tool.description ?? ''}`)
    .join('\n');
}

export function buildSystemPrompt(
  tools: readonly Tool[],
  override?: string
): string {
  if (override) return override;

  return [
    'You are a helpful assistant running in a terminal. You can call tools',
    "exposed by MCP servers to act on the user's behalf.",
    '',
    'Available tools:',
    formatToolList(tools),
    '',
    'Guidelines:',
    '- Answer general questions directly, without tools.',
    '- When a request needs a tool, call it with exactly the parameters its',
    '  schema asks for.',
    '- Report only what the tools actually returned; never invent results.',
    '- If a tool fails, explain what went wrong and what you tried.',
    '- If no available tool can do what is asked, say so plainly.',
  ].join('\n');
}
