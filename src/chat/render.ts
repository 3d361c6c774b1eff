import type { ServerStatus, Tool } from '../mcp-clients/types';
import type { Session } from './sessions';

const DESCRIPTION_WIDTH = 80;

export function shortDescription(description: string | undefined): string {
  const firstLine = (description ?? '').trim().split('\n')[0].trim();
  if (firstLine.length <= DESCRIPTION_WIDTH) return firstLine;
  return `${firstLine.slice(0, DESCRIPTION_WIDTH - 1)}…`;
}

export function formatServerStatus(status: ServerStatus): string {
  if (status.status === 'failed') {
    return `❌ ${status.error.message}`;
  }
  const noun = status.toolCount === 1 ? 'tool' : 'tools';
  return (
    `✅ Connected to server '${status.name}' with ${status.toolCount} ${noun}`
  );
}

export function formatToolCatalog(
  servers: readonly ServerStatus[],
  toolsByServer: ReadonlyMap<string, readonly Tool[]>
): string[] {
  const anyFailed = servers.some((s) => s.status === 'failed');
  if (toolsByServer.size === 0 && !anyFailed) {
    return ['No tools available.'];
  }

  const lines = ['🛠️  Available tools:'];
  for (const server of servers) {
    if (server.status === 'failed') {
      lines.push(`❌ ${server.name}: unavailable (${server.error.message})`);
      continue;
    }
    lines.push(`📦 ${server.name}`);
    for (const tool of toolsByServer.get(server.name) ?? []) {
      const description = shortDescription(tool.description);
      lines.push(
        description ? `   • ${tool.name}: ${description}` : `   • ${tool.name}`
      );
    }
  }
  if (toolsByServer.size === 0) {
    lines.push('No tools available.');
  }
  return lines;
}

export function formatSessions(
  sessions: readonly Session[],
  activeId: string | undefined
): string[] {
  if (sessions.length === 0) {
    return ['No sessions yet.'];
  }

  const lines = [`💬 Sessions (${sessions.length}):`];
  for (const session of sessions) {
    const exchanges = session.turns.filter(
      (turn) => turn.role === 'user'
    ).length;
    const noun = exchanges === 1 ? 'exchange' : 'exchanges';
    const marker = session.id === activeId ? '🟢' : '⚪';
    const suffix = session.id === activeId ? ' (active)' : '';
    lines.push(`${marker} ${session.id} - ${exchanges} ${noun}${suffix}`);
  }
  return lines;
}
