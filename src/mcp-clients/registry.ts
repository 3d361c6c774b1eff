import {
  ConnectionError,
  InvocationError,
  describeError,
} from '../core/errors';
import { logger as defaultLogger, type Logger } from '../core/logger';
import type {
  ServerStatus,
  Tool,
  ToolOutput,
  ToolServerConnection,
  ToolServerConnector,
  ToolServerSpec,
} from './types';

type ConnectedServer = {
  connection: ToolServerConnection;
  tools: Tool[];
};

/**
 * Every configured tool server and the tools they expose. Built once at
 * startup, read-only while the chat runs, torn down on exit.
 */
export class ToolRegistry {
  private readonly statuses: ServerStatus[] = [];
  private connected: ConnectedServer[] = [];
  private readonly owners = new Map<string, ConnectedServer>();

  constructor(
    private readonly connector: ToolServerConnector,
    private readonly logger: Logger = defaultLogger
  ) {}

  /**
   * Connects servers one at a time. A server that fails is recorded and
   * skipped; it never prevents the remaining servers from connecting.
   */
  async connectAll(specs: readonly ToolServerSpec[]): Promise<ServerStatus[]> {
    for (const spec of specs) {
      this.statuses.push(await this.connectOne(spec));
    }
    return this.servers();
  }

  servers(): ServerStatus[] {
    return [...this.statuses];
  }

  tools(): Tool[] {
    return this.connected.flatMap(({ tools }) => tools);
  }

  toolsByServer(): Map<string, Tool[]> {
    const grouped = new Map<string, Tool[]>();
    for (const tool of this.tools()) {
      const list = grouped.get(tool.server) ?? [];
      list.push(tool);
      grouped.set(tool.server, list);
    }
    return grouped;
  }

  async invoke(
    toolName: string,
    args: Record<string, unknown>
  ): Promise<ToolOutput> {
    const owner = this.owners.get(toolName);
    if (!owner) {
      throw new InvocationError(toolName, `Unknown tool: ${toolName}`);
    }

    this.logger.info('tool.invoke', {
      server: owner.connection.name,
      tool: toolName,
    });
    try {
      return await this.connector.invoke(owner.connection, toolName, args);
    } catch (e) {
      if (e instanceof InvocationError) throw e;
      throw new InvocationError(
        toolName,
        `Error calling tool ${toolName}: ${describeError(e)}`,
        e
      );
    }
  }

  /** Releases every connection exactly once. Safe to call more than once. */
  async closeAll(): Promise<void> {
    const servers = this.connected;
    this.connected = [];
    this.owners.clear();

    for (const { connection } of servers) {
      try {
        await this.connector.close(connection);
      } catch (e) {
        this.logger.error('mcp.close_failed', {
          server: connection.name,
          error: describeError(e),
        });
      }
    }
  }

  private async connectOne(spec: ToolServerSpec): Promise<ServerStatus> {
    let connection: ToolServerConnection;
    try {
      connection = await this.connector.connect(spec);
    } catch (e) {
      const error =
        e instanceof ConnectionError ? e : new ConnectionError(spec.name, e);
      return { name: spec.name, status: 'failed', error };
    }

    let tools: Tool[];
    try {
      tools = await this.connector.listTools(connection);
    } catch (e) {
      this.logger.warn('mcp.list_tools_failed', {
        server: spec.name,
        error: describeError(e),
      });
      await this.connector.close(connection).catch((closeError: unknown) => {
        this.logger.debug('mcp.close_after_failure', {
          server: spec.name,
          error: describeError(closeError),
        });
      });
      return {
        name: spec.name,
        status: 'failed',
        error: new ConnectionError(spec.name, e),
      };
    }

    const server: ConnectedServer = { connection, tools: [] };
    for (const tool of tools) {
      const owner = this.owners.get(tool.name);
      if (owner) {
        this.logger.warn('tool.duplicate_name', {
          tool: tool.name,
          keptFrom: owner.connection.name,
          skippedFrom: spec.name,
        });
        continue;
      }
      this.owners.set(tool.name, server);
      server.tools.push(tool);
    }
    this.connected.push(server);

    return {
      name: spec.name,
      status: 'connected',
      toolCount: server.tools.length,
    };
  }
}
