import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import {
  StdioClientTransport,
  getDefaultEnvironment,
} from '@modelcontextprotocol/sdk/client/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
  ConnectionError,
  InvocationError,
  describeError,
} from '../core/errors';
import { logger as defaultLogger, type Logger } from '../core/logger';
import { renderToolResult } from './tool-result';
import type {
  Tool,
  ToolOutput,
  ToolServerConnection,
  ToolServerConnector,
  ToolServerSpec,
} from './types';

export type TransportFactory = (spec: ToolServerSpec) => Transport;

/** Launches the server as a child process speaking MCP over stdio. */
export const createStdioTransport: TransportFactory = (spec) =>
  new StdioClientTransport({
    command: spec.command,
    args: spec.args,
    env: { ...getDefaultEnvironment(), ...spec.env },
  });

export class MCPConnector implements ToolServerConnector {
  private readonly clients = new WeakMap<ToolServerConnection, Client>();

  constructor(
    private readonly createTransport: TransportFactory = createStdioTransport,
    private readonly logger: Logger = defaultLogger
  ) {}

  async connect(spec: ToolServerSpec): Promise<ToolServerConnection> {
    const mcp = new Client({ name: 'mcp-chat', version: '1.0.0' });

    try {
      await mcp.connect(this.createTransport(spec));
    } catch (e) {
      this.logger.warn('mcp.connect_failed', {
        server: spec.name,
        command: spec.command,
        error: describeError(e),
      });
      await this.closeClient(spec.name, mcp);
      throw new ConnectionError(spec.name, e);
    }

    const connection: ToolServerConnection = { name: spec.name, spec };
    this.clients.set(connection, mcp);
    this.logger.info('mcp.connected', { server: spec.name });
    return connection;
  }

  async listTools(connection: ToolServerConnection): Promise<Tool[]> {
    const mcp = this.clientFor(connection);
    const tools: Tool[] = [];
    let cursor: string | undefined;

    do {
      const toolsResult = await mcp.listTools(cursor ? { cursor } : undefined);
      for (const tool of toolsResult.tools) {
        tools.push({
          name: tool.name,
          description: tool.description,
          input_schema: tool.inputSchema,
          server: connection.name,
        });
      }
      cursor = toolsResult.nextCursor;
    } while (cursor);

    return tools;
  }

  async invoke(
    connection: ToolServerConnection,
    toolName: string,
    args: Record<string, unknown>
  ): Promise<ToolOutput> {
    const mcp = this.clientFor(connection);

    let output: ToolOutput;
    try {
      const result = await mcp.callTool({ name: toolName, arguments: args });
      output = renderToolResult(result);
    } catch (e) {
      throw new InvocationError(
        toolName,
        `Error calling tool ${toolName}: ${describeError(e)}`,
        e
      );
    }

    if (output.isError) {
      throw new InvocationError(
        toolName,
        `Tool ${toolName} failed: ${output.text || 'no details given'}`
      );
    }
    return output;
  }

  async close(connection: ToolServerConnection): Promise<void> {
    const mcp = this.clients.get(connection);
    if (!mcp) return;
    this.clients.delete(connection);
    await mcp.close();
    this.logger.info('mcp.closed', { server: connection.name });
  }

  private clientFor(connection: ToolServerConnection): Client {
    const mcp = this.clients.get(connection);
    if (!mcp) {
      throw new Error(`Server '${connection.name}' is not connected`);
    }
    return mcp;
  }

  private async closeClient(serverName: string, mcp: Client): Promise<void> {
    try {
      await mcp.close();
    } catch (e) {
      this.logger.debug('mcp.close_after_failure', {
        server: serverName,
        error: describeError(e),
      });
    }
  }
}
