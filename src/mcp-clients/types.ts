import type { ConnectionError } from '../core/errors';

export type ToolInputSchema = {
  [p: string]: unknown;
  type: 'object';
  properties?: Record<string, object> | undefined;
  required?: string[] | undefined;
};

export type Tool = {
  name: string;
  description: string | undefined;
  input_schema: ToolInputSchema;
  /** Name of the tool server that exposes the tool. */
  server: string;
};

export type ToolServerSpec = {
  name: string;
  command: string;
  args: string[];
  env?: Record<string, string>;
  description?: string;
};

/** Opaque handle for one launched tool server. */
export interface ToolServerConnection {
  readonly name: string;
  readonly spec: ToolServerSpec;
}

export type ToolOutput = {
  text: string;
  isError: boolean;
};

export interface ToolServerConnector {
  connect(spec: ToolServerSpec): Promise<ToolServerConnection>;
  listTools(connection: ToolServerConnection): Promise<Tool[]>;
  invoke(
    connection: ToolServerConnection,
    toolName: string,
    args: Record<string, unknown>
  ): Promise<ToolOutput>;
  close(connection: ToolServerConnection): Promise<void>;
}

export type ServerStatus =
  | { name: string; status: 'connected'; toolCount: number }
  | { name: string; status: 'failed'; error: ConnectionError };
