export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}

/**
 * Missing or invalid configuration. Fatal, raised before the chat loop
 * starts.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * A configured tool server could not be launched or did not complete the MCP
 * handshake. The message reads the same on every host OS.
 */
export class ConnectionError extends Error {
  readonly serverName: string;

  constructor(serverName: string, cause: unknown) {
    super(
      `Error connecting to server '${serverName}': ${describeError(cause)}`,
      { cause }
    );
    this.name = 'ConnectionError';
    this.serverName = serverName;
  }
}

export class ModelError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'ModelError';
  }
}

export class InvocationError extends Error {
  readonly toolName: string;

  constructor(toolName: string, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'InvocationError';
    this.toolName = toolName;
  }
}
