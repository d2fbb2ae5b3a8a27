export class LingshuError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'LingshuError';
  }
}

export class BackendModelError extends LingshuError {
  constructor(
    public readonly detail: string,
    cause?: unknown,
  ) {
    super(`Model call failed: ${detail}`, { cause });
    this.name = 'BackendModelError';
  }
}

export class ToolNotFoundError extends LingshuError {
  constructor(public readonly toolName: string) {
    super(`Tool not found: ${toolName}`);
    this.name = 'ToolNotFoundError';
  }
}

export class ToolArgumentsError extends LingshuError {
  constructor(
    public readonly toolName: string,
    public readonly reason: string,
  ) {
    super(`Invalid arguments for ${toolName}: ${reason}`);
    this.name = 'ToolArgumentsError';
  }
}

export class McpNotConnectedError extends LingshuError {
  constructor(public readonly serverName: string) {
    super(`MCP client not connected: ${serverName}`);
    this.name = 'McpNotConnectedError';
  }
}

export class ConfigError extends LingshuError {
  constructor(message: string) {
    super(`Configuration error: ${message}`);
    this.name = 'ConfigError';
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
