import { StdioClientTransport, getDefaultEnvironment } from '@modelcontextprotocol/sdk/client/stdio.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';

export interface StdioTransportConfig {
  transport: 'stdio';
  command: string;
  args?: string[];
  env?: Record<string, string>;
}

export interface StreamableHttpTransportConfig {
  transport: 'streamable-http';
  url: string;
}

export type McpTransportConfig = StdioTransportConfig | StreamableHttpTransportConfig;

export function createTransport(config: McpTransportConfig): Transport {
  if (config.transport === 'stdio') {
    return new StdioClientTransport({
      command: config.command,
      args: config.args,
      env: config.env ? { ...getDefaultEnvironment(), ...config.env } : undefined,
    });
  }

  return new StreamableHTTPClientTransport(new URL(config.url));
}
