import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
  McpNotConnectedError,
  SERVER_NAME,
  SERVER_VERSION,
  type Logger,
  type RemoteTool,
  type ToolProviderClient,
} from '@lingshu/shared';
import { createTransport, type McpTransportConfig } from './transport.js';
import { toRemoteTool } from './schema-bridge.js';

export type McpServerConfig = McpTransportConfig;

type TextContent = { type: 'text'; text: string };

function isTextContent(value: unknown): value is TextContent {
  return (
    typeof value === 'object' &&
    value !== null &&
    'type' in value &&
    value.type === 'text' &&
    'text' in value &&
    typeof value.text === 'string'
  );
}

export class McpClient implements ToolProviderClient {
  private client: Client;
  private connected = false;
  private serverName: string;
  private logger?: Logger;

  constructor(serverName: string, logger?: Logger) {
    this.serverName = serverName;
    this.logger = logger;
    this.client = new Client(
      { name: `${SERVER_NAME}-agent`, version: SERVER_VERSION },
      { capabilities: {} },
    );
  }

  async connect(config: McpServerConfig): Promise<void> {
    this.logger?.debug(
      `Connecting to ${this.serverName} over ${config.transport}` +
        (config.transport === 'streamable-http' ? ` at ${config.url}` : ''),
    );
    await this.connectTransport(createTransport(config));
  }

  async connectTransport(transport: Transport): Promise<void> {
    await this.client.connect(transport);
    this.connected = true;
  }

  async listTools(): Promise<RemoteTool[]> {
    if (!this.connected) {
      throw new McpNotConnectedError(this.serverName);
    }

    const tools: RemoteTool[] = [];
    let cursor: string | undefined;
    do {
      const page = await this.client.listTools(cursor ? { cursor } : undefined);
      tools.push(...page.tools.map(tool => toRemoteTool(tool)));
      cursor = page.nextCursor;
    } while (cursor);

    return tools;
  }

  /**
   * Invokes a tool and returns its payload: the parsed JSON of the text
   * content when it is JSON, the raw text otherwise, or the whole MCP
   * result when there is no text content at all.
   */
  async callTool(name: string, args: Record<string, unknown>): Promise<unknown> {
    if (!this.connected) {
      throw new McpNotConnectedError(this.serverName);
    }

    const result = await this.client.callTool({ name, arguments: args });

    const content: unknown = result.content;
    const parts: unknown[] = Array.isArray(content) ? content : [];
    const textParts = parts.filter(isTextContent).map(part => part.text);
    if (textParts.length === 0) return result;

    const text = textParts.join('\n');
    try {
      const payload: unknown = JSON.parse(text);
      return payload;
    } catch {
      return text;
    }
  }

  async disconnect(): Promise<void> {
    if (this.connected) {
      await this.client.close();
      this.connected = false;
    }
  }

  isConnected(): boolean {
    return this.connected;
  }

  getName(): string {
    return this.serverName;
  }
}
