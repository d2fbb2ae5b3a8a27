import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
} from '@modelcontextprotocol/sdk/types.js';
import { SERVER_NAME, SERVER_VERSION, type Logger } from '@lingshu/shared';
import type { ToolRegistry } from '@lingshu/core';
import { toJsonSchema } from '@lingshu/tools';

/**
 * Binds the registry to a fresh MCP server. Cheap to build, so the HTTP
 * transport creates one per request.
 */
export function createMcpServer(registry: ToolRegistry, logger?: Logger): Server {
  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: registry.describe().map(descriptor => ({
      name: descriptor.name,
      description: descriptor.description,
      inputSchema: toJsonSchema(descriptor.inputSchema),
    })),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request): Promise<CallToolResult> => {
    const { name, arguments: args } = request.params;
    logger?.info(`tools/call ${name}`);

    const envelope = await registry.invoke({ toolName: name, input: args ?? {} });
    return {
      content: [{ type: 'text', text: JSON.stringify(envelope, null, 2) }],
      isError: envelope.status === 'error',
    };
  });

  return server;
}

/** Serves the registry over stdin/stdout until the parent closes the pipe. */
export async function startStdioServer(registry: ToolRegistry, logger?: Logger): Promise<Server> {
  const server = createMcpServer(registry, logger);
  await server.connect(new StdioServerTransport());
  logger?.info(`${SERVER_NAME} MCP server running on stdio`);
  return server;
}
