import { Hono } from 'hono';
import { serve, type HttpBindings, type ServerType } from '@hono/node-server';
import { RESPONSE_ALREADY_SENT } from '@hono/node-server/utils/response';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { SERVER_NAME, describeError, type Logger, type ProviderConfig } from '@lingshu/shared';
import type { ToolRegistry } from '@lingshu/core';
import { createMcpServer } from './mcp.js';
import { healthRoutes } from './routes/health.js';
import { toolsRoutes } from './routes/tools.js';

export interface AppOptions {
  registry: ToolRegistry;
  /** Mount point of the MCP endpoint, e.g. `/lingshu` */
  path: string;
  logger: Logger;
}

function jsonRpcError(code: number, message: string) {
  return { jsonrpc: '2.0', error: { code, message }, id: null };
}

export function createApp({ registry, path, logger }: AppOptions) {
  const app = new Hono<{ Bindings: HttpBindings }>();
  const httpLogger = logger.child('http');

  // Request logging
  app.use('*', async (c, next) => {
    const start = Date.now();
    await next();
    const ms = Date.now() - start;
    httpLogger.info(`${c.req.method} ${c.req.path} ${c.res.status} ${ms}ms`);
  });

  // Error handling
  app.onError((err, c) => {
    httpLogger.error(`Server error: ${describeError(err)}`);
    return c.json({ error: 'Internal server error' }, 500);
  });

  app.route('/health', healthRoutes(registry));
  app.route('/tools', toolsRoutes(registry));

  // Stateless streamable HTTP: one MCP server and transport per request
  app.post(path, async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json(jsonRpcError(-32700, 'Parse error'), 400);
    }

    const { incoming, outgoing } = c.env;
    const server = createMcpServer(registry, logger.child('mcp'));
    const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });
    outgoing.on('close', () => {
      Promise.all([transport.close(), server.close()]).catch(err => {
        httpLogger.warn(`Failed to close MCP transport: ${describeError(err)}`);
      });
    });

    await server.connect(transport);
    await transport.handleRequest(incoming, outgoing, body);
    return RESPONSE_ALREADY_SENT;
  });

  // No server-initiated streams or sessions in stateless mode
  app.on(['GET', 'DELETE'], path, (c) => c.json(jsonRpcError(-32000, 'Method not allowed.'), 405));

  return app;
}

/** Client configuration snippet pointing an MCP host at this provider. */
export function integrationSnippet(url: string): string {
  return JSON.stringify({ mcpServers: { [SERVER_NAME]: { url } } }, null, 2);
}

export interface StartServerOptions {
  registry: ToolRegistry;
  config: ProviderConfig;
  logger: Logger;
}

export function startServer({ registry, config, logger }: StartServerOptions): Promise<ServerType> {
  const { host, port, path } = config;
  const app = createApp({ registry, path, logger });

  console.log(`Starting ${SERVER_NAME} MCP server...`);
  return new Promise((resolve) => {
    const server = serve({ fetch: app.fetch, port, hostname: host }, (info) => {
      // Port 0 binds a free port; report the one actually bound
      const url = `http://${host}:${info.port}${path}`;
      console.log(`Lingshu MCP server listening on ${url}`);
      console.log('');
      console.log(`  Address:   ${host}:${info.port}`);
      console.log(`  Path:      ${path}`);
      console.log(`  Log level: ${logger.level}`);
      console.log('');
      console.log('Tools:');
      for (const name of registry.listNames()) {
        console.log(`  - ${name}`);
      }
      console.log('');
      console.log('Endpoints:');
      console.log(`  POST   ${path.padEnd(14)} - MCP streamable HTTP`);
      console.log(`  GET    /tools          - List tools with their input schemas`);
      console.log(`  GET    /health         - Health check`);
      console.log('');
      console.log('Add to your MCP client configuration:');
      console.log(integrationSnippet(url));
      resolve(server);
    });
  });
}
