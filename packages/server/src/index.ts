export { createApp, startServer, integrationSnippet, type AppOptions, type StartServerOptions } from './app.js';
export { createMcpServer, startStdioServer } from './mcp.js';
