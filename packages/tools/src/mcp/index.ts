export { McpClient, type McpServerConfig } from './client.js';
export {
  describeInputSchema,
  toJsonSchema,
  jsonSchemaToZod,
  toRemoteTool,
  toFunctionToolSpec,
} from './schema-bridge.js';
export {
  createTransport,
  type McpTransportConfig,
  type StdioTransportConfig,
  type StreamableHttpTransportConfig,
} from './transport.js';
