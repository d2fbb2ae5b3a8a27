import { z } from 'zod';

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export const providerConfigSchema = z.object({
  host: z.string().min(1),
  /** 0 binds any free port */
  port: z.number().int().min(0).max(65_535),
  path: z.string().startsWith('/'),
  transport: z.enum(['streamable-http', 'stdio']),
});

export const modelEndpointConfigSchema = z.object({
  baseUrl: z.string().url(),
  apiKey: z.string().min(1),
  model: z.string().min(1),
  timeoutMs: z.number().int().positive(),
});

export const agentConfigSchema = z.object({
  mcpUrl: z.string().url(),
});

export const loggingConfigSchema = z.object({
  level: logLevelSchema,
});

export const lingshuConfigSchema = z.object({
  provider: providerConfigSchema,
  backend: modelEndpointConfigSchema,
  reasoning: modelEndpointConfigSchema,
  agent: agentConfigSchema,
  logging: loggingConfigSchema,
});
