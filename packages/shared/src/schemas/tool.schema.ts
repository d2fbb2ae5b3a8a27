import { z } from 'zod';

export const toolErrorEnvelopeSchema = z.object({
  status: z.literal('error'),
  error: z.string(),
  timestamp: z.string().datetime(),
});

export const toolSuccessEnvelopeSchema = z.object({
  status: z.literal('success'),
  language: z.string(),
  timestamp: z.string().datetime(),
  model: z.string().min(1),
}).passthrough();

export const toolResultEnvelopeSchema = z.discriminatedUnion('status', [
  toolSuccessEnvelopeSchema,
  toolErrorEnvelopeSchema,
]);

/** Input schema advertised by an MCP server for one tool. */
export const jsonObjectSchemaSchema = z.object({
  type: z.literal('object'),
  properties: z.record(z.record(z.unknown())).default({}),
  required: z.array(z.string()).optional(),
  additionalProperties: z.boolean().optional(),
}).passthrough();
