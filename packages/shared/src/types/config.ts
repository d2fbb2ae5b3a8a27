import type { z } from 'zod';
import type {
  lingshuConfigSchema,
  providerConfigSchema,
  modelEndpointConfigSchema,
  loggingConfigSchema,
} from '../schemas/config.schema.js';

export type LingshuConfig = z.output<typeof lingshuConfigSchema>;
export type ProviderConfig = z.output<typeof providerConfigSchema>;
export type ModelEndpointConfig = z.output<typeof modelEndpointConfigSchema>;
export type LoggingConfig = z.output<typeof loggingConfigSchema>;

export type ConfigOverrides = {
  [K in keyof LingshuConfig]?: Partial<LingshuConfig[K]>;
};
