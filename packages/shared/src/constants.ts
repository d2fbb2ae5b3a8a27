import type { LingshuConfig } from './types/config.js';

export const SERVER_NAME = 'lingshu';
export const SERVER_VERSION = '0.1.0';

export const ANALYSIS_TYPES = ['radiology', 'pathology', 'dermatology', 'ophthalmology', 'general'] as const;

export const DEFAULT_AGENT_QUERY =
  'How to evaluate lung nodules in CT images? What imaging features should be noted?';

export const DEFAULT_CONFIG: LingshuConfig = {
  provider: {
    host: '127.0.0.1',
    port: 4200,
    path: '/lingshu',
    transport: 'streamable-http',
  },
  backend: {
    baseUrl: 'http://localhost:8000/v1',
    apiKey: 'api_key',
    model: 'Lingshu-7B',
    timeoutMs: 60_000,
  },
  reasoning: {
    baseUrl: 'http://localhost:8000/v1',
    apiKey: 'api_key',
    model: 'qwen3-235b-a22b-instruct-2507',
    timeoutMs: 60_000,
  },
  agent: {
    mcpUrl: 'http://127.0.0.1:4200/lingshu',
  },
  logging: {
    level: 'info',
  },
};
