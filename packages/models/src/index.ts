export { ModelProvider } from './provider.js';
export { OpenAICompatProvider, type OpenAICompatConfig } from './providers/openai-compat.js';
export { BackendModelClient, type BackendModelClientOptions } from './backend-client.js';
