export { ToolRegistry } from './tool-registry.js';
export { ConfigManager, CONFIG_FILE_NAMES, type ConfigLoadOptions } from './config-manager.js';
export {
  OrchestratingAgent,
  type AgentDeps,
  type AgentHooks,
  type AgentRunResult,
  type ToolCallOutcome,
} from './agent.js';
