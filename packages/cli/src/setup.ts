import { Option } from 'commander';
import {
  createLogger,
  describeError,
  parseLogLevel,
  type ConfigOverrides,
  type LingshuConfig,
  type Logger,
  type LogLevel,
} from '@lingshu/shared';
import { BackendModelClient, OpenAICompatProvider } from '@lingshu/models';
import { ConfigManager, OrchestratingAgent, ToolRegistry } from '@lingshu/core';
import { createMedicalTools, McpClient, type McpServerConfig } from '@lingshu/tools';

export const LOG_LEVEL_CHOICES = ['debug', 'info', 'warning', 'error'] as const;

export function logLevelOption(): Option {
  return new Option('--log-level <level>', 'Log verbosity').choices(LOG_LEVEL_CHOICES);
}

export interface ConfigOptions {
  config?: string;
  logLevel?: string;
}

export async function loadConfig(options: ConfigOptions, overrides: ConfigOverrides = {}): Promise<LingshuConfig> {
  const level: LogLevel | undefined = options.logLevel ? parseLogLevel(options.logLevel) : undefined;
  return new ConfigManager().load({
    configPath: options.config,
    overrides: { ...overrides, logging: { level } },
  });
}

export function createRootLogger(config: LingshuConfig): Logger {
  return createLogger({ level: config.logging.level });
}

/** The provider side: backend client → medical tools → registry. */
export function buildRegistry(config: LingshuConfig, logger: Logger): ToolRegistry {
  const model = BackendModelClient.fromConfig(config.backend, logger.child('backend'));
  const registry = new ToolRegistry(logger);
  registry.registerAll(createMedicalTools({ model, logger: logger.child('tools') }));
  return registry;
}

/**
 * Where the agent finds the provider: a command line launched over stdio
 * when given, otherwise the configured streamable HTTP URL.
 */
export function providerTarget(config: LingshuConfig, mcpCommand?: string): McpServerConfig {
  const argv = mcpCommand?.trim().split(/\s+/) ?? [];
  const [command, ...args] = argv;
  if (command) {
    return { transport: 'stdio', command, args };
  }
  return { transport: 'streamable-http', url: config.agent.mcpUrl };
}

export async function connectProvider(target: McpServerConfig, logger: Logger): Promise<McpClient> {
  const client = new McpClient('lingshu', logger.child('mcp'));
  await client.connect(target);
  return client;
}

export function buildAgent(config: LingshuConfig, client: McpClient, logger: Logger): OrchestratingAgent {
  const provider = new OpenAICompatProvider({
    baseUrl: config.reasoning.baseUrl,
    apiKey: config.reasoning.apiKey,
    timeoutMs: config.reasoning.timeoutMs,
  });
  return new OrchestratingAgent({ client, provider, model: config.reasoning.model, logger });
}

/** Runs a command body, printing a failure and setting a non-zero exit code. */
export async function runAction(action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (err) {
    console.error(`Error: ${describeError(err)}`);
    process.exitCode = 1;
  }
}
