import { readFile } from 'node:fs/promises';
import { resolve, dirname } from 'node:path';
import { existsSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import {
  type ConfigOverrides,
  type LingshuConfig,
  DEFAULT_CONFIG,
  lingshuConfigSchema,
  ConfigError,
  describeError,
  formatIssues,
  isRecord,
  parseLogLevel,
} from '@lingshu/shared';

export const CONFIG_FILE_NAMES = ['lingshu.config.yaml', 'lingshu.config.yml', 'lingshu.config.json'];

export interface ConfigLoadOptions {
  configPath?: string;
  /** Highest-precedence layer, typically CLI flags. */
  overrides?: ConfigOverrides;
  env?: NodeJS.ProcessEnv;
  /** Where the config file search starts; defaults to `process.cwd()`. */
  cwd?: string;
}

type EnvBinding = {
  name: string;
  section: keyof LingshuConfig;
  key: string;
  parse?: (value: string) => unknown;
};

const ENV_BINDINGS: EnvBinding[] = [
  { name: 'LINGSHU_HOST', section: 'provider', key: 'host' },
  { name: 'LINGSHU_PORT', section: 'provider', key: 'port', parse: value => Number(value) },
  { name: 'LINGSHU_PATH', section: 'provider', key: 'path' },
  { name: 'LINGSHU_SERVER_URL', section: 'backend', key: 'baseUrl' },
  { name: 'LINGSHU_SERVER_API', section: 'backend', key: 'apiKey' },
  { name: 'LINGSHU_MODEL', section: 'backend', key: 'model' },
  { name: 'LLM_SERVER_URL', section: 'reasoning', key: 'baseUrl' },
  { name: 'LLM_SERVER_API', section: 'reasoning', key: 'apiKey' },
  { name: 'LLM_MODEL', section: 'reasoning', key: 'model' },
  { name: 'LINGSHU_MCP_URL', section: 'agent', key: 'mcpUrl' },
  { name: 'LINGSHU_LOG_LEVEL', section: 'logging', key: 'level', parse: parseLogLevel },
];

export class ConfigManager {
  async load(options: ConfigLoadOptions = {}): Promise<LingshuConfig> {
    // 1. Start with defaults
    let merged: Record<string, unknown> = structuredClone(DEFAULT_CONFIG);

    // 2. Load config file
    const fileConfig = await this.loadConfigFile(options.configPath, options.cwd);
    if (fileConfig) {
      merged = deepMerge(merged, fileConfig);
    }

    // 3. Environment variables
    merged = deepMerge(merged, this.loadEnvVars(options.env ?? process.env));

    // 4. CLI overrides
    if (options.overrides) {
      merged = deepMerge(merged, options.overrides);
    }

    // 5. Validate
    const result = lingshuConfigSchema.safeParse(merged);
    if (!result.success) {
      throw new ConfigError(`Invalid configuration: ${formatIssues(result.error)}`);
    }

    return result.data;
  }

  private async loadConfigFile(configPath?: string, cwd?: string): Promise<Record<string, unknown> | null> {
    if (configPath) {
      const p = resolve(cwd ?? process.cwd(), configPath);
      if (!existsSync(p)) {
        throw new ConfigError(`config file not found: ${p}`);
      }
      return this.parseConfigFile(p);
    }

    // Search cwd and parent directories
    let dir = resolve(cwd ?? process.cwd());

    for (let depth = 0; depth < 10; depth++) {
      for (const name of CONFIG_FILE_NAMES) {
        const p = resolve(dir, name);
        if (existsSync(p)) {
          return this.parseConfigFile(p);
        }
      }
      const parent = dirname(dir);
      if (parent === dir) break; // reached filesystem root
      dir = parent;
    }

    return null;
  }

  private async parseConfigFile(p: string): Promise<Record<string, unknown>> {
    const content = await readFile(p, 'utf-8');

    let parsed: unknown;
    try {
      parsed = p.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
    } catch (err) {
      throw new ConfigError(`cannot parse ${p}: ${describeError(err)}`);
    }

    // An empty YAML file parses to null
    if (parsed === null || parsed === undefined) return {};
    if (!isRecord(parsed)) {
      throw new ConfigError(`${p} must contain a mapping at the top level`);
    }
    return parsed;
  }

  private loadEnvVars(env: NodeJS.ProcessEnv): Record<string, unknown> {
    const config: Record<string, Record<string, unknown>> = {};

    for (const binding of ENV_BINDINGS) {
      const raw = env[binding.name];
      if (!raw) continue;
      const section = (config[binding.section] ??= {});
      section[binding.key] = binding.parse ? binding.parse(raw) : raw;
    }

    return config;
  }
}

function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };
  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = target[key];
    if (sourceValue === undefined) continue;
    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else {
      result[key] = sourceValue;
    }
  }
  return result;
}
