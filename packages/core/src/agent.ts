import type { ZodTypeAny } from 'zod';
import {
  describeError,
  formatIssues,
  isRecord,
  ToolArgumentsError,
  ToolNotFoundError,
  type Logger,
  type RemoteTool,
  type ToolCallRequest,
  type ToolProviderClient,
} from '@lingshu/shared';
import type { ModelProvider } from '@lingshu/models';
import { jsonSchemaToZod, toFunctionToolSpec } from '@lingshu/tools';

export interface AgentDeps {
  client: ToolProviderClient;
  provider: ModelProvider;
  /** Reasoning model id sent with every chat request */
  model: string;
  logger?: Logger;
}

export type ToolCallOutcome =
  | { status: 'invoked'; call: ToolCallRequest; args: Record<string, unknown>; result: unknown }
  | { status: 'rejected'; call: ToolCallRequest; error: string };

export type AgentRunResult =
  | { kind: 'reply'; content: string }
  | { kind: 'tool_calls'; content: string | null; outcomes: ToolCallOutcome[] };

export interface AgentHooks {
  onToolCall?: (call: ToolCallRequest, args: Record<string, unknown>) => void;
  onToolResult?: (call: ToolCallRequest, result: unknown) => void;
  onToolRejected?: (call: ToolCallRequest, error: string) => void;
}

interface DiscoveredTool {
  tool: RemoteTool;
  validator: ZodTypeAny;
}

/**
 * Runs one reasoning turn against the discovered tools and dispatches the
 * tool calls the model asks for, one after another.
 */
export class OrchestratingAgent {
  private client: ToolProviderClient;
  private provider: ModelProvider;
  private model: string;
  private logger?: Logger;
  private tools = new Map<string, DiscoveredTool>();
  private discovered = false;

  constructor(deps: AgentDeps) {
    this.client = deps.client;
    this.provider = deps.provider;
    this.model = deps.model;
    this.logger = deps.logger?.child('agent');
  }

  async discover(): Promise<RemoteTool[]> {
    const tools = await this.client.listTools();
    this.tools.clear();
    for (const tool of tools) {
      this.tools.set(tool.name, { tool, validator: jsonSchemaToZod(tool.inputSchema) });
    }
    this.discovered = true;
    this.logger?.debug(`Discovered ${tools.length} tools: ${tools.map(t => t.name).join(', ')}`);
    return tools;
  }

  listTools(): RemoteTool[] {
    return Array.from(this.tools.values(), entry => entry.tool);
  }

  async run(query: string, hooks: AgentHooks = {}): Promise<AgentRunResult> {
    if (!this.discovered) {
      await this.discover();
    }

    const response = await this.provider.chat({
      model: this.model,
      messages: [{ role: 'user', content: query }],
      tools: this.listTools().map(toFunctionToolSpec),
      toolChoice: 'auto',
    });

    if (response.toolCalls.length === 0) {
      return { kind: 'reply', content: response.content ?? '' };
    }

    const outcomes: ToolCallOutcome[] = [];
    for (const call of response.toolCalls) {
      outcomes.push(await this.dispatch(call, hooks));
    }
    return { kind: 'tool_calls', content: response.content, outcomes };
  }

  private async dispatch(call: ToolCallRequest, hooks: AgentHooks): Promise<ToolCallOutcome> {
    let args: Record<string, unknown>;
    try {
      args = this.parseArguments(call);
    } catch (err) {
      const error = describeError(err);
      this.logger?.warn(`Rejected tool call ${call.name}: ${error}`);
      hooks.onToolRejected?.(call, error);
      return { status: 'rejected', call, error };
    }

    hooks.onToolCall?.(call, args);
    const result = await this.client.callTool(call.name, args);
    hooks.onToolResult?.(call, result);
    return { status: 'invoked', call, args, result };
  }

  /**
   * Strict JSON, must be an object, must satisfy the tool's advertised
   * input schema. Anything else is refused before it reaches the provider.
   */
  parseArguments(call: ToolCallRequest): Record<string, unknown> {
    const entry = this.tools.get(call.name);
    if (!entry) {
      throw new ToolNotFoundError(call.name);
    }

    const text = call.arguments.trim();
    let raw: unknown;
    if (text === '') {
      raw = {};
    } else {
      try {
        raw = JSON.parse(text);
      } catch (err) {
        throw new ToolArgumentsError(call.name, `not valid JSON (${describeError(err)})`);
      }
    }

    if (!isRecord(raw)) {
      throw new ToolArgumentsError(call.name, 'expected a JSON object');
    }

    const result = entry.validator.safeParse(raw);
    if (!result.success) {
      throw new ToolArgumentsError(call.name, formatIssues(result.error));
    }
    return raw;
  }
}
