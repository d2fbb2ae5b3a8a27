import {
  describeError,
  formatIssues,
  isoNow,
  ToolNotFoundError,
  type Logger,
  type ToolDefinition,
  type ToolDescriptor,
  type ToolErrorEnvelope,
  type ToolInvocation,
  type ToolResultEnvelope,
} from '@lingshu/shared';
import { describeInputSchema } from '@lingshu/tools';

function errorEnvelope(error: string): ToolErrorEnvelope {
  return { status: 'error', error, timestamp: isoNow() };
}

export class ToolRegistry {
  private tools = new Map<string, ToolDefinition>();
  private logger?: Logger;

  constructor(logger?: Logger) {
    this.logger = logger?.child('registry');
  }

  register(tool: ToolDefinition): void {
    this.tools.set(tool.name, tool);
  }

  registerAll(tools: ToolDefinition[]): void {
    for (const tool of tools) {
      this.register(tool);
    }
  }

  list(): ToolDefinition[] {
    return Array.from(this.tools.values());
  }

  listNames(): string[] {
    return Array.from(this.tools.keys());
  }

  /** Declared parameter mapping of every registered tool, in registration order. */
  describe(): ToolDescriptor[] {
    return this.list().map(tool => ({
      name: tool.name,
      description: tool.description,
      inputSchema: describeInputSchema(tool.inputSchema),
    }));
  }

  /**
   * Validates the input against the tool's schema and runs it.
   * Never throws: unknown tools, schema violations and thrown errors
   * all come back as `error` envelopes.
   */
  async invoke(invocation: ToolInvocation): Promise<ToolResultEnvelope> {
    const tool = this.tools.get(invocation.toolName);
    if (!tool) {
      const error = new ToolNotFoundError(invocation.toolName);
      this.logger?.warn(error.message);
      return errorEnvelope(error.message);
    }

    const parsed = tool.inputSchema.safeParse(invocation.input);
    if (!parsed.success) {
      const error = `Invalid input: ${formatIssues(parsed.error)}`;
      this.logger?.warn(`${tool.name}: ${error}`);
      return errorEnvelope(error);
    }

    try {
      return await tool.execute(parsed.data);
    } catch (err) {
      this.logger?.error(`${tool.name} failed: ${describeError(err)}`);
      return errorEnvelope(describeError(err));
    }
  }
}
