import type { JsonSchema, RemoteTool, ToolCallRequest } from '@lingshu/shared';

export function formatPayload(payload: unknown): string {
  return typeof payload === 'string' ? payload : JSON.stringify(payload, null, 2);
}

function formatParameter(name: string, schema: JsonSchema, required: boolean): string {
  const type = typeof schema.type === 'string' ? schema.type : 'any';
  const flags = [type, required ? 'required' : undefined];
  if (schema.default !== undefined) flags.push(`default ${JSON.stringify(schema.default)}`);
  const description = typeof schema.description === 'string' ? ` - ${schema.description}` : '';
  return `    ${name} (${flags.filter(Boolean).join(', ')})${description}`;
}

export function formatToolList(tools: RemoteTool[]): string {
  const lines: string[] = [`Available tools (${tools.length}):`];

  for (const tool of tools) {
    const required = tool.inputSchema.required ?? [];
    lines.push('');
    lines.push(`  ${tool.name}`);
    lines.push(`    ${tool.description}`);
    for (const [name, schema] of Object.entries(tool.inputSchema.properties)) {
      lines.push(formatParameter(name, schema, required.includes(name)));
    }
  }

  return lines.join('\n');
}

export function formatToolCall(call: ToolCallRequest, args: Record<string, unknown>): string {
  return `Calling tool: ${call.name}\nArguments: ${JSON.stringify(args, null, 2)}`;
}

export function formatToolResult(result: unknown): string {
  return `Tool result:\n${formatPayload(result)}`;
}

export function formatRejection(call: ToolCallRequest, error: string): string {
  return `[REJECTED] ${call.name}: ${error}`;
}

export function formatReply(content: string): string {
  return `Direct response:\n${content}`;
}
