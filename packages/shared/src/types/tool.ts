import type { AnyZodObject, z } from 'zod';

export type ToolParameterType = 'string' | 'number' | 'integer' | 'boolean' | 'array' | 'object';

/** One entry of a tool's declared input mapping. */
export type ToolParameter = {
  type: ToolParameterType;
  description?: string;
  required: boolean;
  default?: unknown;
  enum?: string[];
  items?: { type: ToolParameterType };
};

export type ToolInputSchema = Record<string, ToolParameter>;

export interface ToolDescriptor {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
}

export interface ToolErrorEnvelope {
  status: 'error';
  error: string;
  timestamp: string;
}

export interface ToolSuccessEnvelope {
  status: 'success';
  language: string;
  timestamp: string;
  /** Backend model that produced the payload */
  model: string;
}

export interface ImageAnalysisEnvelope extends ToolSuccessEnvelope {
  analysis_type: string;
  report: string;
}

export interface MedicalReportEnvelope extends ToolSuccessEnvelope {
  report_type: string;
  template: string;
  report: string;
  findings_count: number;
}

export interface MedicalAnswerEnvelope extends ToolSuccessEnvelope {
  question: string;
  specialty: string;
  answer: string;
}

export type ToolResultEnvelope =
  | ToolErrorEnvelope
  | ImageAnalysisEnvelope
  | MedicalReportEnvelope
  | MedicalAnswerEnvelope;

export interface ToolDefinition<
  TSchema extends AnyZodObject = AnyZodObject,
  TResult extends ToolResultEnvelope = ToolResultEnvelope,
> {
  name: string;
  description: string;
  inputSchema: TSchema;
  execute(input: z.output<TSchema>): Promise<TResult>;
}

export interface ToolInvocation {
  toolName: string;
  input: unknown;
}

// JSON Schema as it travels over MCP and into function-calling requests
export type JsonSchema = { [key: string]: unknown };

export type JsonObjectSchema = {
  type: 'object';
  properties: Record<string, JsonSchema>;
  required?: string[];
  additionalProperties?: boolean;
};

/** A tool as seen by a client after discovery. */
export interface RemoteTool {
  name: string;
  description: string;
  inputSchema: JsonObjectSchema;
}

export type FunctionToolSpec = {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: {
      type: string;
      properties: Record<string, JsonSchema>;
      required: string[];
    };
  };
};

export interface ToolCallRequest {
  id: string;
  name: string;
  /** Raw argument string as emitted by the reasoning model */
  arguments: string;
}

export interface ToolProviderClient {
  listTools(): Promise<RemoteTool[]>;
  callTool(name: string, args: Record<string, unknown>): Promise<unknown>;
}
