import type { FunctionToolSpec, ToolCallRequest } from './tool.js';

export interface ChatMessageImage {
  /** base64-encoded image data */
  data: string;
  mediaType: 'image/png';
}

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
  /** Optional images for multimodal messages (vision) */
  images?: ChatMessageImage[];
}

export interface ModelRequest {
  model: string;
  system?: string;
  messages: ChatMessage[];
  maxTokens?: number;
  temperature?: number;
  tools?: FunctionToolSpec[];
  toolChoice?: 'auto' | 'none';
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface ModelResponse {
  model: string;
  content: string | null;
  toolCalls: ToolCallRequest[];
  tokenUsage: TokenUsage;
  latencyMs: number;
  finishReason: 'stop' | 'length' | 'tool_calls' | 'error';
}

export interface GenerateOptions {
  /** base64-encoded image attached after the prompt text */
  imageData?: string;
  maxTokens: number;
  temperature: number;
}

export interface BackendModel {
  readonly model: string;
  generate(prompt: string, options: GenerateOptions): Promise<string>;
}
