import OpenAI from 'openai';
import type { ChatCompletionContentPart, ChatCompletionMessageParam } from 'openai/resources';
import {
  monotonicNow,
  type ChatMessage,
  type ModelRequest,
  type ModelResponse,
  type ToolCallRequest,
} from '@lingshu/shared';
import { ModelProvider } from '../provider.js';

export interface OpenAICompatConfig {
  baseUrl: string;
  apiKey: string;
  timeoutMs?: number;
}

function toChatMessage(msg: ChatMessage): ChatCompletionMessageParam {
  if (msg.role === 'system') return { role: 'system', content: msg.content };
  if (msg.role === 'assistant') return { role: 'assistant', content: msg.content };
  if (!msg.images?.length) return { role: 'user', content: msg.content };

  // Text part first, then each image as a data URI
  const parts: ChatCompletionContentPart[] = [{ type: 'text', text: msg.content }];
  for (const img of msg.images) {
    parts.push({
      type: 'image_url',
      image_url: { url: `data:${img.mediaType};base64,${img.data}` },
    });
  }
  return { role: 'user', content: parts };
}

function toFinishReason(reason: string | null | undefined): ModelResponse['finishReason'] {
  switch (reason) {
    case 'stop':
      return 'stop';
    case 'length':
      return 'length';
    case 'tool_calls':
    case 'function_call':
      return 'tool_calls';
    default:
      return 'error';
  }
}

/**
 * Chat-completions provider for any OpenAI-compatible endpoint
 * (vLLM, SGLang, OpenAI itself). Requests are sent once, never retried.
 */
export class OpenAICompatProvider extends ModelProvider {
  readonly name = 'openai-compat';

  private client: OpenAI;

  constructor(config: OpenAICompatConfig) {
    super();
    this.client = new OpenAI({
      baseURL: config.baseUrl,
      apiKey: config.apiKey,
      timeout: config.timeoutMs,
      maxRetries: 0,
    });
  }

  async chat(request: ModelRequest): Promise<ModelResponse> {
    const startTime = monotonicNow();

    const messages: ChatCompletionMessageParam[] = [];
    if (request.system) {
      messages.push({ role: 'system', content: request.system });
    }
    for (const msg of request.messages) {
      messages.push(toChatMessage(msg));
    }

    const response = await this.client.chat.completions.create({
      model: request.model,
      messages,
      ...(request.maxTokens !== undefined ? { max_tokens: request.maxTokens } : {}),
      ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
      ...(request.tools?.length
        ? { tools: request.tools, tool_choice: request.toolChoice ?? 'auto' }
        : {}),
    });

    const choice = response.choices.at(0);
    const toolCalls: ToolCallRequest[] = (choice?.message.tool_calls ?? []).map(call => ({
      id: call.id,
      name: call.function.name,
      arguments: call.function.arguments,
    }));

    return {
      model: response.model || request.model,
      content: choice?.message.content ?? null,
      toolCalls,
      tokenUsage: {
        promptTokens: response.usage?.prompt_tokens ?? 0,
        completionTokens: response.usage?.completion_tokens ?? 0,
        totalTokens: response.usage?.total_tokens ?? 0,
      },
      latencyMs: monotonicNow() - startTime,
      finishReason: toFinishReason(choice?.finish_reason),
    };
  }
}
