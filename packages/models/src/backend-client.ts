import {
  BackendModelError,
  describeError,
  type BackendModel,
  type ChatMessage,
  type GenerateOptions,
  type Logger,
  type ModelEndpointConfig,
  type ModelResponse,
} from '@lingshu/shared';
import type { ModelProvider } from './provider.js';
import { OpenAICompatProvider } from './providers/openai-compat.js';

export interface BackendModelClientOptions {
  provider: ModelProvider;
  model: string;
  logger?: Logger;
}

/**
 * Turns a prompt (and optionally one image) into a single chat completion.
 * Every failure leaves here as a BackendModelError.
 */
export class BackendModelClient implements BackendModel {
  readonly model: string;

  private provider: ModelProvider;
  private logger?: Logger;

  constructor(options: BackendModelClientOptions) {
    this.provider = options.provider;
    this.model = options.model;
    this.logger = options.logger;
  }

  static fromConfig(config: ModelEndpointConfig, logger?: Logger): BackendModelClient {
    return new BackendModelClient({
      provider: new OpenAICompatProvider({
        baseUrl: config.baseUrl,
        apiKey: config.apiKey,
        timeoutMs: config.timeoutMs,
      }),
      model: config.model,
      logger,
    });
  }

  async generate(prompt: string, options: GenerateOptions): Promise<string> {
    const message: ChatMessage = { role: 'user', content: prompt };
    if (options.imageData) {
      message.images = [{ data: options.imageData, mediaType: 'image/png' }];
    }

    let response: ModelResponse;
    try {
      response = await this.provider.chat({
        model: this.model,
        messages: [message],
        maxTokens: options.maxTokens,
        temperature: options.temperature,
      });
    } catch (err) {
      this.logger?.error(`Error calling ${this.model}: ${describeError(err)}`);
      throw new BackendModelError(describeError(err), err);
    }

    if (!response.content?.trim()) {
      this.logger?.error(`${this.model} returned no completion text (finish reason: ${response.finishReason})`);
      throw new BackendModelError('backend returned no completion text');
    }

    this.logger?.debug(
      `${this.model} answered in ${response.latencyMs.toFixed(0)}ms (${response.tokenUsage.totalTokens} tokens)`,
    );
    return response.content;
  }
}
