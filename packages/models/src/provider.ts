import type { ModelRequest, ModelResponse } from '@lingshu/shared';

export abstract class ModelProvider {
  abstract readonly name: string;

  abstract chat(request: ModelRequest): Promise<ModelResponse>;
}
