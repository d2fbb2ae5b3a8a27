import { describe, it, expect, vi, beforeEach } from 'vitest';

const { createMock, constructorOptions } = vi.hoisted(() => {
  const constructorOptions: unknown[] = [];
  return { createMock: vi.fn(), constructorOptions };
});

vi.mock('openai', () => ({
  default: class {
    chat = { completions: { create: createMock } };
    constructor(options: unknown) {
      constructorOptions.push(options);
    }
  },
}));

import { OpenAICompatProvider } from '../src/providers/openai-compat.js';

function completion(message: Record<string, unknown>, finishReason = 'stop') {
  return {
    model: 'Lingshu-7B',
    choices: [{ index: 0, message, finish_reason: finishReason }],
    usage: { prompt_tokens: 12, completion_tokens: 8, total_tokens: 20 },
  };
}

describe('OpenAICompatProvider', () => {
  beforeEach(() => {
    createMock.mockReset();
    constructorOptions.length = 0;
  });

  it('configures the SDK client without retries', () => {
    new OpenAICompatProvider({ baseUrl: 'http://localhost:8000/v1', apiKey: 'test-key', timeoutMs: 5000 });
    expect(constructorOptions).toEqual([
      { baseURL: 'http://localhost:8000/v1', apiKey: 'test-key', timeout: 5000, maxRetries: 0 },
    ]);
  });

  it('sends plain text content when no image is attached', async () => {
    createMock.mockResolvedValue(completion({ role: 'assistant', content: 'Hello' }));
    const provider = new OpenAICompatProvider({ baseUrl: 'http://localhost:8000/v1', apiKey: 'test-key' });

    const response = await provider.chat({
      model: 'Lingshu-7B',
      messages: [{ role: 'user', content: 'Describe the scan' }],
      maxTokens: 2048,
      temperature: 0.1,
    });

    expect(createMock).toHaveBeenCalledWith({
      model: 'Lingshu-7B',
      messages: [{ role: 'user', content: 'Describe the scan' }],
      max_tokens: 2048,
      temperature: 0.1,
    });
    expect(response.content).toBe('Hello');
    expect(response.toolCalls).toEqual([]);
    expect(response.finishReason).toBe('stop');
    expect(response.tokenUsage).toEqual({ promptTokens: 12, completionTokens: 8, totalTokens: 20 });
  });

  it('sends text first and the image as a data URI', async () => {
    createMock.mockResolvedValue(completion({ role: 'assistant', content: 'Report' }));
    const provider = new OpenAICompatProvider({ baseUrl: 'http://localhost:8000/v1', apiKey: 'test-key' });

    await provider.chat({
      model: 'Lingshu-7B',
      messages: [{ role: 'user', content: 'Analyze', images: [{ data: 'QUJD', mediaType: 'image/png' }] }],
    });

    const params = createMock.mock.calls[0][0];
    expect(params.messages).toEqual([
      {
        role: 'user',
        content: [
          { type: 'text', text: 'Analyze' },
          { type: 'image_url', image_url: { url: 'data:image/png;base64,QUJD' } },
        ],
      },
    ]);
    expect(params).not.toHaveProperty('max_tokens');
  });

  it('passes tools with automatic choice and maps tool calls', async () => {
    createMock.mockResolvedValue(completion({
      role: 'assistant',
      content: null,
      tool_calls: [
        { id: 'call_1', type: 'function', function: { name: 'medical_qa', arguments: '{"question":"q"}' } },
      ],
    }, 'tool_calls'));
    const provider = new OpenAICompatProvider({ baseUrl: 'http://localhost:8000/v1', apiKey: 'test-key' });
    const tools = [{
      type: 'function' as const,
      function: {
        name: 'medical_qa',
        description: 'Answer medical questions',
        parameters: { type: 'object', properties: { question: { type: 'string' } }, required: ['question'] },
      },
    }];

    const response = await provider.chat({
      model: 'reasoner',
      system: 'Be brief.',
      messages: [{ role: 'user', content: 'q' }],
      tools,
    });

    const params = createMock.mock.calls[0][0];
    expect(params.tools).toEqual(tools);
    expect(params.tool_choice).toBe('auto');
    expect(params.messages[0]).toEqual({ role: 'system', content: 'Be brief.' });
    expect(response.content).toBeNull();
    expect(response.finishReason).toBe('tool_calls');
    expect(response.toolCalls).toEqual([{ id: 'call_1', name: 'medical_qa', arguments: '{"question":"q"}' }]);
  });

  it('returns null content when the backend sends no choices', async () => {
    createMock.mockResolvedValue({ model: 'Lingshu-7B', choices: [] });
    const provider = new OpenAICompatProvider({ baseUrl: 'http://localhost:8000/v1', apiKey: 'test-key' });

    const response = await provider.chat({ model: 'Lingshu-7B', messages: [{ role: 'user', content: 'x' }] });

    expect(response.content).toBeNull();
    expect(response.finishReason).toBe('error');
    expect(response.tokenUsage.totalTokens).toBe(0);
  });
});
