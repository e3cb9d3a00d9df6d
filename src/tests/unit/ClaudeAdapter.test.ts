import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ClaudeAdapter } from '../../adapters/llm/ClaudeAdapter.js';
import { LLMError } from '../../utils/errors.js';

const { create, AnthropicMock, MockAPIError } = vi.hoisted(() => {
  const create = vi.fn();
  const AnthropicMock = vi.fn(function () {
    return { messages: { create } };
  });
  class MockAPIError extends Error {
    constructor(
      readonly status: number | undefined,
      message: string
    ) {
      super(message);
    }
  }
  return { create, AnthropicMock, MockAPIError };
});

vi.mock('@anthropic-ai/sdk', () => ({ default: AnthropicMock, APIError: MockAPIError }));

describe('ClaudeAdapter', () => {
  beforeEach(() => {
    create.mockReset();
    AnthropicMock.mockClear();
  });

  it('should send the system prompt and return the first text block', async () => {
    create.mockResolvedValue({
      content: [{ type: 'text', text: 'A cat on a roof' }],
      usage: { input_tokens: 12, output_tokens: 7 },
    });
    const adapter = new ClaudeAdapter({ anthropicApiKey: 'test-key', requestTimeoutSeconds: 30 });
    const signal = new AbortController().signal;

    const response = await adapter.generateText({ prompt: 'cat', systemPrompt: 'Write image prompts', signal });

    expect(response).toEqual({ text: 'A cat on a roof', usage: { inputTokens: 12, outputTokens: 7 } });
    expect(create).toHaveBeenCalledWith(
      {
        model: 'claude-sonnet-4-5',
        max_tokens: 1024,
        temperature: 0.7,
        system: 'Write image prompts',
        messages: [{ role: 'user', content: 'cat' }],
      },
      { signal }
    );
    expect(AnthropicMock).toHaveBeenCalledWith({ apiKey: 'test-key', maxRetries: 2, timeout: 30_000 });
  });

  it('should use the configured model', async () => {
    create.mockResolvedValue({ content: [], usage: { input_tokens: 1, output_tokens: 0 } });
    const adapter = new ClaudeAdapter({ anthropicApiKey: 'test-key', llmModel: 'claude-test', requestTimeoutSeconds: 5 });

    const response = await adapter.generateText({ prompt: 'cat' });

    expect(response.text).toBe('');
    expect(create.mock.calls[0]?.[0]).toMatchObject({ model: 'claude-test' });
  });

  it('should wrap API failures in LLMError', async () => {
    create.mockRejectedValue(new Error('overloaded'));
    const adapter = new ClaudeAdapter({ anthropicApiKey: 'test-key', requestTimeoutSeconds: 30 });

    await expect(adapter.generateText({ prompt: 'cat' })).rejects.toBeInstanceOf(LLMError);
  });

  it('should keep the HTTP status of API errors', async () => {
    create.mockRejectedValue(new MockAPIError(429, 'rate_limit_error'));
    const adapter = new ClaudeAdapter({ anthropicApiKey: 'test-key', requestTimeoutSeconds: 30 });

    await expect(adapter.generateText({ prompt: 'cat' })).rejects.toMatchObject({ name: 'LLMError', status: 429 });
  });

  it('should leave the status empty for connection failures', async () => {
    create.mockRejectedValue(new Error('socket hang up'));
    const adapter = new ClaudeAdapter({ anthropicApiKey: 'test-key', requestTimeoutSeconds: 30 });

    await expect(adapter.generateText({ prompt: 'cat' })).rejects.toMatchObject({ status: undefined });
  });
});
