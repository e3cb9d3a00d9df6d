import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { LocalPromptAdapter, buildRefinementMessage } from '../../adapters/prompt/LocalPromptAdapter.js';
import type { LLMPort, LLMRequest, LLMResponse } from '../../ports/LLMPort.js';
import { DisabledLLMAdapter } from '../../adapters/llm/DisabledLLMAdapter.js';
import { LLMError } from '../../utils/errors.js';

describe('LocalPromptAdapter', () => {
  let generateText: Mock<(request: LLMRequest) => Promise<LLMResponse>>;
  let adapter: LocalPromptAdapter;
  const signal = new AbortController().signal;

  beforeEach(() => {
    generateText = vi.fn<(request: LLMRequest) => Promise<LLMResponse>>(async () => ({
      text: '  A cat on a red roof at sunset  ',
    }));
    const llm: LLMPort = { generateText };
    adapter = new LocalPromptAdapter(llm);
  });

  it('should use the system prompt for the category', async () => {
    const result = await adapter.handle({ chatId: '7', text: 'cat on a roof', category: 'image' }, signal);

    expect(result).toEqual({ reply: 'A cat on a red roof at sunset' });
    expect(generateText).toHaveBeenCalledWith({
      prompt: 'cat on a roof',
      systemPrompt: expect.stringContaining('AI image generators'),
      signal,
    });
  });

  it('should default to the text category', async () => {
    await adapter.handle({ chatId: '7', text: 'a cover letter' }, signal);

    expect(generateText.mock.calls[0]?.[0].systemPrompt).toContain('text assistants');
  });

  it('should rewrite the previous prompt when refining', async () => {
    await adapter.handle({ chatId: '7', text: 'make it orange', category: 'image', previous: 'A cat' }, signal);

    expect(generateText).toHaveBeenCalledWith({
      prompt: "Current prompt:\nA cat\n\nUser's requested changes or additions:\nmake it orange",
      systemPrompt: expect.stringContaining('You improve an existing prompt'),
      signal,
    });
  });

  it('should report an empty generation', async () => {
    generateText.mockResolvedValue({ text: '   ' });

    await expect(adapter.handle({ chatId: '7', text: 'cat' }, signal)).resolves.toEqual({ error: 'empty' });
  });

  it('should report the model as unavailable when it fails', async () => {
    generateText.mockRejectedValue(new LLMError('Claude text generation failed'));

    await expect(adapter.handle({ chatId: '7', text: 'cat' }, signal)).resolves.toEqual({ error: 'unavailable' });
  });

  it.each([401, 403, 429])('should report HTTP %i from the model as rejected', async (status) => {
    generateText.mockRejectedValue(new LLMError('Claude text generation failed', { status }));

    await expect(adapter.handle({ chatId: '7', text: 'cat' }, signal)).resolves.toEqual({ error: 'rejected' });
  });

  it('should report server errors from the model as unavailable', async () => {
    generateText.mockRejectedValue(new LLMError('Claude text generation failed', { status: 529 }));

    await expect(adapter.handle({ chatId: '7', text: 'cat' }, signal)).resolves.toEqual({ error: 'unavailable' });
  });

  it('should let unexpected errors through', async () => {
    generateText.mockRejectedValue(new TypeError('bad state'));

    await expect(adapter.handle({ chatId: '7', text: 'cat' }, signal)).rejects.toThrow('bad state');
  });

  it('should report an empty generation when no model is configured', async () => {
    const disabled = new LocalPromptAdapter(new DisabledLLMAdapter());

    await expect(disabled.handle({ chatId: '7', text: 'cat' }, signal)).resolves.toEqual({ error: 'empty' });
  });

  it('should fail to initialize without a prompts directory', async () => {
    const broken = new LocalPromptAdapter({ generateText }, '/nonexistent/prompts');

    await expect(broken.initialize()).rejects.toThrow();
  });
});

describe('buildRefinementMessage', () => {
  it('should put the current prompt before the changes', () => {
    expect(buildRefinementMessage('old', 'new')).toBe(
      "Current prompt:\nold\n\nUser's requested changes or additions:\nnew"
    );
  });
});
