import Anthropic, { APIError } from '@anthropic-ai/sdk';
import type { LLMPort, LLMRequest, LLMResponse } from '../../ports/LLMPort.js';
import type { Config } from '../../config/index.js';
import { createLogger } from '../../utils/logger.js';
import { LLMError } from '../../utils/errors.js';

export type ClaudeAdapterConfig = Pick<Config, 'anthropicApiKey' | 'llmModel' | 'requestTimeoutSeconds'>;

export class ClaudeAdapter implements LLMPort {
  private readonly logger = createLogger({ adapter: 'ClaudeAdapter' });
  private readonly client: Anthropic;
  private readonly model: string;

  constructor(config: ClaudeAdapterConfig) {
    this.client = new Anthropic({
      apiKey: config.anthropicApiKey,
      maxRetries: 2,
      timeout: config.requestTimeoutSeconds * 1000,
    });
    this.model = config.llmModel ?? 'claude-sonnet-4-5';
    this.logger.info({ model: this.model }, 'Claude adapter initialized');
  }

  async generateText(request: LLMRequest): Promise<LLMResponse> {
    const logger = this.logger.child({ method: 'generateText' });
    try {
      const response = await this.client.messages.create(
        {
          model: this.model,
          max_tokens: request.maxTokens ?? 1024,
          temperature: request.temperature ?? 0.7,
          system: request.systemPrompt,
          messages: [
            {
              role: 'user',
              content: request.prompt,
            },
          ],
        },
        { signal: request.signal }
      );

      const text = this.extractText(response);
      const usage = { inputTokens: response.usage.input_tokens, outputTokens: response.usage.output_tokens };

      logger.debug({ usage }, 'Claude generation completed');

      return { text, usage };
    } catch (error) {
      const status = error instanceof APIError ? error.status : undefined;
      logger.error({ err: error, status }, 'Claude text generation failed');
      throw new LLMError('Claude text generation failed', { cause: error, status });
    }
  }

  private extractText(response: Anthropic.Message): string {
    for (const block of response.content) {
      if (block.type === 'text') {
        return block.text;
      }
    }
    return '';
  }
}
