import type { LLMPort, LLMRequest, LLMResponse } from '../../ports/LLMPort.js';
import { createLogger } from '../../utils/logger.js';

export class DisabledLLMAdapter implements LLMPort {
  private readonly logger = createLogger({ adapter: 'DisabledLLMAdapter' });

  async generateText(_request: LLMRequest): Promise<LLMResponse> {
    this.logger.warn('LLM adapter is disabled (ANTHROPIC_API_KEY not set); returning empty response');
    return { text: '' };
  }
}
