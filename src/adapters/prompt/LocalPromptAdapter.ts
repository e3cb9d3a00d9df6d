import type { PromptPort, PromptRequest, PromptResult } from '../../ports/PromptPort.js';
import type { LLMPort } from '../../ports/LLMPort.js';
import { createLogger } from '../../utils/logger.js';
import { LLMError } from '../../utils/errors.js';
import { loadPromptCatalog, DEFAULT_PROMPTS_DIR, type PromptCatalog } from '../../utils/prompts.js';

// The provider refused the key or the quota, as opposed to being unreachable
const REJECTED_STATUSES = new Set([401, 403, 429]);

export function buildRefinementMessage(previous: string, changes: string): string {
  return `Current prompt:\n${previous}\n\nUser's requested changes or additions:\n${changes}`;
}

/**
 * In-process prompt handler: turns a short description into a ready-to-use prompt
 * for the chat's category, or rewrites the previous prompt with the requested changes.
 */
export class LocalPromptAdapter implements PromptPort {
  private readonly logger = createLogger({ adapter: 'LocalPromptAdapter' });
  private catalog: PromptCatalog | undefined;

  constructor(
    private readonly llm: LLMPort,
    private readonly promptsDir: string = DEFAULT_PROMPTS_DIR
  ) {}

  async initialize(): Promise<void> {
    this.catalog = await loadPromptCatalog(this.promptsDir);
    this.logger.info({ promptsDir: this.promptsDir }, 'Prompt catalog loaded');
  }

  async handle(request: PromptRequest, signal: AbortSignal): Promise<PromptResult> {
    const logger = this.logger.child({ method: 'handle', chatId: request.chatId });
    if (!this.catalog) {
      await this.initialize();
    }
    const catalog = this.catalog;
    if (!catalog) {
      return { error: 'unavailable' };
    }

    const refining = request.previous !== undefined;
    const category = request.category ?? 'text';
    const systemPrompt = refining ? catalog.refine : catalog.system[category];
    const prompt = request.previous !== undefined ? buildRefinementMessage(request.previous, request.text) : request.text;

    try {
      const response = await this.llm.generateText({ prompt, systemPrompt, signal });
      const text = response.text.trim();
      if (!text) {
        logger.warn({ category, refining }, 'LLM returned an empty prompt');
        return { error: 'empty' };
      }
      logger.info({ category, refining, length: text.length, usage: response.usage }, 'Prompt generated');
      return { reply: text };
    } catch (error) {
      if (error instanceof LLMError) {
        const rejected = error.status !== undefined && REJECTED_STATUSES.has(error.status);
        logger.warn({ status: error.status, rejected }, 'LLM call failed');
        return { error: rejected ? 'rejected' : 'unavailable' };
      }
      throw error;
    }
  }
}
