import { z } from 'zod';
import type { PromptPort, PromptRequest, PromptResult } from '../../ports/PromptPort.js';
import { createLogger } from '../../utils/logger.js';
import { PromptHandlerError, type PromptErrorKind } from '../../utils/errors.js';

const ERROR_KINDS = ['unavailable', 'rejected', 'empty', 'timeout'] as const satisfies readonly PromptErrorKind[];

const backendResponseSchema = z.union([
  z.object({ reply: z.string() }),
  z.object({ error: z.string() }),
]);

function toErrorKind(value: string): PromptErrorKind {
  const known = ERROR_KINDS.find((kind) => kind === value);
  return known ?? 'rejected';
}

/** Forwards prompts to an HTTP backend: POST JSON `{chatId, text, ...}`, expects `{reply}` or `{error}`. */
export class HttpPromptAdapter implements PromptPort {
  private readonly logger = createLogger({ adapter: 'HttpPromptAdapter' });

  constructor(private readonly backendUrl: string) {}

  async initialize(): Promise<void> {
    this.logger.info({ backendUrl: this.backendUrl }, 'Using HTTP prompt backend');
  }

  async handle(request: PromptRequest, signal: AbortSignal): Promise<PromptResult> {
    const logger = this.logger.child({ method: 'handle', chatId: request.chatId });

    let response: Response;
    try {
      response = await fetch(this.backendUrl, {
        method: 'POST',
        headers: { 'content-type': 'application/json', accept: 'application/json' },
        body: JSON.stringify(request),
        signal,
      });
    } catch (error) {
      logger.error({ err: error }, 'Prompt backend request failed');
      throw new PromptHandlerError('unavailable', 'Prompt backend request failed', { cause: error });
    }

    if (!response.ok) {
      logger.error({ status: response.status }, 'Prompt backend returned an error status');
      throw new PromptHandlerError(
        response.status >= 500 ? 'unavailable' : 'rejected',
        `Prompt backend error: ${response.status}`
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new PromptHandlerError('unavailable', 'Prompt backend returned invalid JSON', { cause: error });
    }

    const parsed = backendResponseSchema.safeParse(body);
    if (!parsed.success) {
      logger.error({ issues: parsed.error.issues }, 'Prompt backend returned an unexpected body');
      throw new PromptHandlerError('unavailable', 'Prompt backend returned an unexpected body');
    }

    if ('reply' in parsed.data) {
      return { reply: parsed.data.reply };
    }
    logger.warn({ error: parsed.data.error }, 'Prompt backend reported an error');
    return { error: toErrorKind(parsed.data.error) };
  }
}
