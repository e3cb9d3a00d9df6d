import { z } from 'zod';
import { TransportError } from '../../utils/errors.js';

// Shape of errors thrown by node-telegram-bot-api (EFATAL, EPARSE, ETELEGRAM)
const libraryErrorSchema = z.object({
  code: z.string(),
  message: z.string().optional(),
  response: z.unknown().optional(),
});

const telegramResponseSchema = z.object({
  statusCode: z.number().optional(),
  body: z
    .object({
      error_code: z.number().optional(),
      description: z.string().optional(),
      parameters: z.object({ retry_after: z.number().optional() }).optional(),
    })
    .optional()
    .catch(undefined),
});

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function classifyTelegramError(error: unknown): TransportError {
  if (error instanceof TransportError) {
    return error;
  }

  const parsed = libraryErrorSchema.safeParse(error);
  if (!parsed.success || parsed.data.code !== 'ETELEGRAM') {
    // EFATAL (connection), EPARSE (garbled response) and unknown failures
    return new TransportError('NetworkError', `Telegram request failed: ${messageOf(error)}`, {
      cause: error,
    });
  }

  const response = telegramResponseSchema.safeParse(parsed.data.response);
  const body = response.success ? response.data.body : undefined;
  const status = body?.error_code ?? (response.success ? response.data.statusCode : undefined);
  const description = body?.description ?? parsed.data.message ?? 'unknown error';

  if (status === 401 || status === 404) {
    return new TransportError('AuthError', `Telegram rejected the bot token: ${description}`, {
      cause: error,
    });
  }
  if (status === 429) {
    const retryAfter = body?.parameters?.retry_after;
    return new TransportError('RateLimited', `Telegram rate limit: ${description}`, {
      cause: error,
      retryAfterMs: retryAfter !== undefined ? retryAfter * 1000 : undefined,
    });
  }
  if (status !== undefined && status >= 400 && status < 500) {
    return new TransportError('Rejected', `Telegram refused the request: ${description}`, {
      cause: error,
    });
  }
  return new TransportError('NetworkError', `Telegram request failed: ${description}`, { cause: error });
}
