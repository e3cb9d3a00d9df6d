import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';

const positiveInt = z.coerce.number().int().positive();

const configSchema = z.object({
  // Telegram
  botToken: z.string().trim().min(1),
  telegramWebhookUrl: z.string().url().optional(), // Optional: if not set, uses polling
  pollTimeoutSeconds: z.coerce.number().int().min(0).max(50).default(25),
  sendMaxAttempts: positiveInt.default(5),

  // Prompt handler
  promptBackendUrl: z.string().url().optional(), // Optional: if not set, uses the local handler
  requestTimeoutSeconds: positiveInt.default(30),

  // Anthropic (local handler only)
  anthropicApiKey: z.string().min(1).optional(),
  llmModel: z.string().optional(),

  // Relay
  rateLimitPerMinute: positiveInt.default(5),
  historyMaxItems: positiveInt.default(5),
  sessionIdleMinutes: positiveInt.default(30),
  shutdownTimeoutSeconds: positiveInt.default(10),

  // App
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  host: z.string().default('0.0.0.0'),
  port: positiveInt.default(5000),
});

export type Config = z.infer<typeof configSchema>;

export type Env = Record<string, string | undefined>;

export function loadConfig(source: Env = process.env): Config {
  // Helper to convert empty strings to undefined
  const env = (key: string): string | undefined => {
    const value = source[key];
    return value === undefined || value.trim() === '' ? undefined : value;
  };

  const botToken = env('BOT_TOKEN');
  if (!botToken) {
    throw new ConfigError('BOT_TOKEN is not set. Pass it in the environment or add it to .env');
  }

  const raw = {
    botToken,
    telegramWebhookUrl: env('TELEGRAM_WEBHOOK_URL'),
    pollTimeoutSeconds: env('POLL_TIMEOUT_SECONDS'),
    sendMaxAttempts: env('SEND_MAX_ATTEMPTS'),
    promptBackendUrl: env('PROMPT_BACKEND_URL'),
    requestTimeoutSeconds: env('REQUEST_TIMEOUT_SECONDS'),
    anthropicApiKey: env('ANTHROPIC_API_KEY'),
    llmModel: env('LLM_MODEL'),
    rateLimitPerMinute: env('RATE_LIMIT_PER_MINUTE'),
    historyMaxItems: env('HISTORY_MAX_ITEMS'),
    sessionIdleMinutes: env('SESSION_IDLE_MINUTES'),
    shutdownTimeoutSeconds: env('SHUTDOWN_TIMEOUT_SECONDS'),
    logLevel: env('LOG_LEVEL'),
    host: env('HOST'),
    port: env('PORT'),
  };

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Configuration validation failed:\n${issues.join('\n')}`);
  }
  return result.data;
}
