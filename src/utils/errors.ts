export class RelayError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'RelayError';
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigError extends RelayError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIG_ERROR', options);
    this.name = 'ConfigError';
  }
}

export type TransportErrorKind = 'AuthError' | 'NetworkError' | 'RateLimited' | 'Rejected';

export interface TransportErrorOptions extends ErrorOptions {
  /** Server-suggested wait before the next attempt (RateLimited only). */
  retryAfterMs?: number;
}

export class TransportError extends RelayError {
  public readonly kind: TransportErrorKind;
  public readonly retryAfterMs: number | undefined;

  constructor(kind: TransportErrorKind, message: string, options?: TransportErrorOptions) {
    super(message, `TRANSPORT_${kind.replace(/Error$/, '').toUpperCase()}`, options);
    this.name = 'TransportError';
    this.kind = kind;
    this.retryAfterMs = options?.retryAfterMs;
  }

  get retryable(): boolean {
    return this.kind === 'NetworkError' || this.kind === 'RateLimited';
  }
}

export function isAuthError(error: unknown): error is TransportError {
  return error instanceof TransportError && error.kind === 'AuthError';
}

export type PromptErrorKind = 'unavailable' | 'rejected' | 'empty' | 'timeout';

export class PromptHandlerError extends RelayError {
  public readonly kind: PromptErrorKind;

  constructor(kind: PromptErrorKind, message: string, options?: ErrorOptions) {
    super(message, 'PROMPT_HANDLER', options);
    this.name = 'PromptHandlerError';
    this.kind = kind;
  }
}

export class PromptTimeoutError extends PromptHandlerError {
  constructor(timeoutMs: number, options?: ErrorOptions) {
    super('timeout', `Prompt handler did not finish within ${timeoutMs}ms`, options);
    this.name = 'PromptTimeoutError';
  }
}

export interface LLMErrorOptions extends ErrorOptions {
  /** HTTP status of the provider's response, when there was one. */
  status?: number;
}

export class LLMError extends RelayError {
  public readonly status: number | undefined;

  constructor(message: string, options?: LLMErrorOptions) {
    super(message, 'LLM_ERROR', options);
    this.name = 'LLMError';
    this.status = options?.status;
  }
}
