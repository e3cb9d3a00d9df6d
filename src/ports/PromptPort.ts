import type { PromptErrorKind } from '../utils/errors.js';

export const CATEGORIES = ['image', 'code', 'video', 'text'] as const;

export type Category = (typeof CATEGORIES)[number];

export function isCategory(value: string): value is Category {
  return (CATEGORIES as readonly string[]).includes(value);
}

export interface PromptRequest {
  chatId: string;
  text: string;
  category?: Category;
  /** Prompt to refine; `text` then holds the requested changes. */
  previous?: string;
}

export type PromptResult = { reply: string } | { error: PromptErrorKind };

export interface PromptPort {
  initialize?(): Promise<void>;
  /** Must stop work and settle soon after `signal` aborts. */
  handle(request: PromptRequest, signal: AbortSignal): Promise<PromptResult>;
}
