import type { Category } from '../../ports/PromptPort.js';
import type { PromptErrorKind } from '../../utils/errors.js';
import type { HistoryEntry } from './SessionStore.js';

export const CATEGORY_EMOJI: Record<Category, string> = {
  image: '🖼',
  code: '💻',
  video: '🎬',
  text: '✍️',
};

export const MSG_WELCOME =
  '👋 Hi!\n\n' +
  'I turn a short description into a strong prompt for AI tools.\n' +
  'Pick a category, describe what you want, and I will write a ready-to-use prompt.\n\n' +
  '/image · /code · /video · /text\n\n' +
  'Current category: text. Just send your description.';

export const MSG_HELP =
  '📖 Commands\n\n' +
  '/start: show the welcome message\n' +
  '/image, /code, /video, /text: choose a category\n' +
  '/refine <changes>: rework the last prompt\n' +
  '/history: last generated prompts\n' +
  '/cancel: forget the last prompt and go back to text\n' +
  '/help: this message\n\n' +
  '💡 How it works\n' +
  '1. Choose a category\n' +
  '2. Describe your idea in a few words or sentences\n' +
  '3. Copy the generated prompt into your AI tool';

export const CATEGORY_REQUESTS: Record<Category, string> = {
  image: `${CATEGORY_EMOJI.image} Image prompt\n\nDescribe what you want in the image (subject, style, mood, details):`,
  code: `${CATEGORY_EMOJI.code} Code prompt\n\nDescribe the task (language, what the code should do, any constraints):`,
  video: `${CATEGORY_EMOJI.video} Video prompt\n\nDescribe the scene or story (action, camera, style, length):`,
  text: `${CATEGORY_EMOJI.text} Text prompt\n\nDescribe what you need (topic, tone, audience, format):`,
};

export const MSG_GENERATING = '⏳ Writing your prompt…';
export const MSG_BUSY = '⏳ Still working on your previous request. Please wait for the reply before sending another one.';
export const MSG_RATE_LIMIT = '⏳ Too many requests. Please wait a minute and try again.';
export const MSG_CANCEL = '↩️ Done. Category is back to text. Send a description or choose /image, /code or /video.';
export const MSG_HISTORY_EMPTY = '📭 No generated prompts yet. Send a description to create one.';
export const MSG_NOTHING_TO_REFINE = '✏️ There is no prompt to refine yet. Send a description first.';
export const MSG_REFINE_USAGE = '✏️ Tell me what to change, e.g. /refine make it shorter and add a sunset';
export const MSG_UNKNOWN_COMMAND = '🤔 Unknown command. Send /help to see what I can do.';

export const MSG_ERROR_NETWORK = '❌ Network error or timeout. Please try again.';
export const MSG_ERROR_API = '❌ The prompt service refused the request. Please try again later.';
export const MSG_ERROR_UNKNOWN = '❌ Something went wrong. Please try again or describe your idea differently.';

export function apologyFor(kind: PromptErrorKind): string {
  switch (kind) {
    case 'timeout':
    case 'unavailable':
      return MSG_ERROR_NETWORK;
    case 'rejected':
      return MSG_ERROR_API;
    case 'empty':
      return MSG_ERROR_UNKNOWN;
  }
}

const PREVIEW_LENGTH = 200;

export function previewOf(text: string): string {
  return text.length > PREVIEW_LENGTH ? `${text.slice(0, PREVIEW_LENGTH)}…` : text;
}

/** Newest first, numbered from 1. */
export function formatHistory(history: readonly HistoryEntry[]): string {
  if (history.length === 0) {
    return MSG_HISTORY_EMPTY;
  }
  const lines = [...history]
    .reverse()
    .map((entry, i) => `${i + 1}. ${CATEGORY_EMOJI[entry.category]} ${entry.category}: ${entry.preview}`);
  return `📜 Last ${history.length} prompts:\n\n${lines.join('\n')}`;
}
