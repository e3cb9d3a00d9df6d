import { isCategory } from '../../ports/PromptPort.js';
import type { SessionStore } from './SessionStore.js';
import {
  CATEGORY_REQUESTS,
  MSG_CANCEL,
  MSG_HELP,
  MSG_NOTHING_TO_REFINE,
  MSG_REFINE_USAGE,
  MSG_UNKNOWN_COMMAND,
  MSG_WELCOME,
  formatHistory,
} from './messages.js';

export interface Command {
  name: string;
  args: string;
}

export type CommandOutcome =
  | { kind: 'reply'; body: string }
  | { kind: 'refine'; previous: string; changes: string };

/** Parses `/name args` and `/name@botname args`; returns null for plain text. */
export function parseCommand(text: string): Command | null {
  const match = /^\/([A-Za-z0-9_]+)(?:@\w+)?(?:\s+([\s\S]*))?$/.exec(text.trim());
  if (!match?.[1]) {
    return null;
  }
  return { name: match[1].toLowerCase(), args: (match[2] ?? '').trim() };
}

export function executeCommand(command: Command, chatId: string, sessions: SessionStore): CommandOutcome {
  const { name, args } = command;

  if (isCategory(name)) {
    sessions.update(chatId, { category: name });
    return { kind: 'reply', body: CATEGORY_REQUESTS[name] };
  }

  switch (name) {
    case 'start':
      sessions.update(chatId, { category: 'text' });
      return { kind: 'reply', body: MSG_WELCOME };
    case 'help':
      return { kind: 'reply', body: MSG_HELP };
    case 'cancel':
      sessions.reset(chatId);
      return { kind: 'reply', body: MSG_CANCEL };
    case 'history':
      return { kind: 'reply', body: formatHistory(sessions.get(chatId).history) };
    case 'refine': {
      const previous = sessions.get(chatId).lastPrompt;
      if (!previous) {
        return { kind: 'reply', body: MSG_NOTHING_TO_REFINE };
      }
      if (!args) {
        return { kind: 'reply', body: MSG_REFINE_USAGE };
      }
      return { kind: 'refine', previous, changes: args };
    }
    default:
      return { kind: 'reply', body: MSG_UNKNOWN_COMMAND };
  }
}
