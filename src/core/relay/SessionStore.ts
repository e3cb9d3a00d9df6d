import type { Category } from '../../ports/PromptPort.js';

export interface HistoryEntry {
  category: Category;
  preview: string;
}

export interface SessionState {
  /** True while a prompt is in flight for the chat. */
  busy: boolean;
  lastActivity: number;
  category: Category;
  lastPrompt?: string;
  history: HistoryEntry[];
  /** Bumped by reset(); a reply for an older generation no longer becomes lastPrompt. */
  generation: number;
}

export type SessionPatch = Partial<Pick<SessionState, 'category' | 'lastPrompt'>>;

/**
 * Per-chat conversational state, owned by the dispatcher. All mutation goes through
 * these methods; each runs synchronously, so mark/clear are atomic on the event loop.
 */
export class SessionStore {
  private readonly sessions = new Map<string, SessionState>();

  constructor(private readonly now: () => number = Date.now) {}

  get size(): number {
    return this.sessions.size;
  }

  get(chatId: string): SessionState {
    let session = this.sessions.get(chatId);
    if (!session) {
      session = { busy: false, lastActivity: this.now(), category: 'text', history: [], generation: 0 };
      this.sessions.set(chatId, session);
    }
    return session;
  }

  peek(chatId: string): Readonly<SessionState> | undefined {
    return this.sessions.get(chatId);
  }

  isBusy(chatId: string): boolean {
    return this.sessions.get(chatId)?.busy ?? false;
  }

  /** Returns true if the chat was free and is now busy, false if it was already busy. */
  mark(chatId: string): boolean {
    const session = this.get(chatId);
    session.lastActivity = this.now();
    if (session.busy) {
      return false;
    }
    session.busy = true;
    return true;
  }

  clear(chatId: string): void {
    const session = this.sessions.get(chatId);
    if (!session) {
      return;
    }
    session.busy = false;
    session.lastActivity = this.now();
  }

  update(chatId: string, patch: SessionPatch): SessionState {
    const session = this.get(chatId);
    if ('category' in patch && patch.category !== undefined) {
      session.category = patch.category;
    }
    if ('lastPrompt' in patch) {
      session.lastPrompt = patch.lastPrompt;
    }
    session.lastActivity = this.now();
    return session;
  }

  /** Back to the text category with no last prompt. Leaves busy and history alone. */
  reset(chatId: string): SessionState {
    const session = this.update(chatId, { category: 'text', lastPrompt: undefined });
    session.generation++;
    return session;
  }

  pushHistory(chatId: string, entry: HistoryEntry, maxItems: number): void {
    const session = this.get(chatId);
    session.history.push(entry);
    if (session.history.length > maxItems) {
      session.history.splice(0, session.history.length - maxItems);
    }
  }

  /** Evicts idle, non-busy sessions. Returns the number evicted. */
  sweep(idleThresholdMs: number, now: number = this.now()): number {
    let evicted = 0;
    for (const [chatId, session] of this.sessions) {
      if (!session.busy && now - session.lastActivity > idleThresholdMs) {
        this.sessions.delete(chatId);
        evicted++;
      }
    }
    return evicted;
  }
}
