export interface Update {
  /** Telegram update_id; increases monotonically per bot. */
  id: number;
  chatId: string;
  senderId?: string;
  messageId?: number;
  /** Absent for stickers, photos and other non-text messages. */
  text?: string;
  timestamp: Date;
}

export interface UpdateBatch {
  /** Ordered by increasing id. */
  updates: Update[];
  /** Offset to ask for next. */
  cursor: number;
}

export interface OutboundMessage {
  chatId: string;
  body: string;
  replyTo?: number;
}

export interface MessagePort {
  initialize(): Promise<void>;
  receiveUpdates(cursor: number, signal: AbortSignal): Promise<UpdateBatch>;
  send(message: OutboundMessage): Promise<void>;
}
