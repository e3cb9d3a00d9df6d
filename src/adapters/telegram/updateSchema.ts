import { z } from 'zod';
import type { Update } from '../../ports/MessagePort.js';

export const telegramUpdateSchema = z.object({
  update_id: z.number().int(),
  message: z
    .object({
      message_id: z.number().int(),
      date: z.number(),
      chat: z.object({ id: z.number() }),
      from: z.object({ id: z.number() }).optional(),
      text: z.string().optional(),
    })
    .optional(),
});

export type TelegramUpdate = z.infer<typeof telegramUpdateSchema>;

/** Returns null for updates that carry no message (edits, callbacks, member changes). */
export function toUpdate(raw: TelegramUpdate): Update | null {
  const msg = raw.message;
  if (!msg) {
    return null;
  }

  const update: Update = {
    id: raw.update_id,
    chatId: msg.chat.id.toString(),
    messageId: msg.message_id,
    timestamp: new Date(msg.date * 1000), // Telegram uses Unix timestamp
  };
  if (msg.from) {
    update.senderId = msg.from.id.toString();
  }
  if (msg.text !== undefined) {
    update.text = msg.text;
  }
  return update;
}
