import { z } from 'zod';
import { parseRow, textColumn } from './columns.js';

/** A bot message sent as a reply inside the forum */
export interface Reply {
  id: number;
  chatId: number;
  replyToMessageId: number;
  messageId: number;
  text: string;
  photoId: string;
  entities: string;
  createdAt: string;
}

export type NewReply = Omit<Reply, 'id' | 'createdAt'>;

const replyRowSchema = z.object({
  id: z.number().int(),
  chat_id: z.number().int(),
  reply_to_message_id: z.number().int(),
  message_id: z.number().int(),
  text: textColumn,
  photo_id: textColumn,
  entities: textColumn,
  created_at: textColumn,
});

export function toReply(row: unknown): Reply {
  const data = parseRow(replyRowSchema, row, 'replies');
  return {
    id: data.id,
    chatId: data.chat_id,
    replyToMessageId: data.reply_to_message_id,
    messageId: data.message_id,
    text: data.text,
    photoId: data.photo_id,
    entities: data.entities,
    createdAt: data.created_at,
  };
}
