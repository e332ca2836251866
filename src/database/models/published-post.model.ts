import { z } from 'zod';
import { parseRow, textColumn } from './columns.js';

export interface PublishedPost {
  id: number;
  postTypeId: number;
  chatId: number;
  topicId: number;
  messageId: number;
  text: string;
  photoId: string;
  entities: string;
  createdAt: string;
}

export type NewPublishedPost = Omit<PublishedPost, 'id' | 'createdAt'>;

const publishedPostRowSchema = z.object({
  id: z.number().int(),
  post_type_id: z.number().int(),
  chat_id: z.number().int(),
  topic_id: z.number().int(),
  message_id: z.number().int(),
  text: z.string(),
  photo_id: textColumn,
  entities: textColumn,
  created_at: textColumn,
});

export function toPublishedPost(row: unknown): PublishedPost {
  const data = parseRow(publishedPostRowSchema, row, 'published_posts');
  return {
    id: data.id,
    postTypeId: data.post_type_id,
    chatId: data.chat_id,
    topicId: data.topic_id,
    messageId: data.message_id,
    text: data.text,
    photoId: data.photo_id,
    entities: data.entities,
    createdAt: data.created_at,
  };
}
