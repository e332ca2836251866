import { BaseRepository } from './base.repository.js';
import type { WriteQueue } from '../write-queue.js';
import {
  toPublishedPost,
  type NewPublishedPost,
  type PublishedPost,
} from '../models/published-post.model.js';

/**
 * Repository for posts the bot has published to the forum
 */
export class PublishedPostRepository extends BaseRepository<PublishedPost> {
  constructor(queue: WriteQueue) {
    super(queue, 'published_posts');
  }

  protected fromRow(row: unknown): PublishedPost {
    return toPublishedPost(row);
  }

  async create(data: NewPublishedPost): Promise<PublishedPost> {
    const id = await this.write((db) => {
      const result = db
        .prepare(
          `INSERT INTO published_posts (post_type_id, chat_id, topic_id, message_id, text, photo_id, entities)
           VALUES (?, ?, ?, ?, ?, ?, ?)`
        )
        .run(
          data.postTypeId,
          data.chatId,
          data.topicId,
          data.messageId,
          data.text,
          data.photoId,
          data.entities
        );
      return Number(result.lastInsertRowid);
    });

    const created = this.findById(id);
    if (!created) {
      throw new Error(`Published post ${id} vanished after insert`);
    }
    return created;
  }

  findByMessageId(chatId: number, messageId: number): PublishedPost | null {
    const row = this.read((db) =>
      db
        .prepare('SELECT * FROM published_posts WHERE chat_id = ? AND message_id = ?')
        .get(chatId, messageId)
    );
    return row === undefined ? null : this.fromRow(row);
  }

  /**
   * Newest first
   */
  findPage(limit: number, offset: number): PublishedPost[] {
    const rows = this.read((db) =>
      db
        .prepare('SELECT * FROM published_posts ORDER BY created_at DESC, id DESC LIMIT ? OFFSET ?')
        .all(limit, offset)
    );
    return rows.map((row) => this.fromRow(row));
  }

  async updateContent(id: number, text: string, entities: string): Promise<boolean> {
    const result = await this.write((db) =>
      db
        .prepare('UPDATE published_posts SET text = ?, entities = ? WHERE id = ?')
        .run(text, entities, id)
    );
    return result.changes > 0;
  }
}
