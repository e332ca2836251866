import { BaseRepository } from './base.repository.js';
import type { WriteQueue } from '../write-queue.js';
import { toReply, type NewReply, type Reply } from '../models/reply.model.js';

/**
 * Repository for bot replies posted under forum messages
 */
export class ReplyRepository extends BaseRepository<Reply> {
  constructor(queue: WriteQueue) {
    super(queue, 'replies');
  }

  protected fromRow(row: unknown): Reply {
    return toReply(row);
  }

  async create(data: NewReply): Promise<Reply> {
    const id = await this.write((db) => {
      const result = db
        .prepare(
          `INSERT INTO replies (chat_id, reply_to_message_id, message_id, text, photo_id, entities)
           VALUES (?, ?, ?, ?, ?, ?)`
        )
        .run(
          data.chatId,
          data.replyToMessageId,
          data.messageId,
          data.text,
          data.photoId,
          data.entities
        );
      return Number(result.lastInsertRowid);
    });

    const created = this.findById(id);
    if (!created) {
      throw new Error(`Reply ${id} vanished after insert`);
    }
    return created;
  }

  findByMessageId(chatId: number, messageId: number): Reply | null {
    const row = this.read((db) =>
      db.prepare('SELECT * FROM replies WHERE chat_id = ? AND message_id = ?').get(chatId, messageId)
    );
    return row === undefined ? null : this.fromRow(row);
  }

  /**
   * Replies attached to one forum message, oldest first
   */
  findByTarget(chatId: number, replyToMessageId: number): Reply[] {
    const rows = this.read((db) =>
      db
        .prepare('SELECT * FROM replies WHERE chat_id = ? AND reply_to_message_id = ? ORDER BY id')
        .all(chatId, replyToMessageId)
    );
    return rows.map((row) => this.fromRow(row));
  }

  async updateContent(id: number, text: string, entities: string): Promise<boolean> {
    const result = await this.write((db) =>
      db.prepare('UPDATE replies SET text = ?, entities = ? WHERE id = ?').run(text, entities, id)
    );
    return result.changes > 0;
  }
}
