import { BaseRepository } from './base.repository.js';
import type { WriteQueue } from '../write-queue.js';
import { toPostType, type NewPostType, type PostType } from '../models/post-type.model.js';

export type PostTypeChanges = Partial<NewPostType>;

/**
 * Repository for post types (templates posts are created from)
 */
export class PostTypeRepository extends BaseRepository<PostType> {
  constructor(queue: WriteQueue) {
    super(queue, 'post_types');
  }

  protected fromRow(row: unknown): PostType {
    return toPostType(row);
  }

  async create(data: NewPostType): Promise<PostType> {
    const id = await this.write((db) => {
      const result = db
        .prepare(
          `INSERT INTO post_types (name, emoji, photo_id, template, template_entities, is_active)
           VALUES (?, ?, ?, ?, ?, 1)`
        )
        .run(data.name, data.emoji, data.photoId, data.template, data.templateEntities);
      return Number(result.lastInsertRowid);
    });

    const created = this.findById(id);
    if (!created) {
      throw new Error(`Post type ${id} vanished after insert`);
    }
    return created;
  }

  /**
   * Active types ordered by name
   */
  findActive(): PostType[] {
    const rows = this.read((db) =>
      db.prepare('SELECT * FROM post_types WHERE is_active = 1 ORDER BY name').all()
    );
    return rows.map((row) => this.fromRow(row));
  }

  /**
   * Apply a partial update in one statement
   * Resolves false when the type does not exist
   */
  async update(id: number, changes: PostTypeChanges): Promise<boolean> {
    const result = await this.write((db) =>
      db
        .prepare(
          `UPDATE post_types SET
             name = COALESCE(@name, name),
             emoji = COALESCE(@emoji, emoji),
             photo_id = COALESCE(@photoId, photo_id),
             template = COALESCE(@template, template),
             template_entities = COALESCE(@templateEntities, template_entities)
           WHERE id = @id`
        )
        .run({
          id,
          name: changes.name ?? null,
          emoji: changes.emoji ?? null,
          photoId: changes.photoId ?? null,
          template: changes.template ?? null,
          templateEntities: changes.templateEntities ?? null,
        })
    );
    return result.changes > 0;
  }

  async setActive(id: number, active: boolean): Promise<boolean> {
    const result = await this.write((db) =>
      db.prepare('UPDATE post_types SET is_active = ? WHERE id = ?').run(active ? 1 : 0, id)
    );
    return result.changes > 0;
  }
}
