import type { PostTypeRepository, PostTypeChanges } from '../../database/repositories/post-type.repository.js';
import type { NewPostType, PostType } from '../../database/models/post-type.model.js';
import { NotFoundError, ValidationError } from '../../shared/errors.js';
import { logger } from '../../utils/logger.js';

/**
 * Domain operations on post types
 */
export class PostTypeManagerService {
  constructor(private repository: PostTypeRepository) {}

  async createType(data: NewPostType): Promise<PostType> {
    if (data.name.trim() === '') {
      throw new ValidationError('Post type name cannot be empty');
    }
    if (data.template.trim() === '') {
      throw new ValidationError('Post type template cannot be empty');
    }

    const postType = await this.repository.create(data);
    logger.info(`Created post type ${postType.id} "${postType.name}"`);
    return postType;
  }

  findType(id: number): PostType | null {
    return this.repository.findById(id);
  }

  getType(id: number): PostType {
    const postType = this.repository.findById(id);
    if (!postType) {
      throw new NotFoundError('Post type', id);
    }
    return postType;
  }

  getAllTypes(): PostType[] {
    return this.repository.findAll();
  }

  getActiveTypes(): PostType[] {
    return this.repository.findActive();
  }

  async updateType(id: number, changes: PostTypeChanges): Promise<PostType> {
    const updated = await this.repository.update(id, changes);
    if (!updated) {
      throw new NotFoundError('Post type', id);
    }
    logger.info(`Updated post type ${id}: ${Object.keys(changes).join(', ')}`);
    return this.getType(id);
  }

  async setActive(id: number, active: boolean): Promise<PostType> {
    const updated = await this.repository.setActive(id, active);
    if (!updated) {
      throw new NotFoundError('Post type', id);
    }
    logger.info(`Post type ${id} ${active ? 'activated' : 'deactivated'}`);
    return this.getType(id);
  }

  async toggleActive(id: number): Promise<PostType> {
    return this.setActive(id, !this.getType(id).isActive);
  }
}
