import type { PublishedPostRepository } from '../../database/repositories/published-post.repository.js';
import type { NewPublishedPost, PublishedPost } from '../../database/models/published-post.model.js';
import type { AdminDirectoryService } from '../auth/admin-directory.service.js';
import { parsePostLink } from '../../utils/post-link.js';
import { NotFoundError } from '../../shared/errors.js';
import { logger } from '../../utils/logger.js';

export type PostLookup =
  | { status: 'found'; post: PublishedPost }
  | { status: 'not_found' }
  | { status: 'invalid_link' };

/**
 * Records of posts published to the forum
 */
export class PostManagerService {
  constructor(
    private repository: PublishedPostRepository,
    private directory: AdminDirectoryService
  ) {}

  /**
   * Find the post a t.me link points to.
   * Public links are looked up in the configured forum chat.
   */
  findByLink(link: string): PostLookup {
    const parsed = parsePostLink(link);
    if (!parsed) {
      return { status: 'invalid_link' };
    }

    const chatId = parsed.chatId ?? this.directory.getForumTarget()?.chatId;
    if (chatId === undefined) {
      return { status: 'not_found' };
    }

    const post = this.repository.findByMessageId(chatId, parsed.messageId);
    return post ? { status: 'found', post } : { status: 'not_found' };
  }

  findPost(id: number): PublishedPost | null {
    return this.repository.findById(id);
  }

  getPost(id: number): PublishedPost {
    const post = this.repository.findById(id);
    if (!post) {
      throw new NotFoundError('Published post', id);
    }
    return post;
  }

  async recordPublished(data: NewPublishedPost): Promise<PublishedPost> {
    const post = await this.repository.create(data);
    logger.info(`Recorded post ${post.id} (message ${post.messageId} in ${post.chatId})`);
    return post;
  }

  async editPost(id: number, text: string, entities: string): Promise<PublishedPost> {
    const updated = await this.repository.updateContent(id, text, entities);
    if (!updated) {
      throw new NotFoundError('Published post', id);
    }
    return this.getPost(id);
  }

  async deletePost(id: number): Promise<void> {
    const deleted = await this.repository.deleteById(id);
    if (!deleted) {
      throw new NotFoundError('Published post', id);
    }
    logger.info(`Deleted post record ${id}`);
  }

  listRecent(limit: number, offset = 0): PublishedPost[] {
    return this.repository.findPage(limit, offset);
  }

  count(): number {
    return this.repository.count();
  }
}
