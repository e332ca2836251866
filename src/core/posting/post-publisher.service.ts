import { Api } from 'grammy';
import type { MessageEntity } from 'grammy/types';
import type { ForumTarget } from '../../database/models/admin-config.model.js';
import type { PublishedPost } from '../../database/models/published-post.model.js';
import { MediaSenderService, type MessageContent } from '../sending/media-sender.service.js';

/**
 * Forum side of a post: send, edit and delete the Telegram message
 */
export interface PostPublisher {
  /** Returns the Telegram message ID of the published message */
  publish(target: ForumTarget, content: MessageContent): Promise<number>;
  edit(post: PublishedPost, text: string, entities: MessageEntity[]): Promise<void>;
  remove(post: PublishedPost): Promise<void>;
}

/**
 * Service for publishing posts to Telegram
 */
export class PostPublisherService implements PostPublisher {
  private mediaSender: MediaSenderService;

  constructor(api: Api) {
    this.mediaSender = new MediaSenderService(api);
  }

  async publish(target: ForumTarget, content: MessageContent): Promise<number> {
    return await this.mediaSender.sendContent(target.chatId, content, { threadId: target.topicId });
  }

  async edit(post: PublishedPost, text: string, entities: MessageEntity[]): Promise<void> {
    await this.mediaSender.editContent(post.chatId, post.messageId, post.photoId !== '', text, entities);
  }

  async remove(post: PublishedPost): Promise<void> {
    await this.mediaSender.deleteMessage(post.chatId, post.messageId);
  }
}
