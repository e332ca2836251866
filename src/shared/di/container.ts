import { Api } from 'grammy';
import type { WriteQueue } from '../../database/write-queue.js';
import type { Config } from '../../types/config.types.js';
import { AdminStateRepository } from '../../database/repositories/admin-state.repository.js';
import { AdminConfigRepository } from '../../database/repositories/admin-config.repository.js';
import { PostTypeRepository } from '../../database/repositories/post-type.repository.js';
import { PublishedPostRepository } from '../../database/repositories/published-post.repository.js';
import { ReplyRepository } from '../../database/repositories/reply.repository.js';
import { ConversationService } from '../../core/session/conversation.service.js';
import { AdminDirectoryService } from '../../core/auth/admin-directory.service.js';
import { PostTypeManagerService } from '../../core/posting/post-type-manager.service.js';
import { PostManagerService } from '../../core/posting/post-manager.service.js';
import { PostPublisherService } from '../../core/posting/post-publisher.service.js';
import { PromptBuilderService } from '../../core/preview/prompt-builder.service.js';
import { MediaSenderService } from '../../core/sending/media-sender.service.js';
import { BackupService } from '../../core/backup/backup.service.js';
import { AdminWorkflowService } from '../../core/workflow/admin-workflow.service.js';

/**
 * Dependency Injection Container
 * Manages service lifecycle and dependencies
 */
export class DIContainer {
  private static instances = new Map<string, unknown>();

  /**
   * Register a service instance
   */
  static register<T>(key: string, instance: T): void {
    this.instances.set(key, instance);
  }

  /**
   * Resolve a service instance
   */
  static resolve<T>(key: string): T {
    const instance = this.instances.get(key);
    if (!instance) {
      throw new Error(`No instance registered for key: ${key}`);
    }
    return instance as T;
  }

  static has(key: string): boolean {
    return this.instances.has(key);
  }

  /**
   * Initialize all services and repositories.
   * Call this once during startup, after migrations ran.
   */
  static initialize(api: Api, queue: WriteQueue, config: Pick<Config, 'timezone'>): void {
    this.register('WriteQueue', queue);

    // Repositories
    const adminStateRepo = new AdminStateRepository(queue);
    const adminConfigRepo = new AdminConfigRepository(queue);
    const postTypeRepo = new PostTypeRepository(queue);
    const publishedPostRepo = new PublishedPostRepository(queue);
    const replyRepo = new ReplyRepository(queue);

    this.register('AdminStateRepository', adminStateRepo);
    this.register('AdminConfigRepository', adminConfigRepo);
    this.register('PostTypeRepository', postTypeRepo);
    this.register('PublishedPostRepository', publishedPostRepo);
    this.register('ReplyRepository', replyRepo);

    // Domain services
    const conversations = new ConversationService(adminStateRepo);
    const directory = new AdminDirectoryService(adminConfigRepo);
    const postTypes = new PostTypeManagerService(postTypeRepo);
    const posts = new PostManagerService(publishedPostRepo, directory);

    this.register('ConversationService', conversations);
    this.register('AdminDirectoryService', directory);
    this.register('PostTypeManagerService', postTypes);
    this.register('PostManagerService', posts);

    // Telegram-facing services
    const publisher = new PostPublisherService(api);
    this.register('PostPublisherService', publisher);
    this.register('MediaSenderService', new MediaSenderService(api));
    this.register('PromptBuilderService', new PromptBuilderService(postTypes, posts, directory));
    this.register('BackupService', new BackupService(queue, config.timezone));

    this.register(
      'AdminWorkflowService',
      new AdminWorkflowService(directory, conversations, postTypes, posts, publisher)
    );

    this.register('Api', api);
  }

  /**
   * Clear all registered instances
   * Useful for testing
   */
  static clear(): void {
    this.instances.clear();
  }
}
