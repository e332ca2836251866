import type { AdminConfigRepository } from '../../database/repositories/admin-config.repository.js';
import {
  ADMIN_CONFIG_KEYS,
  type AdminConfig,
  type ForumTarget,
} from '../../database/models/admin-config.model.js';
import { ValidationError } from '../../shared/errors.js';
import { logger } from '../../utils/logger.js';

/**
 * Startup values for the directory, taken from the environment.
 * They only fill keys the store does not have yet.
 */
export interface DirectorySeed {
  adminIds?: string;
  forumChatId?: string;
  topicId?: string;
}

/**
 * Who may use the bot, and where posts are published
 */
export class AdminDirectoryService {
  constructor(private repository: AdminConfigRepository) {}

  /**
   * Answers false when the config cannot be read
   */
  isAdmin(userId: number): boolean {
    try {
      return this.repository.get().adminIds.includes(userId);
    } catch (error) {
      logger.error(`Failed to check admin rights for user ${userId}:`, error);
      return false;
    }
  }

  shouldIgnore(userId: number): boolean {
    return !this.isAdmin(userId);
  }

  listAdmins(): number[] {
    return this.repository.get().adminIds;
  }

  async addAdmin(userId: number): Promise<number[]> {
    const config = await this.repository.update((current) =>
      current.adminIds.includes(userId)
        ? current
        : { ...current, adminIds: [...current.adminIds, userId] }
    );
    logger.info(`Admin ${userId} added`);
    return config.adminIds;
  }

  async removeAdmin(userId: number): Promise<number[]> {
    const config = await this.repository.update((current) => ({
      ...current,
      adminIds: current.adminIds.filter((id) => id !== userId),
    }));
    logger.info(`Admin ${userId} removed`);
    return config.adminIds;
  }

  /**
   * Replace the admin list, keeping order and dropping duplicates
   */
  async setAdmins(userIds: readonly number[]): Promise<number[]> {
    const unique = [...new Set(userIds)];
    if (unique.length === 0) {
      throw new ValidationError('Admin list cannot be empty');
    }

    const config = await this.repository.update((current) => ({ ...current, adminIds: unique }));
    logger.info(`Admin list replaced: ${config.adminIds.join(', ')}`);
    return config.adminIds;
  }

  /**
   * Null until a forum chat has been configured
   */
  getForumTarget(): ForumTarget | null {
    const { chatId, topicId } = this.repository.get();
    return chatId === 0 ? null : { chatId, topicId };
  }

  async setForumTarget(chatId: number, topicId: number): Promise<ForumTarget> {
    return this.updateTarget((current) => ({ ...current, chatId, topicId }));
  }

  async setForumChat(chatId: number): Promise<ForumTarget> {
    return this.updateTarget((current) => ({ ...current, chatId }));
  }

  async setForumTopic(topicId: number): Promise<ForumTarget> {
    return this.updateTarget((current) => ({ ...current, topicId }));
  }

  /**
   * Fill missing config keys from the environment
   * Returns the keys that were written
   */
  async seedFromEnvironment(seed: DirectorySeed): Promise<string[]> {
    const candidates: Array<[string, string | undefined]> = [
      [ADMIN_CONFIG_KEYS.adminIds, seed.adminIds],
      [ADMIN_CONFIG_KEYS.forumChatId, seed.forumChatId],
      [ADMIN_CONFIG_KEYS.topicId, seed.topicId],
    ];

    const written: string[] = [];
    for (const [key, raw] of candidates) {
      const value = raw?.trim();
      if (!value || value === '0') {
        continue;
      }
      if (await this.repository.insertIfAbsent(key, value)) {
        written.push(key);
      }
    }

    if (written.length > 0) {
      logger.info(`Seeded admin config from environment: ${written.join(', ')}`);
    }
    return written;
  }

  private async updateTarget(change: (current: AdminConfig) => AdminConfig): Promise<ForumTarget> {
    const { chatId, topicId } = await this.repository.update(change);
    logger.info(`Forum target set to ${chatId}/${topicId}`);
    return { chatId, topicId };
  }
}
