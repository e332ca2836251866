import { Api, InlineKeyboard } from 'grammy';
import type { MessageEntity } from 'grammy/types';

/**
 * Text with its formatting and an optional photo shown above it
 */
export interface MessageContent {
  text: string;
  entities: MessageEntity[];
  photoId: string;
}

export interface SendOptions {
  /** Forum topic; 0 or absent posts without a thread id */
  threadId?: number;
  keyboard?: InlineKeyboard;
}

/**
 * Shared service for sending content to Telegram
 * Used by both prompts and publishing to avoid code duplication
 */
export class MediaSenderService {
  constructor(private api: Api) {}

  /**
   * Send a photo with caption when the content has one, plain text otherwise.
   * Returns the Telegram message ID.
   */
  async sendContent(chatId: number, content: MessageContent, options: SendOptions = {}): Promise<number> {
    if (content.photoId) {
      return await this.sendPhoto(chatId, content.photoId, content.text, content.entities, options);
    }
    return await this.sendText(chatId, content.text, content.entities, options);
  }

  async sendText(
    chatId: number,
    text: string,
    entities: MessageEntity[] = [],
    options: SendOptions = {}
  ): Promise<number> {
    const result = await this.api.sendMessage(chatId, text, {
      entities: entities.length > 0 ? entities : undefined,
      message_thread_id: options.threadId || undefined,
      reply_markup: options.keyboard,
    });
    return result.message_id;
  }

  async sendPhoto(
    chatId: number,
    fileId: string,
    caption: string,
    entities: MessageEntity[] = [],
    options: SendOptions = {}
  ): Promise<number> {
    const result = await this.api.sendPhoto(chatId, fileId, {
      caption,
      caption_entities: entities.length > 0 ? entities : undefined,
      message_thread_id: options.threadId || undefined,
      reply_markup: options.keyboard,
    });
    return result.message_id;
  }

  /**
   * Replace the text of a message, or its caption when it carries a photo
   */
  async editContent(
    chatId: number,
    messageId: number,
    hasPhoto: boolean,
    text: string,
    entities: MessageEntity[]
  ): Promise<void> {
    if (hasPhoto) {
      await this.api.editMessageCaption(chatId, messageId, {
        caption: text,
        caption_entities: entities,
      });
      return;
    }
    await this.api.editMessageText(chatId, messageId, text, { entities });
  }

  async deleteMessage(chatId: number, messageId: number): Promise<void> {
    await this.api.deleteMessage(chatId, messageId);
  }
}
