import { Context } from 'grammy';
import type { RejectionReason } from '../../core/workflow/admin-workflow.types.js';
import { logger } from '../../utils/logger.js';

/**
 * Centralized error messages for consistent user feedback
 */
export class ErrorMessages {
  /**
   * Text shown when a step refuses the admin's input
   */
  static rejection(reason: RejectionReason, detail?: string): string {
    switch (reason) {
      case 'unexpected_input':
        return '❌ This step expects something else. Follow the last prompt or send /cancel.';
      case 'empty_text':
        return '❌ Please send a non-empty text.';
      case 'no_active_types':
        return '❌ There are no active post types. Create one in Settings first.';
      case 'type_not_found':
        return '❌ Post type not found.';
      case 'type_inactive':
        return '❌ This post type is inactive.';
      case 'invalid_link':
        return '❌ Invalid post link format.';
      case 'post_not_found':
        return '❌ Post not found or was not published by this bot.';
      case 'invalid_id':
        return `❌ Invalid ID format: ${detail ?? ''}`.trimEnd();
      case 'empty_admin_list':
        return '❌ Specify at least one admin ID.';
      case 'self_not_included':
        return `❌ The list must include your own ID (${detail ?? '?'}), otherwise you will lose access to the bot.`;
      case 'forum_not_configured':
        return '❌ The forum chat is not configured. Set it in Settings → Access settings.';
    }
  }

  /**
   * Reply when nothing is in progress for the admin
   */
  static async nothingInProgress(ctx: Context): Promise<void> {
    await ctx.reply('Nothing is in progress. Use /admin to open the menu.');
  }

  /**
   * Catch-all error handler that logs and replies to user
   * Edits the pressed message for button presses, replies otherwise
   */
  static async catchAndReply(
    ctx: Context,
    error: unknown,
    userMessage: string,
    logMessage?: string
  ): Promise<void> {
    const logMsg = logMessage ?? userMessage;
    logger.error(logMsg, error);

    if (ctx.callbackQuery?.message) {
      try {
        await ctx.editMessageText(`❌ ${userMessage}`);
        return;
      } catch (editError) {
        logger.debug('Could not edit message with error text, replying instead', editError);
      }
    }
    await ctx.reply(`❌ ${userMessage}`);
  }
}
