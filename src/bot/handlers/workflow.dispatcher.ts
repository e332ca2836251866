import { Context } from 'grammy';
import { DIContainer } from '../../shared/di/container.js';
import type { AdminWorkflowService } from '../../core/workflow/admin-workflow.service.js';
import type { AdminEvent, WorkflowOutcome } from '../../core/workflow/admin-workflow.types.js';
import type { ConversationService } from '../../core/session/conversation.service.js';
import type { MediaSenderService } from '../../core/sending/media-sender.service.js';
import type { PromptBuilderService } from '../../core/preview/prompt-builder.service.js';
import { ErrorMessages } from '../../shared/constants/error-messages.js';
import { SuccessMessages } from '../../shared/constants/success-messages.js';
import { showAdminMenu } from '../menus.js';
import { logger } from '../../utils/logger.js';

/**
 * Remove the prompt of the step just left. Missing or too old messages are not an error.
 */
async function removePrompt(chatId: number, messageId: number): Promise<void> {
  if (!messageId) {
    return;
  }

  const sender = DIContainer.resolve<MediaSenderService>('MediaSenderService');
  try {
    await sender.deleteMessage(chatId, messageId);
  } catch (error) {
    logger.warn(`Could not delete prompt ${messageId} in chat ${chatId}`, error);
  }
}

async function render(ctx: Context, chatId: number, userId: number, outcome: WorkflowOutcome): Promise<void> {
  switch (outcome.kind) {
    case 'ignored':
      return;

    case 'unhandled':
      await ErrorMessages.nothingInProgress(ctx);
      return;

    case 'rejected':
      await ctx.reply(ErrorMessages.rejection(outcome.reason, outcome.detail));
      return;

    case 'advanced': {
      await removePrompt(chatId, outcome.previousPromptId);

      const prompt = DIContainer.resolve<PromptBuilderService>('PromptBuilderService').build(outcome.state);
      const sender = DIContainer.resolve<MediaSenderService>('MediaSenderService');
      const messageId = await sender.sendContent(chatId, prompt, { keyboard: prompt.keyboard });

      await DIContainer.resolve<ConversationService>('ConversationService').rememberPrompt(userId, messageId);
      return;
    }

    case 'committed':
      await removePrompt(chatId, outcome.previousPromptId);
      await ctx.reply(SuccessMessages.effect(outcome.effect));
      await showAdminMenu(ctx, 'reply');
      return;

    case 'cancelled':
      await removePrompt(chatId, outcome.previousPromptId);
      await ctx.reply(SuccessMessages.CANCELLED);
      await showAdminMenu(ctx, 'reply');
      return;
  }
}

/**
 * Run an admin event through the workflow and show the result in the admin's chat
 */
export async function dispatchEvent(ctx: Context, event: AdminEvent): Promise<void> {
  if (!ctx.from || !ctx.chat) {
    return;
  }

  const userId = ctx.from.id;
  const chatId = ctx.chat.id;

  try {
    const workflow = DIContainer.resolve<AdminWorkflowService>('AdminWorkflowService');
    const outcome = await workflow.handle(userId, event);
    await render(ctx, chatId, userId, outcome);
  } catch (error) {
    await ErrorMessages.catchAndReply(
      ctx,
      error,
      'Something went wrong. Please try again or send /cancel.',
      `Failed to handle ${event.type} from user ${userId}`
    );
  }
}
