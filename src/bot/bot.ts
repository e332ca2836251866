import { Bot } from 'grammy';
import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { DIContainer } from '../shared/di/container.js';
import type { AdminDirectoryService } from '../core/auth/admin-directory.service.js';

export const bot = new Bot(config.botToken);

// Logging middleware
bot.use(async (ctx, next) => {
  const updateType = ctx.update.message
    ? 'message'
    : ctx.update.callback_query
    ? 'callback_query'
    : 'other';
  logger.debug(`Received update: ${updateType}`, {
    updateId: ctx.update.update_id,
    from: ctx.from?.id,
  });

  await next();
});

// Auth middleware - non-admins get no answer at all
bot.use(async (ctx, next) => {
  if (!ctx.from) {
    return;
  }

  const directory = DIContainer.resolve<AdminDirectoryService>('AdminDirectoryService');
  if (directory.shouldIgnore(ctx.from.id)) {
    logger.debug(`Ignoring update from non-admin user ${ctx.from.id} (@${ctx.from.username ?? '-'})`);
    return;
  }

  await next();
});

// Error handler
bot.catch((err) => {
  logger.error('Bot error:', err.error);
});

export async function setBotCommands(): Promise<void> {
  await bot.api.setMyCommands([
    { command: 'admin', description: 'Open the admin menu' },
    { command: 'new', description: 'Create a new post' },
    { command: 'edit', description: 'Edit a published post' },
    { command: 'delete', description: 'Delete a published post' },
    { command: 'posts', description: 'List recent posts' },
    { command: 'cancel', description: 'Cancel the current action' },
    { command: 'backup', description: 'Download a database backup' },
  ]);
  logger.info('Bot commands registered');
}

export async function startBot(): Promise<void> {
  try {
    await bot.start({
      onStart: (botInfo) => {
        logger.info(`Bot started: @${botInfo.username}`);
      },
    });
  } catch (error) {
    logger.error('Failed to start bot:', error);
    throw error;
  }
}

export async function stopBot(): Promise<void> {
  try {
    await bot.stop();
    logger.info('Bot stopped');
  } catch (error) {
    logger.error('Error stopping bot:', error);
    throw error;
  }
}
