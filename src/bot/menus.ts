import { Context, InlineKeyboard, InputFile } from 'grammy';
import { DIContainer } from '../shared/di/container.js';
import type { AdminDirectoryService } from '../core/auth/admin-directory.service.js';
import type { PostTypeManagerService } from '../core/posting/post-type-manager.service.js';
import type { BackupService } from '../core/backup/backup.service.js';
import type { PostManagerService } from '../core/posting/post-manager.service.js';
import { buildPostLink } from '../utils/post-link.js';
import {
  createAccessSettingsKeyboard,
  createAdminMenuKeyboard,
  createSettingsMenuKeyboard,
} from './keyboards/admin-menu.keyboard.js';
import { createManageTypesKeyboard } from './keyboards/post-type.keyboard.js';
import { logger } from '../utils/logger.js';

/**
 * `edit` replaces the message whose button was pressed, `reply` always sends a new one
 */
export type MenuMode = 'edit' | 'reply';

async function respond(
  ctx: Context,
  text: string,
  keyboard: InlineKeyboard,
  mode: MenuMode
): Promise<void> {
  if (mode === 'edit' && ctx.callbackQuery?.message) {
    try {
      await ctx.editMessageText(text, { reply_markup: keyboard });
      return;
    } catch (error) {
      logger.debug('Could not edit menu message, sending a new one', error);
    }
  }
  await ctx.reply(text, { reply_markup: keyboard });
}

export async function showAdminMenu(ctx: Context, mode: MenuMode = 'edit'): Promise<void> {
  await respond(ctx, '🛠 Admin menu\n\nChoose an action:', createAdminMenuKeyboard(), mode);
}

export async function showSettingsMenu(ctx: Context, mode: MenuMode = 'edit'): Promise<void> {
  await respond(ctx, '⚙️ Settings', createSettingsMenuKeyboard(), mode);
}

export async function showAccessSettings(ctx: Context, mode: MenuMode = 'edit'): Promise<void> {
  const directory = DIContainer.resolve<AdminDirectoryService>('AdminDirectoryService');
  const admins = directory.listAdmins();
  const target = directory.getForumTarget();

  const text = [
    '🔐 Access settings',
    '',
    `Admins: ${admins.length > 0 ? admins.join(', ') : 'none'}`,
    `Forum chat ID: ${target ? target.chatId : 'not set'}`,
    `Topic ID: ${target ? target.topicId : 'not set'}`,
  ].join('\n');

  await respond(ctx, text, createAccessSettingsKeyboard(), mode);
}

export async function showManageTypes(ctx: Context, mode: MenuMode = 'edit'): Promise<void> {
  const postTypes = DIContainer.resolve<PostTypeManagerService>('PostTypeManagerService');
  const types = postTypes.getAllTypes();

  const text = types.length > 0 ? '🗂 Choose a post type to manage:' : '🗂 There are no post types yet.';
  await respond(ctx, text, createManageTypesKeyboard(types), mode);
}

const RECENT_POSTS_LIMIT = 10;
const PREVIEW_LENGTH = 40;

export async function showRecentPosts(ctx: Context): Promise<void> {
  const posts = DIContainer.resolve<PostManagerService>('PostManagerService');
  const recent = posts.listRecent(RECENT_POSTS_LIMIT);

  if (recent.length === 0) {
    await ctx.reply('No posts have been published yet.');
    return;
  }

  const lines = recent.map((post) => {
    const firstLine = post.text.split('\n')[0] ?? '';
    const preview =
      firstLine.length > PREVIEW_LENGTH ? `${firstLine.slice(0, PREVIEW_LENGTH)}…` : firstLine;
    const link = buildPostLink(post.chatId, post.messageId, post.topicId) ?? `message ${post.messageId}`;
    return `• ${preview}\n  ${link}`;
  });

  await ctx.reply(`🗞 Recent posts (${recent.length} of ${posts.count()}):\n\n${lines.join('\n')}`, {
    link_preview_options: { is_disabled: true },
  });
}

/**
 * Send the whole database as an SQL dump document
 */
export async function sendBackup(ctx: Context): Promise<void> {
  const backup = DIContainer.resolve<BackupService>('BackupService');
  const now = new Date();

  const dump = await backup.createDump(now);
  await ctx.replyWithDocument(new InputFile(Buffer.from(dump, 'utf8'), backup.fileName(now)), {
    caption: backup.caption(now),
  });
  logger.info(`Backup sent to user ${ctx.from?.id ?? 'unknown'}`);
}
