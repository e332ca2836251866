import { Context } from 'grammy';
import { bot } from '../bot.js';
import { showAdminMenu, showRecentPosts, sendBackup } from '../menus.js';
import { dispatchEvent } from './workflow.dispatcher.js';
import { StartTarget } from '../../shared/constants/flow-states.js';
import { ErrorMessages } from '../../shared/constants/error-messages.js';

const HELP_TEXT = `📖 Bot Commands:

/admin - Open the admin menu
/new - Create a new post
/edit - Edit a published post
/delete - Delete a published post
/posts - List recently published posts
/cancel - Cancel the current action
/backup - Download a database backup

💡 Posts are built from post types: each type has a template, an optional emoji and an optional image.
Manage them in the admin menu under ⚙️ Settings.`;

bot.command('start', async (ctx: Context) => {
  await ctx.reply(`👋 Welcome to the forum post admin bot!\n\n${HELP_TEXT}`);
});

bot.command('help', async (ctx: Context) => {
  await ctx.reply(HELP_TEXT);
});

bot.command('admin', async (ctx: Context) => {
  await showAdminMenu(ctx, 'reply');
});

bot.command('new', async (ctx: Context) => {
  await dispatchEvent(ctx, { type: 'start', target: StartTarget.NEW_POST });
});

bot.command('edit', async (ctx: Context) => {
  await dispatchEvent(ctx, { type: 'start', target: StartTarget.EDIT_POST });
});

bot.command('delete', async (ctx: Context) => {
  await dispatchEvent(ctx, { type: 'start', target: StartTarget.DELETE_POST });
});

bot.command('posts', async (ctx: Context) => {
  await showRecentPosts(ctx);
});

bot.command('cancel', async (ctx: Context) => {
  await dispatchEvent(ctx, { type: 'cancel' });
});

bot.command('backup', async (ctx: Context) => {
  try {
    await sendBackup(ctx);
  } catch (error) {
    await ErrorMessages.catchAndReply(ctx, error, 'Failed to create backup.');
  }
});
