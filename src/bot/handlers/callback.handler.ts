import { Context } from 'grammy';
import { bot } from '../bot.js';
import { dispatchEvent } from './workflow.dispatcher.js';
import {
  sendBackup,
  showAccessSettings,
  showAdminMenu,
  showManageTypes,
  showSettingsMenu,
} from '../menus.js';
import {
  CallbackData,
  MANAGE_TYPE_PATTERN,
  SELECT_TYPE_PATTERN,
  TOGGLE_TYPE_PATTERN,
  TYPE_FIELD_PATTERN,
} from '../../shared/constants/callback-data.js';
import { StartTarget, TypeField } from '../../shared/constants/flow-states.js';
import { ErrorMessages } from '../../shared/constants/error-messages.js';

const TYPE_FIELDS: Record<string, TypeField> = {
  name: TypeField.NAME,
  emoji: TypeField.EMOJI,
  image: TypeField.IMAGE,
  template: TypeField.TEMPLATE,
};

function startOn(data: string, target: StartTarget): void {
  bot.callbackQuery(data, async (ctx: Context) => {
    await ctx.answerCallbackQuery();
    await dispatchEvent(ctx, { type: 'start', target });
  });
}

// Menus
bot.callbackQuery(CallbackData.MENU_MAIN, async (ctx: Context) => {
  await ctx.answerCallbackQuery();
  await showAdminMenu(ctx);
});

bot.callbackQuery(CallbackData.MENU_SETTINGS, async (ctx: Context) => {
  await ctx.answerCallbackQuery();
  await showSettingsMenu(ctx);
});

bot.callbackQuery(CallbackData.SETTINGS_MANAGE_TYPES, async (ctx: Context) => {
  await ctx.answerCallbackQuery();
  await showManageTypes(ctx);
});

bot.callbackQuery(CallbackData.SETTINGS_ACCESS, async (ctx: Context) => {
  await ctx.answerCallbackQuery();
  await showAccessSettings(ctx);
});

bot.callbackQuery(CallbackData.SETTINGS_BACKUP, async (ctx: Context) => {
  await ctx.answerCallbackQuery({ text: 'Creating backup...' });
  try {
    await sendBackup(ctx);
  } catch (error) {
    await ErrorMessages.catchAndReply(ctx, error, 'Failed to create backup.');
  }
});

// Workflow entries
startOn(CallbackData.MENU_NEW_POST, StartTarget.NEW_POST);
startOn(CallbackData.MENU_EDIT_POST, StartTarget.EDIT_POST);
startOn(CallbackData.MENU_DELETE_POST, StartTarget.DELETE_POST);
startOn(CallbackData.SETTINGS_NEW_TYPE, StartTarget.NEW_TYPE);
startOn(CallbackData.ACCESS_ADMINS, StartTarget.EDIT_ADMIN_IDS);
startOn(CallbackData.ACCESS_FORUM, StartTarget.EDIT_FORUM_ID);
startOn(CallbackData.ACCESS_TOPIC, StartTarget.EDIT_TOPIC_ID);

// Workflow steps
bot.callbackQuery(CallbackData.CANCEL, async (ctx: Context) => {
  await ctx.answerCallbackQuery();
  await dispatchEvent(ctx, { type: 'cancel' });
});

bot.callbackQuery(CallbackData.CONFIRM_POST, async (ctx: Context) => {
  await ctx.answerCallbackQuery();
  await dispatchEvent(ctx, { type: 'confirm' });
});

bot.callbackQuery([CallbackData.SKIP_EMOJI, CallbackData.SKIP_IMAGE], async (ctx: Context) => {
  await ctx.answerCallbackQuery();
  await dispatchEvent(ctx, { type: 'skip' });
});

bot.callbackQuery(SELECT_TYPE_PATTERN, async (ctx) => {
  await ctx.answerCallbackQuery();
  await dispatchEvent(ctx, { type: 'select', typeId: Number(ctx.match[1]) });
});

bot.callbackQuery(MANAGE_TYPE_PATTERN, async (ctx) => {
  await ctx.answerCallbackQuery();
  await dispatchEvent(ctx, { type: 'manage-type', typeId: Number(ctx.match[1]) });
});

bot.callbackQuery(TYPE_FIELD_PATTERN, async (ctx) => {
  await ctx.answerCallbackQuery();

  const field = TYPE_FIELDS[ctx.match[1]];
  if (!field) {
    return;
  }
  await dispatchEvent(ctx, { type: 'edit-type-field', typeId: Number(ctx.match[2]), field });
});

bot.callbackQuery(TOGGLE_TYPE_PATTERN, async (ctx) => {
  await ctx.answerCallbackQuery();
  await dispatchEvent(ctx, { type: 'toggle-type', typeId: Number(ctx.match[1]) });
});

// Buttons from menus that no longer exist
bot.on('callback_query:data', async (ctx) => {
  await ctx.answerCallbackQuery({ text: 'This button is no longer active.' });
});
