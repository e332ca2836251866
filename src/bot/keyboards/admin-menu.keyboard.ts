import { InlineKeyboard } from 'grammy';
import { CallbackData } from '../../shared/constants/callback-data.js';

export function createAdminMenuKeyboard(): InlineKeyboard {
  return new InlineKeyboard()
    .text('📝 New post', CallbackData.MENU_NEW_POST)
    .row()
    .text('✏️ Edit post', CallbackData.MENU_EDIT_POST)
    .text('🗑 Delete post', CallbackData.MENU_DELETE_POST)
    .row()
    .text('⚙️ Settings', CallbackData.MENU_SETTINGS);
}

export function createSettingsMenuKeyboard(): InlineKeyboard {
  return new InlineKeyboard()
    .text('➕ New post type', CallbackData.SETTINGS_NEW_TYPE)
    .row()
    .text('🗂 Manage types', CallbackData.SETTINGS_MANAGE_TYPES)
    .row()
    .text('🔐 Access settings', CallbackData.SETTINGS_ACCESS)
    .row()
    .text('💾 Backup', CallbackData.SETTINGS_BACKUP)
    .row()
    .text('⬅️ Back', CallbackData.MENU_MAIN);
}

export function createAccessSettingsKeyboard(): InlineKeyboard {
  return new InlineKeyboard()
    .text('👥 Admin IDs', CallbackData.ACCESS_ADMINS)
    .row()
    .text('💬 Forum chat ID', CallbackData.ACCESS_FORUM)
    .row()
    .text('🧵 Topic ID', CallbackData.ACCESS_TOPIC)
    .row()
    .text('⬅️ Back', CallbackData.MENU_SETTINGS);
}
