import { InlineKeyboard } from 'grammy';
import { CallbackData } from '../../shared/constants/callback-data.js';

export function createCancelKeyboard(): InlineKeyboard {
  return new InlineKeyboard().text('❌ Cancel', CallbackData.CANCEL);
}

export function createConfirmPostKeyboard(): InlineKeyboard {
  return new InlineKeyboard()
    .text('✅ Publish', CallbackData.CONFIRM_POST)
    .row()
    .text('❌ Cancel', CallbackData.CANCEL);
}

export function createSkipEmojiKeyboard(): InlineKeyboard {
  return new InlineKeyboard()
    .text('⏭ Skip', CallbackData.SKIP_EMOJI)
    .row()
    .text('❌ Cancel', CallbackData.CANCEL);
}

export function createSkipImageKeyboard(): InlineKeyboard {
  return new InlineKeyboard()
    .text('⏭ Skip', CallbackData.SKIP_IMAGE)
    .row()
    .text('❌ Cancel', CallbackData.CANCEL);
}
