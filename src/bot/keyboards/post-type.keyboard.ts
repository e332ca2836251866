import { InlineKeyboard } from 'grammy';
import { postTypeLabel, type PostType } from '../../database/models/post-type.model.js';
import {
  CallbackData,
  manageTypeData,
  selectTypeData,
  toggleTypeData,
  typeFieldData,
} from '../../shared/constants/callback-data.js';
import { TypeField } from '../../shared/constants/flow-states.js';

/**
 * One button per type, in the order given
 */
export function createTypeSelectKeyboard(types: PostType[]): InlineKeyboard {
  const keyboard = new InlineKeyboard();

  types.forEach((postType) => {
    keyboard.text(postTypeLabel(postType), selectTypeData(postType.id)).row();
  });

  return keyboard.text('❌ Cancel', CallbackData.CANCEL);
}

/**
 * Every type, inactive ones marked
 */
export function createManageTypesKeyboard(types: PostType[]): InlineKeyboard {
  const keyboard = new InlineKeyboard();

  types.forEach((postType) => {
    const marker = postType.isActive ? '' : ' (inactive)';
    keyboard.text(`${postTypeLabel(postType)}${marker}`, manageTypeData(postType.id)).row();
  });

  return keyboard.text('⬅️ Back', CallbackData.MENU_SETTINGS);
}

export function createTypeOptionsKeyboard(postType: PostType): InlineKeyboard {
  const id = postType.id;

  return new InlineKeyboard()
    .text('Name', typeFieldData(TypeField.NAME, id))
    .text('Emoji', typeFieldData(TypeField.EMOJI, id))
    .row()
    .text('Image', typeFieldData(TypeField.IMAGE, id))
    .text('Template', typeFieldData(TypeField.TEMPLATE, id))
    .row()
    .text(postType.isActive ? '🚫 Deactivate' : '✅ Activate', toggleTypeData(id))
    .row()
    .text('❌ Cancel', CallbackData.CANCEL);
}
