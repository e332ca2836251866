/**
 * Inline button payloads
 * Parameterised payloads are `<prefix>:<args>` and matched by the regexes below
 */
export const CallbackData = {
  MENU_MAIN: 'menu:main',
  MENU_NEW_POST: 'menu:new_post',
  MENU_EDIT_POST: 'menu:edit_post',
  MENU_DELETE_POST: 'menu:delete_post',
  MENU_SETTINGS: 'menu:settings',
  SETTINGS_NEW_TYPE: 'settings:new_type',
  SETTINGS_MANAGE_TYPES: 'settings:manage_types',
  SETTINGS_ACCESS: 'settings:access',
  SETTINGS_BACKUP: 'settings:backup',
  ACCESS_ADMINS: 'access:admins',
  ACCESS_FORUM: 'access:forum',
  ACCESS_TOPIC: 'access:topic',
  CONFIRM_POST: 'confirm_post',
  SKIP_EMOJI: 'skip_emoji',
  SKIP_IMAGE: 'skip_image',
  CANCEL: 'cancel',
} as const;

export const selectTypeData = (typeId: number): string => `select_type:${typeId}`;
export const manageTypeData = (typeId: number): string => `manage_type:${typeId}`;
export const typeFieldData = (field: string, typeId: number): string => `type_field:${field}:${typeId}`;
export const toggleTypeData = (typeId: number): string => `toggle_type:${typeId}`;

export const SELECT_TYPE_PATTERN = /^select_type:(\d+)$/;
export const MANAGE_TYPE_PATTERN = /^manage_type:(\d+)$/;
export const TYPE_FIELD_PATTERN = /^type_field:(name|emoji|image|template):(\d+)$/;
export const TOGGLE_TYPE_PATTERN = /^toggle_type:(\d+)$/;
