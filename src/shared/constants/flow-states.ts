/**
 * Conversation steps persisted in admin_state.current_state
 * An empty string in the column means the administrator is idle.
 */
export enum ConversationState {
  NEW_POST_SELECT_TYPE = 'new_post_select_type',
  NEW_POST_ENTER_TEXT = 'new_post_enter_text',
  NEW_POST_CONFIRM = 'new_post_confirm',
  EDIT_POST_ENTER_LINK = 'edit_post_enter_link',
  EDIT_POST_ENTER_TEXT = 'edit_post_enter_text',
  DELETE_POST_ENTER_LINK = 'delete_post_enter_link',
  NEW_TYPE_ENTER_NAME = 'new_type_enter_name',
  NEW_TYPE_ENTER_EMOJI = 'new_type_enter_emoji',
  NEW_TYPE_ENTER_IMAGE = 'new_type_enter_image',
  NEW_TYPE_ENTER_TEMPLATE = 'new_type_enter_template',
  MANAGE_TYPES = 'manage_types',
  EDIT_TYPE_NAME = 'edit_type_name',
  EDIT_TYPE_EMOJI = 'edit_type_emoji',
  EDIT_TYPE_IMAGE = 'edit_type_image',
  EDIT_TYPE_TEMPLATE = 'edit_type_template',
  EDIT_ADMIN_IDS = 'edit_admin_ids',
  EDIT_FORUM_ID = 'edit_forum_id',
  EDIT_TOPIC_ID = 'edit_topic_id',
}

export enum Workflow {
  NEW_POST = 'new_post',
  EDIT_POST = 'edit_post',
  DELETE_POST = 'delete_post',
  NEW_TYPE = 'new_type',
  MANAGE_TYPES = 'manage_types',
  ACCESS_SETTINGS = 'access_settings',
}

/**
 * Entry points reachable from commands and menu buttons
 */
export enum StartTarget {
  NEW_POST = 'new_post',
  EDIT_POST = 'edit_post',
  DELETE_POST = 'delete_post',
  NEW_TYPE = 'new_type',
  EDIT_ADMIN_IDS = 'edit_admin_ids',
  EDIT_FORUM_ID = 'edit_forum_id',
  EDIT_TOPIC_ID = 'edit_topic_id',
}

export enum TypeField {
  NAME = 'name',
  EMOJI = 'emoji',
  IMAGE = 'image',
  TEMPLATE = 'template',
}

/** What the current step accepts */
export type ExpectedInput =
  | 'type_choice'
  | 'text'
  | 'text_or_skip'
  | 'photo'
  | 'photo_or_skip'
  | 'confirmation'
  | 'type_action';

const KNOWN_STATES: ReadonlySet<string> = new Set(Object.values(ConversationState));

export function isConversationState(value: string): value is ConversationState {
  return KNOWN_STATES.has(value);
}
