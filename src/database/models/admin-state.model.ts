import { z } from 'zod';
import { ConversationState, isConversationState } from '../../shared/constants/flow-states.js';
import { DataIntegrityError } from '../../shared/errors.js';
import { parseRow, refColumn, textColumn } from './columns.js';

/**
 * Persisted conversation position and draft of one administrator
 * `currentState === null` is an explicitly idle row
 */
export interface AdminState {
  userId: number;
  currentState: ConversationState | null;
  selectedTypeId: number;
  editingPostId: number;
  editingTypeId: number;
  draftText: string;
  draftPhotoId: string;
  /** JSON-encoded message entities, '' when none */
  draftEntities: string;
  tempName: string;
  tempEmoji: string;
  tempPhotoId: string;
  tempTemplate: string;
  lastBotMessageId: number;
  replyTargetChatId: number;
  replyTargetMessageId: number;
}

export type DraftFields = Omit<AdminState, 'userId' | 'currentState'>;

export function createAdminState(
  userId: number,
  currentState: ConversationState | null = null,
  fields: Partial<DraftFields> = {}
): AdminState {
  return {
    userId,
    currentState,
    selectedTypeId: 0,
    editingPostId: 0,
    editingTypeId: 0,
    draftText: '',
    draftPhotoId: '',
    draftEntities: '',
    tempName: '',
    tempEmoji: '',
    tempPhotoId: '',
    tempTemplate: '',
    lastBotMessageId: 0,
    replyTargetChatId: 0,
    replyTargetMessageId: 0,
    ...fields,
  };
}

const adminStateRowSchema = z.object({
  user_id: z.number().int(),
  current_state: textColumn,
  selected_type_id: refColumn,
  draft_text: textColumn,
  draft_photo_id: textColumn,
  draft_entities: textColumn,
  editing_post_id: refColumn,
  editing_type_id: refColumn,
  temp_name: textColumn,
  temp_emoji: textColumn,
  temp_photo_id: textColumn,
  temp_template: textColumn,
  last_bot_message_id: refColumn,
  reply_target_chat_id: refColumn,
  reply_target_message_id: refColumn,
});

export function parseStoredState(raw: string): ConversationState | null {
  if (raw === '') {
    return null;
  }
  if (!isConversationState(raw)) {
    throw new DataIntegrityError(`Unknown conversation state "${raw}"`);
  }
  return raw;
}

export function toAdminState(row: unknown): AdminState {
  const data = parseRow(adminStateRowSchema, row, 'admin_state');
  return {
    userId: data.user_id,
    currentState: parseStoredState(data.current_state),
    selectedTypeId: data.selected_type_id,
    editingPostId: data.editing_post_id,
    editingTypeId: data.editing_type_id,
    draftText: data.draft_text,
    draftPhotoId: data.draft_photo_id,
    draftEntities: data.draft_entities,
    tempName: data.temp_name,
    tempEmoji: data.temp_emoji,
    tempPhotoId: data.temp_photo_id,
    tempTemplate: data.temp_template,
    lastBotMessageId: data.last_bot_message_id,
    replyTargetChatId: data.reply_target_chat_id,
    replyTargetMessageId: data.reply_target_message_id,
  };
}
