import { BaseRepository } from './base.repository.js';
import type { WriteQueue } from '../write-queue.js';
import { toAdminState, type AdminState } from '../models/admin-state.model.js';

export type AdminStateLookup = { found: true; state: AdminState } | { found: false };

const UPSERT_STATE = `
INSERT INTO admin_state (
  user_id, current_state, selected_type_id, draft_text, draft_photo_id, draft_entities,
  editing_post_id, editing_type_id, temp_name, temp_emoji, temp_photo_id, temp_template,
  last_bot_message_id, reply_target_chat_id, reply_target_message_id
) VALUES (
  @userId, @currentState, @selectedTypeId, @draftText, @draftPhotoId, @draftEntities,
  @editingPostId, @editingTypeId, @tempName, @tempEmoji, @tempPhotoId, @tempTemplate,
  @lastBotMessageId, @replyTargetChatId, @replyTargetMessageId
)
ON CONFLICT(user_id) DO UPDATE SET
  current_state = excluded.current_state,
  selected_type_id = excluded.selected_type_id,
  draft_text = excluded.draft_text,
  draft_photo_id = excluded.draft_photo_id,
  draft_entities = excluded.draft_entities,
  editing_post_id = excluded.editing_post_id,
  editing_type_id = excluded.editing_type_id,
  temp_name = excluded.temp_name,
  temp_emoji = excluded.temp_emoji,
  temp_photo_id = excluded.temp_photo_id,
  temp_template = excluded.temp_template,
  last_bot_message_id = excluded.last_bot_message_id,
  reply_target_chat_id = excluded.reply_target_chat_id,
  reply_target_message_id = excluded.reply_target_message_id
`;

/**
 * Repository for per-administrator conversation state
 * Zero or one row per administrator, keyed by user_id
 */
export class AdminStateRepository extends BaseRepository<AdminState> {
  constructor(queue: WriteQueue) {
    super(queue, 'admin_state', 'user_id');
  }

  protected fromRow(row: unknown): AdminState {
    return toAdminState(row);
  }

  /**
   * Insert or overwrite every field of the administrator's row
   */
  async save(state: AdminState): Promise<void> {
    await this.write((db) =>
      db.prepare(UPSERT_STATE).run({ ...state, currentState: state.currentState ?? '' })
    );
  }

  get(userId: number): AdminStateLookup {
    const state = this.findById(userId);
    return state === null ? { found: false } : { found: true, state };
  }

  async clear(userId: number): Promise<void> {
    await this.deleteById(userId);
  }

  /**
   * Record the id of the prompt last sent to the administrator.
   * Resolves false when the administrator has no row.
   */
  async rememberPrompt(userId: number, messageId: number): Promise<boolean> {
    const result = await this.write((db) =>
      db
        .prepare('UPDATE admin_state SET last_bot_message_id = ? WHERE user_id = ?')
        .run(messageId, userId)
    );
    return result.changes > 0;
  }
}
