import type { MessageEntity } from 'grammy/types';
import type { AdminState } from '../../database/models/admin-state.model.js';
import type { ForumTarget } from '../../database/models/admin-config.model.js';
import type { PostType } from '../../database/models/post-type.model.js';
import type { PublishedPost } from '../../database/models/published-post.model.js';
import type {
  ConversationState,
  StartTarget,
  TypeField,
  Workflow,
} from '../../shared/constants/flow-states.js';

/**
 * One inbound admin action, already stripped of transport details
 */
export type AdminEvent =
  | { type: 'start'; target: StartTarget }
  | { type: 'cancel' }
  | { type: 'select'; typeId: number }
  | { type: 'text'; text: string; entities?: MessageEntity[] }
  | { type: 'photo'; fileId: string }
  | { type: 'skip' }
  | { type: 'confirm' }
  | { type: 'manage-type'; typeId: number }
  | { type: 'edit-type-field'; typeId: number; field: TypeField }
  | { type: 'toggle-type'; typeId: number };

/** Events that only mean something inside a running workflow */
export type StepEvent = Exclude<AdminEvent, { type: 'start' | 'cancel' | 'manage-type' }>;

export type RejectionReason =
  | 'unexpected_input'
  | 'empty_text'
  | 'no_active_types'
  | 'type_not_found'
  | 'type_inactive'
  | 'invalid_link'
  | 'post_not_found'
  | 'invalid_id'
  | 'empty_admin_list'
  | 'self_not_included'
  | 'forum_not_configured';

/** What was done to the forum message when its record could not follow */
export type ForumAction = 'published' | 'edited' | 'deleted';

export type WorkflowEffect =
  | { type: 'post_published'; post: PublishedPost }
  | { type: 'post_edited'; post: PublishedPost }
  | { type: 'post_deleted'; post: PublishedPost }
  | { type: 'post_unrecorded'; action: ForumAction; chatId: number; topicId: number; messageId: number }
  | { type: 'type_created'; postType: PostType }
  | { type: 'type_updated'; postType: PostType; field: TypeField | 'active' }
  | { type: 'admins_updated'; adminIds: number[] }
  | { type: 'forum_target_updated'; target: ForumTarget };

/**
 * `previousPromptId` is the bot prompt that belonged to the step just left, 0 when none
 */
export type WorkflowOutcome =
  | { kind: 'ignored' }
  | { kind: 'unhandled' }
  | { kind: 'advanced'; state: AdminState; previousPromptId: number }
  | { kind: 'rejected'; reason: RejectionReason; step: ConversationState | null; detail?: string }
  | { kind: 'committed'; workflow: Workflow; effect: WorkflowEffect; previousPromptId: number }
  | { kind: 'cancelled'; workflow: Workflow | null; previousPromptId: number };
