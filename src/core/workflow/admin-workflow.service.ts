import type { AdminDirectoryService } from '../auth/admin-directory.service.js';
import type { ConversationService, Conversation } from '../session/conversation.service.js';
import type { PostTypeManagerService } from '../posting/post-type-manager.service.js';
import type { PostTypeChanges } from '../../database/repositories/post-type.repository.js';
import type { PostManagerService } from '../posting/post-manager.service.js';
import type { PostPublisher } from '../posting/post-publisher.service.js';
import type { AdminState, DraftFields } from '../../database/models/admin-state.model.js';
import type { PublishedPost } from '../../database/models/published-post.model.js';
import { ConversationStateMachine } from '../session/conversation-state-machine.js';
import {
  ConversationState,
  StartTarget,
  TypeField,
} from '../../shared/constants/flow-states.js';
import { ValidationHelper } from '../../shared/helpers/validation.helper.js';
import { parseEntities, serializeEntities } from '../../utils/message-entities.js';
import { logger } from '../../utils/logger.js';
import type {
  AdminEvent,
  ForumAction,
  RejectionReason,
  StepEvent,
  WorkflowEffect,
  WorkflowOutcome,
} from './admin-workflow.types.js';

type TextEvent = Extract<AdminEvent, { type: 'text' }>;

const S = ConversationState;

function promptOf(conversation: Conversation): number {
  return conversation.kind === 'absent' ? 0 : conversation.state.lastBotMessageId;
}

function stepOf(conversation: Conversation): ConversationState | null {
  return conversation.kind === 'active' ? conversation.step : null;
}

function reject(
  reason: RejectionReason,
  step: ConversationState | null,
  detail?: string
): WorkflowOutcome {
  return detail === undefined
    ? { kind: 'rejected', reason, step }
    : { kind: 'rejected', reason, step, detail };
}

/**
 * The post type change an edit-type step asks for, or null when the input does not fit the step
 */
function typeChange(
  step: ConversationState,
  event: StepEvent
): { field: TypeField; changes: PostTypeChanges } | null {
  if (step === S.EDIT_TYPE_IMAGE) {
    return event.type === 'photo' ? { field: TypeField.IMAGE, changes: { photoId: event.fileId } } : null;
  }
  if (event.type !== 'text') {
    return null;
  }

  switch (step) {
    case S.EDIT_TYPE_NAME:
      return { field: TypeField.NAME, changes: { name: event.text.trim() } };
    case S.EDIT_TYPE_EMOJI:
      return { field: TypeField.EMOJI, changes: { emoji: event.text.trim() } };
    case S.EDIT_TYPE_TEMPLATE:
      return {
        field: TypeField.TEMPLATE,
        changes: { template: event.text, templateEntities: serializeEntities(event.entities) },
      };
    default:
      return null;
  }
}

/**
 * Drives admin conversations: authorisation guard, step gating, draft capture and commits.
 *
 * The next state is persisted only after a step's side effect succeeded, so a failing
 * forum call or storage write leaves the stored conversation where it was. A record write
 * that fails after the forum message changed still ends the conversation.
 */
export class AdminWorkflowService {
  constructor(
    private directory: AdminDirectoryService,
    private conversations: ConversationService,
    private postTypes: PostTypeManagerService,
    private posts: PostManagerService,
    private publisher: PostPublisher
  ) {}

  async handle(userId: number, event: AdminEvent): Promise<WorkflowOutcome> {
    if (this.directory.shouldIgnore(userId)) {
      logger.debug(`Ignoring ${event.type} from non-admin user ${userId}`);
      return { kind: 'ignored' };
    }

    const conversation = this.conversations.load(userId);

    switch (event.type) {
      case 'start':
        return this.start(userId, conversation, event.target);
      case 'manage-type':
        return this.openType(userId, conversation, event.typeId);
      case 'cancel':
        return this.cancel(userId, conversation);
      default:
        if (conversation.kind !== 'active') {
          return { kind: 'unhandled' };
        }
        return this.handleStep(conversation.state, conversation.step, event);
    }
  }

  private async start(
    userId: number,
    conversation: Conversation,
    target: StartTarget
  ): Promise<WorkflowOutcome> {
    if (target === StartTarget.NEW_POST && this.postTypes.getActiveTypes().length === 0) {
      return reject('no_active_types', stepOf(conversation));
    }

    const state = await this.conversations.begin(userId, ConversationStateMachine.entryState(target));
    return { kind: 'advanced', state, previousPromptId: promptOf(conversation) };
  }

  private async openType(
    userId: number,
    conversation: Conversation,
    typeId: number
  ): Promise<WorkflowOutcome> {
    if (!this.postTypes.findType(typeId)) {
      return reject('type_not_found', stepOf(conversation));
    }

    const state = await this.conversations.begin(userId, S.MANAGE_TYPES, { editingTypeId: typeId });
    return { kind: 'advanced', state, previousPromptId: promptOf(conversation) };
  }

  private async cancel(userId: number, conversation: Conversation): Promise<WorkflowOutcome> {
    if (conversation.kind === 'absent') {
      return { kind: 'cancelled', workflow: null, previousPromptId: 0 };
    }

    await this.conversations.clear(userId);
    const workflow =
      conversation.kind === 'active' ? ConversationStateMachine.workflowOf(conversation.step) : null;

    logger.info(`User ${userId} cancelled ${workflow ?? 'idle conversation'}`);
    return { kind: 'cancelled', workflow, previousPromptId: conversation.state.lastBotMessageId };
  }

  private async handleStep(
    state: AdminState,
    step: ConversationState,
    event: StepEvent
  ): Promise<WorkflowOutcome> {
    switch (step) {
      case S.NEW_POST_SELECT_TYPE:
        return event.type === 'select'
          ? this.selectType(state, step, event.typeId)
          : reject('unexpected_input', step);

      case S.NEW_POST_ENTER_TEXT:
        return event.type === 'text'
          ? this.enterPostText(state, step, event)
          : reject('unexpected_input', step);

      case S.NEW_POST_CONFIRM:
        return event.type === 'confirm'
          ? this.publishPost(state, step)
          : reject('unexpected_input', step);

      case S.EDIT_POST_ENTER_LINK:
        return event.type === 'text'
          ? this.findPostToEdit(state, step, event.text)
          : reject('unexpected_input', step);

      case S.EDIT_POST_ENTER_TEXT:
        return event.type === 'text'
          ? this.editPost(state, step, event)
          : reject('unexpected_input', step);

      case S.DELETE_POST_ENTER_LINK:
        return event.type === 'text'
          ? this.deletePost(state, step, event.text)
          : reject('unexpected_input', step);

      case S.NEW_TYPE_ENTER_NAME:
        if (event.type !== 'text') {
          return reject('unexpected_input', step);
        }
        if (event.text.trim() === '') {
          return reject('empty_text', step);
        }
        return this.advance(state, S.NEW_TYPE_ENTER_EMOJI, { tempName: event.text.trim() });

      case S.NEW_TYPE_ENTER_EMOJI:
        if (event.type === 'skip') {
          return this.advance(state, S.NEW_TYPE_ENTER_IMAGE, { tempEmoji: '' });
        }
        if (event.type !== 'text') {
          return reject('unexpected_input', step);
        }
        if (event.text.trim() === '') {
          return reject('empty_text', step);
        }
        return this.advance(state, S.NEW_TYPE_ENTER_IMAGE, { tempEmoji: event.text.trim() });

      case S.NEW_TYPE_ENTER_IMAGE:
        if (event.type === 'photo') {
          return this.advance(state, S.NEW_TYPE_ENTER_TEMPLATE, { tempPhotoId: event.fileId });
        }
        if (event.type === 'skip') {
          return this.advance(state, S.NEW_TYPE_ENTER_TEMPLATE, { tempPhotoId: '' });
        }
        return reject('unexpected_input', step);

      case S.NEW_TYPE_ENTER_TEMPLATE:
        return event.type === 'text'
          ? this.createType(state, step, event)
          : reject('unexpected_input', step);

      case S.MANAGE_TYPES:
        return this.manageType(state, step, event);

      case S.EDIT_TYPE_NAME:
      case S.EDIT_TYPE_EMOJI:
      case S.EDIT_TYPE_TEMPLATE:
      case S.EDIT_TYPE_IMAGE:
        return this.updateType(state, step, event);

      case S.EDIT_ADMIN_IDS:
        return event.type === 'text'
          ? this.setAdmins(state, step, event.text)
          : reject('unexpected_input', step);

      case S.EDIT_FORUM_ID:
      case S.EDIT_TOPIC_ID:
        return event.type === 'text'
          ? this.setForumTarget(state, step, event.text)
          : reject('unexpected_input', step);
    }
  }

  private async advance(
    state: AdminState,
    step: ConversationState,
    changes: Partial<DraftFields> = {}
  ): Promise<WorkflowOutcome> {
    const next = await this.conversations.advance(state, step, changes);
    return { kind: 'advanced', state: next, previousPromptId: state.lastBotMessageId };
  }

  private async commit(
    state: AdminState,
    step: ConversationState,
    effect: WorkflowEffect
  ): Promise<WorkflowOutcome> {
    await this.conversations.clear(state.userId);

    const workflow = ConversationStateMachine.workflowOf(step);
    logger.info(`User ${state.userId} completed ${workflow}: ${effect.type}`);
    return { kind: 'committed', workflow, effect, previousPromptId: state.lastBotMessageId };
  }

  /**
   * Ends the conversation once the forum message changed, even when its record could not follow
   */
  private async commitUnrecorded(
    state: AdminState,
    step: ConversationState,
    action: ForumAction,
    message: Pick<PublishedPost, 'chatId' | 'topicId' | 'messageId'>,
    error: unknown
  ): Promise<WorkflowOutcome> {
    logger.error(
      `Message ${message.messageId} in ${message.chatId} was ${action} but its record was not updated`,
      error
    );
    return this.commit(state, step, {
      type: 'post_unrecorded',
      action,
      chatId: message.chatId,
      topicId: message.topicId,
      messageId: message.messageId,
    });
  }

  private async selectType(
    state: AdminState,
    step: ConversationState,
    typeId: number
  ): Promise<WorkflowOutcome> {
    const postType = this.postTypes.findType(typeId);
    if (!postType) {
      return reject('type_not_found', step);
    }
    if (!postType.isActive) {
      return reject('type_inactive', step);
    }
    return this.advance(state, S.NEW_POST_ENTER_TEXT, { selectedTypeId: typeId });
  }

  private async enterPostText(
    state: AdminState,
    step: ConversationState,
    event: TextEvent
  ): Promise<WorkflowOutcome> {
    if (event.text.trim() === '') {
      return reject('empty_text', step);
    }

    const postType = this.postTypes.findType(state.selectedTypeId);
    if (!postType) {
      return reject('type_not_found', step);
    }

    return this.advance(state, S.NEW_POST_CONFIRM, {
      draftText: event.text,
      draftEntities: serializeEntities(event.entities),
      draftPhotoId: postType.photoId,
    });
  }

  private async publishPost(state: AdminState, step: ConversationState): Promise<WorkflowOutcome> {
    const target = this.directory.getForumTarget();
    if (!target) {
      return reject('forum_not_configured', step);
    }

    const messageId = await this.publisher.publish(target, {
      text: state.draftText,
      entities: parseEntities(state.draftEntities),
      photoId: state.draftPhotoId,
    });

    let post: PublishedPost;
    try {
      post = await this.posts.recordPublished({
        postTypeId: state.selectedTypeId,
        chatId: target.chatId,
        topicId: target.topicId,
        messageId,
        text: state.draftText,
        photoId: state.draftPhotoId,
        entities: state.draftEntities,
      });
    } catch (error) {
      return this.commitUnrecorded(state, step, 'published', { ...target, messageId }, error);
    }

    return this.commit(state, step, { type: 'post_published', post });
  }

  private async findPostToEdit(
    state: AdminState,
    step: ConversationState,
    link: string
  ): Promise<WorkflowOutcome> {
    const lookup = this.posts.findByLink(link);
    if (lookup.status !== 'found') {
      return reject(lookup.status === 'invalid_link' ? 'invalid_link' : 'post_not_found', step);
    }
    return this.advance(state, S.EDIT_POST_ENTER_TEXT, { editingPostId: lookup.post.id });
  }

  private async editPost(
    state: AdminState,
    step: ConversationState,
    event: TextEvent
  ): Promise<WorkflowOutcome> {
    if (event.text.trim() === '') {
      return reject('empty_text', step);
    }

    const post = this.posts.findPost(state.editingPostId);
    if (!post) {
      return reject('post_not_found', step);
    }

    const entities = event.entities ?? [];
    await this.publisher.edit(post, event.text, entities);

    let updated: PublishedPost;
    try {
      updated = await this.posts.editPost(post.id, event.text, serializeEntities(entities));
    } catch (error) {
      return this.commitUnrecorded(state, step, 'edited', post, error);
    }

    return this.commit(state, step, { type: 'post_edited', post: updated });
  }

  private async deletePost(
    state: AdminState,
    step: ConversationState,
    link: string
  ): Promise<WorkflowOutcome> {
    const lookup = this.posts.findByLink(link);
    if (lookup.status !== 'found') {
      return reject(lookup.status === 'invalid_link' ? 'invalid_link' : 'post_not_found', step);
    }

    await this.publisher.remove(lookup.post);

    try {
      await this.posts.deletePost(lookup.post.id);
    } catch (error) {
      return this.commitUnrecorded(state, step, 'deleted', lookup.post, error);
    }

    return this.commit(state, step, { type: 'post_deleted', post: lookup.post });
  }

  private async createType(
    state: AdminState,
    step: ConversationState,
    event: TextEvent
  ): Promise<WorkflowOutcome> {
    if (event.text.trim() === '') {
      return reject('empty_text', step);
    }

    const postType = await this.postTypes.createType({
      name: state.tempName,
      emoji: state.tempEmoji,
      photoId: state.tempPhotoId,
      template: event.text,
      templateEntities: serializeEntities(event.entities),
    });

    return this.commit(state, step, { type: 'type_created', postType });
  }

  private async manageType(
    state: AdminState,
    step: ConversationState,
    event: StepEvent
  ): Promise<WorkflowOutcome> {
    if (event.type !== 'edit-type-field' && event.type !== 'toggle-type') {
      return reject('unexpected_input', step);
    }
    if (event.typeId !== state.editingTypeId) {
      return reject('unexpected_input', step);
    }
    if (!this.postTypes.findType(event.typeId)) {
      return reject('type_not_found', step);
    }

    if (event.type === 'edit-type-field') {
      return this.advance(state, ConversationStateMachine.typeFieldState(event.field));
    }

    const postType = await this.postTypes.toggleActive(event.typeId);
    return this.commit(state, step, { type: 'type_updated', postType, field: 'active' });
  }

  private async updateType(
    state: AdminState,
    step: ConversationState,
    event: StepEvent
  ): Promise<WorkflowOutcome> {
    const change = typeChange(step, event);
    if (!change) {
      return reject('unexpected_input', step);
    }
    if (event.type === 'text' && event.text.trim() === '') {
      return reject('empty_text', step);
    }
    if (!this.postTypes.findType(state.editingTypeId)) {
      return reject('type_not_found', step);
    }

    const postType = await this.postTypes.updateType(state.editingTypeId, change.changes);
    return this.commit(state, step, { type: 'type_updated', postType, field: change.field });
  }

  private async setAdmins(
    state: AdminState,
    step: ConversationState,
    text: string
  ): Promise<WorkflowOutcome> {
    const parsed = ValidationHelper.parseIdList(text);
    if (!parsed.ok) {
      return reject('invalid_id', step, parsed.invalidPart);
    }
    if (parsed.ids.length === 0) {
      return reject('empty_admin_list', step);
    }
    // Saving a list without yourself would lock you out
    if (!parsed.ids.includes(state.userId)) {
      return reject('self_not_included', step, String(state.userId));
    }

    const adminIds = await this.directory.setAdmins(parsed.ids);
    return this.commit(state, step, { type: 'admins_updated', adminIds });
  }

  private async setForumTarget(
    state: AdminState,
    step: ConversationState,
    text: string
  ): Promise<WorkflowOutcome> {
    const value = text.trim();

    if (step === S.EDIT_FORUM_ID) {
      if (!ValidationHelper.isValidChatId(value)) {
        return reject('invalid_id', step, value);
      }
      const target = await this.directory.setForumChat(Number(value));
      return this.commit(state, step, { type: 'forum_target_updated', target });
    }

    if (!ValidationHelper.isValidTopicId(value)) {
      return reject('invalid_id', step, value);
    }
    const target = await this.directory.setForumTopic(Number(value));
    return this.commit(state, step, { type: 'forum_target_updated', target });
  }
}
