import { AdminWorkflowService } from '../src/core/workflow/admin-workflow.service.js';
import type { AdminEvent, WorkflowOutcome } from '../src/core/workflow/admin-workflow.types.js';
import { ConversationService } from '../src/core/session/conversation.service.js';
import { AdminDirectoryService } from '../src/core/auth/admin-directory.service.js';
import { PostTypeManagerService } from '../src/core/posting/post-type-manager.service.js';
import { PostManagerService } from '../src/core/posting/post-manager.service.js';
import { AdminStateRepository } from '../src/database/repositories/admin-state.repository.js';
import { AdminConfigRepository } from '../src/database/repositories/admin-config.repository.js';
import { PostTypeRepository } from '../src/database/repositories/post-type.repository.js';
import { PublishedPostRepository } from '../src/database/repositories/published-post.repository.js';
import { createAdminState, type AdminState } from '../src/database/models/admin-state.model.js';
import {
  ConversationState,
  StartTarget,
  TypeField,
  Workflow,
} from '../src/shared/constants/flow-states.js';
import { FakePostPublisher } from './helpers/fake-publisher.js';
import { createTestStore, type TestStore } from './helpers/test-store.js';

const S = ConversationState;
const ADMIN = 42;
const FORUM_CHAT = -1001234567890;
const POST_LINK = 'https://t.me/c/1234567890/5/900';

function advancedState(outcome: WorkflowOutcome): AdminState {
  if (outcome.kind !== 'advanced') {
    throw new Error(`Expected an advanced outcome, got ${outcome.kind}`);
  }
  return outcome.state;
}

describe('AdminWorkflowService', () => {
  let store: TestStore;
  let conversations: ConversationService;
  let directory: AdminDirectoryService;
  let postTypes: PostTypeManagerService;
  let posts: PostManagerService;
  let publisher: FakePostPublisher;
  let workflow: AdminWorkflowService;

  const send = (event: AdminEvent, userId = ADMIN): Promise<WorkflowOutcome> =>
    workflow.handle(userId, event);

  function insertType(id: number, name: string, active = true, photoId = ''): void {
    store.db
      .prepare(
        `INSERT INTO post_types (id, name, emoji, photo_id, template, template_entities, is_active)
         VALUES (?, ?, '', ?, ?, '', ?)`
      )
      .run(id, name, photoId, `${name} template`, active ? 1 : 0);
  }

  function currentStep(userId = ADMIN): ConversationState | null | 'absent' {
    const conversation = conversations.load(userId);
    return conversation.kind === 'absent' ? 'absent' : conversation.state.currentState;
  }

  beforeEach(async () => {
    store = await createTestStore();
    conversations = new ConversationService(new AdminStateRepository(store.queue));
    directory = new AdminDirectoryService(new AdminConfigRepository(store.queue));
    postTypes = new PostTypeManagerService(new PostTypeRepository(store.queue));
    posts = new PostManagerService(new PublishedPostRepository(store.queue), directory);
    publisher = new FakePostPublisher();
    workflow = new AdminWorkflowService(directory, conversations, postTypes, posts, publisher);

    await directory.setAdmins([ADMIN]);
    await directory.setForumTarget(FORUM_CHAT, 5);
  });

  afterEach(async () => {
    await store.close();
  });

  describe('authorisation', () => {
    it('ignores non-admins before touching conversation state', async () => {
      const load = jest.spyOn(conversations, 'load');

      await expect(send({ type: 'start', target: StartTarget.NEW_POST }, 99)).resolves.toEqual({
        kind: 'ignored',
      });
      await expect(send({ type: 'text', text: 'hi' }, 99)).resolves.toEqual({ kind: 'ignored' });

      expect(load).not.toHaveBeenCalled();
      expect(currentStep(99)).toBe('absent');
    });
  });

  describe('new post', () => {
    beforeEach(() => {
      insertType(7, 'News');
    });

    it('publishes the draft and clears the conversation', async () => {
      const started = advancedState(await send({ type: 'start', target: StartTarget.NEW_POST }));
      expect(started.currentState).toBe(S.NEW_POST_SELECT_TYPE);

      const selected = advancedState(await send({ type: 'select', typeId: 7 }));
      expect(selected.selectedTypeId).toBe(7);

      const drafted = advancedState(await send({ type: 'text', text: 'Hello' }));
      expect(drafted.currentState).toBe(S.NEW_POST_CONFIRM);
      expect(drafted.draftText).toBe('Hello');

      const outcome = await send({ type: 'confirm' });

      expect(outcome).toEqual({
        kind: 'committed',
        workflow: Workflow.NEW_POST,
        previousPromptId: 0,
        effect: {
          type: 'post_published',
          post: {
            id: 1,
            postTypeId: 7,
            chatId: FORUM_CHAT,
            topicId: 5,
            messageId: 500,
            text: 'Hello',
            photoId: '',
            entities: '',
            createdAt: expect.any(String),
          },
        },
      });
      expect(publisher.published).toEqual([
        {
          target: { chatId: FORUM_CHAT, topicId: 5 },
          content: { text: 'Hello', entities: [], photoId: '' },
          messageId: 500,
        },
      ]);
      expect(posts.listRecent(10).map((post) => post.messageId)).toEqual([500]);
      expect(currentStep()).toBe('absent');
    });

    it('keeps formatting and the type image in the draft', async () => {
      insertType(8, 'Photo news', true, 'type-photo');
      await send({ type: 'start', target: StartTarget.NEW_POST });
      await send({ type: 'select', typeId: 8 });

      const drafted = advancedState(
        await send({ type: 'text', text: 'Bold', entities: [{ type: 'bold', offset: 0, length: 4 }] })
      );

      expect(drafted.draftPhotoId).toBe('type-photo');
      expect(drafted.draftEntities).toBe('[{"type":"bold","offset":0,"length":4}]');
    });

    it('rejects input the current step does not take', async () => {
      await send({ type: 'start', target: StartTarget.NEW_POST });

      await expect(send({ type: 'text', text: 'too early' })).resolves.toEqual({
        kind: 'rejected',
        reason: 'unexpected_input',
        step: S.NEW_POST_SELECT_TYPE,
      });
      await expect(send({ type: 'confirm' })).resolves.toEqual({
        kind: 'rejected',
        reason: 'unexpected_input',
        step: S.NEW_POST_SELECT_TYPE,
      });
      expect(currentStep()).toBe(S.NEW_POST_SELECT_TYPE);
      expect(publisher.published).toEqual([]);
    });

    it('rejects an empty post text', async () => {
      await send({ type: 'start', target: StartTarget.NEW_POST });
      await send({ type: 'select', typeId: 7 });

      await expect(send({ type: 'text', text: '   ' })).resolves.toEqual({
        kind: 'rejected',
        reason: 'empty_text',
        step: S.NEW_POST_ENTER_TEXT,
      });
    });

    it('refuses missing and inactive types', async () => {
      insertType(9, 'Old', false);
      await send({ type: 'start', target: StartTarget.NEW_POST });

      await expect(send({ type: 'select', typeId: 99 })).resolves.toEqual({
        kind: 'rejected',
        reason: 'type_not_found',
        step: S.NEW_POST_SELECT_TYPE,
      });
      await expect(send({ type: 'select', typeId: 9 })).resolves.toEqual({
        kind: 'rejected',
        reason: 'type_inactive',
        step: S.NEW_POST_SELECT_TYPE,
      });
    });

    it('starts over with a fresh draft and hands back the old prompt', async () => {
      await send({ type: 'start', target: StartTarget.NEW_POST });
      await send({ type: 'select', typeId: 7 });
      await send({ type: 'text', text: 'Old draft' });
      await conversations.rememberPrompt(ADMIN, 321);

      const outcome = await send({ type: 'start', target: StartTarget.NEW_POST });

      expect(outcome.kind === 'advanced' && outcome.previousPromptId).toBe(321);
      const state = advancedState(outcome);
      expect(state.draftText).toBe('');
      expect(state.selectedTypeId).toBe(0);
      expect(state.currentState).toBe(S.NEW_POST_SELECT_TYPE);
    });

    it('starts from a fresh draft after a cancel', async () => {
      await send({ type: 'start', target: StartTarget.NEW_POST });
      await send({ type: 'select', typeId: 7 });
      await send({ type: 'text', text: 'Abandoned' });
      await conversations.rememberPrompt(ADMIN, 88);
      await send({ type: 'cancel' });

      const restarted = advancedState(await send({ type: 'start', target: StartTarget.NEW_POST }));

      expect(restarted).toEqual(createAdminState(ADMIN, S.NEW_POST_SELECT_TYPE));
    });

    it('leaves the confirmation step in place when publishing fails', async () => {
      await send({ type: 'start', target: StartTarget.NEW_POST });
      await send({ type: 'select', typeId: 7 });
      await send({ type: 'text', text: 'Hello' });
      publisher.failure = new Error('telegram down');

      await expect(send({ type: 'confirm' })).rejects.toThrow('telegram down');

      expect(currentStep()).toBe(S.NEW_POST_CONFIRM);
      expect(posts.count()).toBe(0);
    });

    it('needs a configured forum to publish', async () => {
      await send({ type: 'start', target: StartTarget.NEW_POST });
      await send({ type: 'select', typeId: 7 });
      await send({ type: 'text', text: 'Hello' });
      await directory.setForumChat(0);

      await expect(send({ type: 'confirm' })).resolves.toEqual({
        kind: 'rejected',
        reason: 'forum_not_configured',
        step: S.NEW_POST_CONFIRM,
      });
    });

    it('ends the conversation when a published post cannot be recorded', async () => {
      await posts.recordPublished({
        postTypeId: 7,
        chatId: FORUM_CHAT,
        topicId: 5,
        messageId: 500,
        text: 'Earlier',
        photoId: '',
        entities: '',
      });
      await send({ type: 'start', target: StartTarget.NEW_POST });
      await send({ type: 'select', typeId: 7 });
      await send({ type: 'text', text: 'Hello' });

      await expect(send({ type: 'confirm' })).resolves.toEqual({
        kind: 'committed',
        workflow: Workflow.NEW_POST,
        previousPromptId: 0,
        effect: { type: 'post_unrecorded', action: 'published', chatId: FORUM_CHAT, topicId: 5, messageId: 500 },
      });
      expect(currentStep()).toBe('absent');

      await expect(send({ type: 'confirm' })).resolves.toEqual({ kind: 'unhandled' });
      expect(publisher.published.map((message) => message.messageId)).toEqual([500]);
      expect(posts.count()).toBe(1);
    });
  });

  it('refuses to start a post without active types', async () => {
    await expect(send({ type: 'start', target: StartTarget.NEW_POST })).resolves.toEqual({
      kind: 'rejected',
      reason: 'no_active_types',
      step: null,
    });
    expect(currentStep()).toBe('absent');
  });

  it('answers step input outside a workflow as unhandled', async () => {
    await expect(send({ type: 'confirm' })).resolves.toEqual({ kind: 'unhandled' });
    await expect(send({ type: 'text', text: 'hello?' })).resolves.toEqual({ kind: 'unhandled' });
  });

  describe('cancel', () => {
    it('clears an active workflow', async () => {
      await send({ type: 'start', target: StartTarget.EDIT_POST });
      await conversations.rememberPrompt(ADMIN, 55);

      await expect(send({ type: 'cancel' })).resolves.toEqual({
        kind: 'cancelled',
        workflow: Workflow.EDIT_POST,
        previousPromptId: 55,
      });
      expect(currentStep()).toBe('absent');
    });

    it('succeeds with nothing in progress', async () => {
      await expect(send({ type: 'cancel' })).resolves.toEqual({
        kind: 'cancelled',
        workflow: null,
        previousPromptId: 0,
      });
    });
  });

  describe('edit and delete', () => {
    beforeEach(async () => {
      insertType(7, 'News');
      await posts.recordPublished({
        postTypeId: 7,
        chatId: FORUM_CHAT,
        topicId: 5,
        messageId: 900,
        text: 'Original',
        photoId: '',
        entities: '',
      });
    });

    it('edits a post found by its link', async () => {
      await send({ type: 'start', target: StartTarget.EDIT_POST });
      const found = advancedState(await send({ type: 'text', text: POST_LINK }));
      expect(found.currentState).toBe(S.EDIT_POST_ENTER_TEXT);
      expect(found.editingPostId).toBe(1);

      const entities = [{ type: 'bold' as const, offset: 0, length: 7 }];
      const outcome = await send({ type: 'text', text: 'Updated', entities });

      expect(outcome.kind === 'committed' && outcome.effect).toEqual({
        type: 'post_edited',
        post: expect.objectContaining({
          id: 1,
          text: 'Updated',
          entities: '[{"type":"bold","offset":0,"length":7}]',
        }),
      });
      expect(publisher.edited).toHaveLength(1);
      expect(publisher.edited[0]?.text).toBe('Updated');
      expect(currentStep()).toBe('absent');
    });

    it('tells invalid links from unknown posts', async () => {
      await send({ type: 'start', target: StartTarget.EDIT_POST });

      await expect(send({ type: 'text', text: 'not a link' })).resolves.toEqual({
        kind: 'rejected',
        reason: 'invalid_link',
        step: S.EDIT_POST_ENTER_LINK,
      });
      await expect(send({ type: 'text', text: 'https://t.me/c/1234567890/5/901' })).resolves.toEqual({
        kind: 'rejected',
        reason: 'post_not_found',
        step: S.EDIT_POST_ENTER_LINK,
      });
    });

    it('finds posts by public links in the configured forum', async () => {
      await send({ type: 'start', target: StartTarget.EDIT_POST });

      const found = advancedState(await send({ type: 'text', text: 'https://t.me/some_forum/900' }));
      expect(found.editingPostId).toBe(1);
    });

    it('deletes the forum message and its record', async () => {
      await send({ type: 'start', target: StartTarget.DELETE_POST });

      const outcome = await send({ type: 'text', text: POST_LINK });

      expect(outcome.kind).toBe('committed');
      expect(publisher.removed.map((post) => post.messageId)).toEqual([900]);
      expect(posts.findPost(1)).toBeNull();
    });

    it('ends the delete when the record outlives the forum message', async () => {
      jest.spyOn(posts, 'deletePost').mockRejectedValue(new Error('disk full'));
      await send({ type: 'start', target: StartTarget.DELETE_POST });

      const outcome = await send({ type: 'text', text: POST_LINK });

      expect(outcome.kind === 'committed' && outcome.effect).toEqual({
        type: 'post_unrecorded',
        action: 'deleted',
        chatId: FORUM_CHAT,
        topicId: 5,
        messageId: 900,
      });
      expect(publisher.removed).toHaveLength(1);
      expect(posts.findPost(1)).not.toBeNull();
      expect(currentStep()).toBe('absent');
    });

    it('ends the edit when the stored text cannot be updated', async () => {
      jest.spyOn(posts, 'editPost').mockRejectedValue(new Error('disk full'));
      await send({ type: 'start', target: StartTarget.EDIT_POST });
      await send({ type: 'text', text: POST_LINK });

      const outcome = await send({ type: 'text', text: 'Updated' });

      expect(outcome.kind === 'committed' && outcome.effect).toEqual({
        type: 'post_unrecorded',
        action: 'edited',
        chatId: FORUM_CHAT,
        topicId: 5,
        messageId: 900,
      });
      expect(publisher.edited).toHaveLength(1);
      expect(posts.findPost(1)?.text).toBe('Original');
      expect(currentStep()).toBe('absent');
    });
  });

  describe('post types', () => {
    it('creates a type without an emoji or image', async () => {
      await send({ type: 'start', target: StartTarget.NEW_TYPE });
      const named = advancedState(await send({ type: 'text', text: '  Weekly  ' }));
      expect(named.tempName).toBe('Weekly');
      expect(named.currentState).toBe(S.NEW_TYPE_ENTER_EMOJI);

      const noEmoji = advancedState(await send({ type: 'skip' }));
      expect(noEmoji.currentState).toBe(S.NEW_TYPE_ENTER_IMAGE);
      expect(noEmoji.tempEmoji).toBe('');

      const skipped = advancedState(await send({ type: 'skip' }));
      expect(skipped.currentState).toBe(S.NEW_TYPE_ENTER_TEMPLATE);

      const outcome = await send({ type: 'text', text: 'Weekly digest' });

      expect(outcome.kind === 'committed' && outcome.effect).toEqual({
        type: 'type_created',
        postType: expect.objectContaining({
          id: 1,
          name: 'Weekly',
          emoji: '',
          photoId: '',
          template: 'Weekly digest',
          isActive: true,
        }),
      });
    });

    it('stores the image sent for a new type', async () => {
      await send({ type: 'start', target: StartTarget.NEW_TYPE });
      await send({ type: 'text', text: 'Gallery' });
      await send({ type: 'skip' });

      const withImage = advancedState(await send({ type: 'photo', fileId: 'photo-9' }));
      expect(withImage.tempPhotoId).toBe('photo-9');

      await send({ type: 'text', text: 'Look' });
      expect(postTypes.getType(1).photoId).toBe('photo-9');
    });

    it('stores the emoji sent for a new type', async () => {
      await send({ type: 'start', target: StartTarget.NEW_TYPE });
      await send({ type: 'text', text: 'Events' });

      await expect(send({ type: 'photo', fileId: 'photo-1' })).resolves.toEqual({
        kind: 'rejected',
        reason: 'unexpected_input',
        step: S.NEW_TYPE_ENTER_EMOJI,
      });
      await expect(send({ type: 'text', text: '   ' })).resolves.toEqual({
        kind: 'rejected',
        reason: 'empty_text',
        step: S.NEW_TYPE_ENTER_EMOJI,
      });

      const withEmoji = advancedState(await send({ type: 'text', text: ' 🎉 ' }));
      expect(withEmoji.currentState).toBe(S.NEW_TYPE_ENTER_IMAGE);
      expect(withEmoji.tempEmoji).toBe('🎉');

      await send({ type: 'skip' });
      await send({ type: 'text', text: 'Event details' });

      expect(postTypes.getType(1)).toEqual(
        expect.objectContaining({ name: 'Events', emoji: '🎉', photoId: '' })
      );
    });

    it('starts from a fresh draft after a commit', async () => {
      await send({ type: 'start', target: StartTarget.NEW_TYPE });
      await send({ type: 'text', text: 'Digest' });
      await send({ type: 'text', text: '📬' });
      await send({ type: 'photo', fileId: 'photo-3' });
      const outcome = await send({ type: 'text', text: 'Digest template' });
      expect(outcome.kind).toBe('committed');

      const restarted = advancedState(await send({ type: 'start', target: StartTarget.NEW_TYPE }));

      expect(restarted).toEqual(createAdminState(ADMIN, S.NEW_TYPE_ENTER_NAME));
    });

    it('rejects an empty type name', async () => {
      await send({ type: 'start', target: StartTarget.NEW_TYPE });

      await expect(send({ type: 'text', text: '  ' })).resolves.toEqual({
        kind: 'rejected',
        reason: 'empty_text',
        step: S.NEW_TYPE_ENTER_NAME,
      });
    });

    it('renames a type through its options', async () => {
      insertType(7, 'News');

      const opened = advancedState(await send({ type: 'manage-type', typeId: 7 }));
      expect(opened.currentState).toBe(S.MANAGE_TYPES);
      expect(opened.editingTypeId).toBe(7);

      const editing = advancedState(
        await send({ type: 'edit-type-field', typeId: 7, field: TypeField.NAME })
      );
      expect(editing.currentState).toBe(S.EDIT_TYPE_NAME);

      const outcome = await send({ type: 'text', text: 'Daily' });
      expect(outcome.kind === 'committed' && outcome.effect).toEqual({
        type: 'type_updated',
        field: TypeField.NAME,
        postType: expect.objectContaining({ id: 7, name: 'Daily' }),
      });
    });

    it('toggles a type straight from its options', async () => {
      insertType(7, 'News');
      await send({ type: 'manage-type', typeId: 7 });

      await expect(send({ type: 'toggle-type', typeId: 8 })).resolves.toEqual({
        kind: 'rejected',
        reason: 'unexpected_input',
        step: S.MANAGE_TYPES,
      });

      const outcome = await send({ type: 'toggle-type', typeId: 7 });
      expect(outcome.kind === 'committed' && outcome.effect).toEqual({
        type: 'type_updated',
        field: 'active',
        postType: expect.objectContaining({ id: 7, isActive: false }),
      });
    });

    it('only takes a photo for the image field', async () => {
      insertType(7, 'News');
      await send({ type: 'manage-type', typeId: 7 });
      await send({ type: 'edit-type-field', typeId: 7, field: TypeField.IMAGE });

      await expect(send({ type: 'text', text: 'photo please' })).resolves.toEqual({
        kind: 'rejected',
        reason: 'unexpected_input',
        step: S.EDIT_TYPE_IMAGE,
      });

      await send({ type: 'photo', fileId: 'photo-new' });
      expect(postTypes.getType(7).photoId).toBe('photo-new');
    });

    it('refuses to manage a missing type', async () => {
      await expect(send({ type: 'manage-type', typeId: 99 })).resolves.toEqual({
        kind: 'rejected',
        reason: 'type_not_found',
        step: null,
      });
    });
  });

  describe('access settings', () => {
    beforeEach(async () => {
      await send({ type: 'start', target: StartTarget.EDIT_ADMIN_IDS });
    });

    it('saves an admin list that includes the editor', async () => {
      const outcome = await send({ type: 'text', text: '42, 43' });

      expect(outcome.kind === 'committed' && outcome.effect).toEqual({
        type: 'admins_updated',
        adminIds: [42, 43],
      });
      expect(directory.isAdmin(43)).toBe(true);
    });

    it('refuses lists that would lock the editor out', async () => {
      await expect(send({ type: 'text', text: '43' })).resolves.toEqual({
        kind: 'rejected',
        reason: 'self_not_included',
        step: S.EDIT_ADMIN_IDS,
        detail: '42',
      });
      await expect(send({ type: 'text', text: ' , ' })).resolves.toEqual({
        kind: 'rejected',
        reason: 'empty_admin_list',
        step: S.EDIT_ADMIN_IDS,
      });
      await expect(send({ type: 'text', text: '42, abc' })).resolves.toEqual({
        kind: 'rejected',
        reason: 'invalid_id',
        step: S.EDIT_ADMIN_IDS,
        detail: 'abc',
      });
      expect(directory.listAdmins()).toEqual([42]);
    });

    it('updates the forum chat and topic', async () => {
      await send({ type: 'start', target: StartTarget.EDIT_FORUM_ID });
      await expect(send({ type: 'text', text: 'abc' })).resolves.toEqual({
        kind: 'rejected',
        reason: 'invalid_id',
        step: S.EDIT_FORUM_ID,
        detail: 'abc',
      });

      const chat = await send({ type: 'text', text: '-1005550001111' });
      expect(chat.kind === 'committed' && chat.effect).toEqual({
        type: 'forum_target_updated',
        target: { chatId: -1005550001111, topicId: 5 },
      });

      await send({ type: 'start', target: StartTarget.EDIT_TOPIC_ID });
      const topic = await send({ type: 'text', text: '12' });
      expect(topic.kind === 'committed' && topic.effect).toEqual({
        type: 'forum_target_updated',
        target: { chatId: -1005550001111, topicId: 12 },
      });
    });
  });
});
