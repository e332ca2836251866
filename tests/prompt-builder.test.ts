import { PromptBuilderService } from '../src/core/preview/prompt-builder.service.js';
import { PreviewGeneratorService } from '../src/core/preview/preview-generator.service.js';
import { AdminDirectoryService } from '../src/core/auth/admin-directory.service.js';
import { PostManagerService } from '../src/core/posting/post-manager.service.js';
import { PostTypeManagerService } from '../src/core/posting/post-type-manager.service.js';
import { AdminConfigRepository } from '../src/database/repositories/admin-config.repository.js';
import { PostTypeRepository } from '../src/database/repositories/post-type.repository.js';
import { PublishedPostRepository } from '../src/database/repositories/published-post.repository.js';
import { createAdminState } from '../src/database/models/admin-state.model.js';
import type { PostType } from '../src/database/models/post-type.model.js';
import { ConversationState } from '../src/shared/constants/flow-states.js';
import { createTestStore, type TestStore } from './helpers/test-store.js';

const S = ConversationState;

describe('PreviewGeneratorService', () => {
  const preview = new PreviewGeneratorService();

  const postType: PostType = {
    id: 3,
    name: 'News',
    emoji: '📰',
    photoId: 'type-photo',
    template: 'Title\nBody',
    templateEntities: '[{"type":"bold","offset":0,"length":5}]',
    isActive: true,
    createdAt: '2024-01-01 00:00:00',
  };

  it('shows the template under a heading with shifted formatting', () => {
    // 'Template for "News":\n\n' is 22 UTF-16 units long
    expect(preview.templatePrompt(postType)).toEqual({
      text: 'Template for "News":\n\nTitle\nBody\n\nSend the post text.',
      entities: [{ type: 'bold', offset: 22, length: 5 }],
      photoId: 'type-photo',
    });
  });

  it('previews the draft as it will be published', () => {
    const state = createAdminState(42, S.NEW_POST_CONFIRM, {
      draftText: 'Hello',
      draftEntities: '[{"type":"italic","offset":0,"length":5}]',
      draftPhotoId: 'type-photo',
    });

    expect(preview.postPreview(state)).toEqual({
      text: 'Post preview:\n\nHello',
      entities: [{ type: 'italic', offset: 15, length: 5 }],
      photoId: 'type-photo',
    });
  });

  it('shows the current template without its image', () => {
    expect(preview.currentTemplatePrompt(postType)).toEqual({
      text: 'Current template:\n\nTitle\nBody\n\nSend the new template.',
      entities: [{ type: 'bold', offset: 19, length: 5 }],
      photoId: '',
    });
  });
});

describe('PromptBuilderService', () => {
  let store: TestStore;
  let postTypes: PostTypeManagerService;
  let posts: PostManagerService;
  let directory: AdminDirectoryService;
  let prompts: PromptBuilderService;

  beforeEach(async () => {
    store = await createTestStore();
    directory = new AdminDirectoryService(new AdminConfigRepository(store.queue));
    postTypes = new PostTypeManagerService(new PostTypeRepository(store.queue));
    posts = new PostManagerService(new PublishedPostRepository(store.queue), directory);
    prompts = new PromptBuilderService(postTypes, posts, directory);

    await postTypes.createType({
      name: 'News',
      emoji: '📰',
      photoId: '',
      template: 'News template',
      templateEntities: '',
    });
  });

  afterEach(async () => {
    await store.close();
  });

  it('lists active types to choose from', () => {
    const prompt = prompts.build(createAdminState(42, S.NEW_POST_SELECT_TYPE));

    expect(prompt.text).toBe('Select the post type:');
    expect(prompt.keyboard.inline_keyboard).toEqual([
      [{ text: '📰 News', callback_data: 'select_type:1' }],
      [{ text: '❌ Cancel', callback_data: 'cancel' }],
    ]);
  });

  it('asks to confirm the preview', () => {
    const prompt = prompts.build(createAdminState(42, S.NEW_POST_CONFIRM, { draftText: 'Hello' }));

    expect(prompt.text).toBe('Post preview:\n\nHello');
    expect(prompt.keyboard.inline_keyboard).toEqual([
      [{ text: '✅ Publish', callback_data: 'confirm_post' }],
      [{ text: '❌ Cancel', callback_data: 'cancel' }],
    ]);
  });

  it('offers to skip the emoji of a new type', () => {
    const prompt = prompts.build(createAdminState(42, S.NEW_TYPE_ENTER_EMOJI, { tempName: 'Weekly' }));

    expect(prompt.text).toBe('Send an emoji for "Weekly", or skip.');
    expect(prompt.keyboard.inline_keyboard).toEqual([
      [{ text: '⏭ Skip', callback_data: 'skip_emoji' }],
      [{ text: '❌ Cancel', callback_data: 'cancel' }],
    ]);
  });

  it('offers to skip the image of a new type', () => {
    const prompt = prompts.build(createAdminState(42, S.NEW_TYPE_ENTER_IMAGE, { tempName: 'Weekly' }));

    expect(prompt.text).toBe('Send an image for "Weekly", or skip.');
    expect(prompt.keyboard.inline_keyboard).toEqual([
      [{ text: '⏭ Skip', callback_data: 'skip_image' }],
      [{ text: '❌ Cancel', callback_data: 'cancel' }],
    ]);
  });

  it('describes the type being managed', async () => {
    await postTypes.setActive(1, false);

    const prompt = prompts.build(createAdminState(42, S.MANAGE_TYPES, { editingTypeId: 1 }));

    expect(prompt.text).toBe('📰 News\nStatus: inactive\nImage: no\n\nWhat do you want to change?');
    expect(prompt.keyboard.inline_keyboard[2]).toEqual([
      { text: '✅ Activate', callback_data: 'toggle_type:1' },
    ]);
  });

  it('shows the current post text when editing', async () => {
    const post = await posts.recordPublished({
      postTypeId: 1,
      chatId: -1001234567890,
      topicId: 0,
      messageId: 10,
      text: 'Old text',
      photoId: '',
      entities: '',
    });

    const prompt = prompts.build(createAdminState(42, S.EDIT_POST_ENTER_TEXT, { editingPostId: post.id }));

    expect(prompt.text).toBe('Current post text:\n\nOld text\n\nSend the new text.');
  });

  it('shows the current admins', async () => {
    await directory.setAdmins([42, 7]);

    const prompt = prompts.build(createAdminState(42, S.EDIT_ADMIN_IDS));

    expect(prompt.text).toBe(
      'Current admins: 42, 7\n\nSend a comma-separated list of admin IDs. It must include your own ID (42).'
    );
  });

  it('says when no forum is configured', () => {
    expect(prompts.build(createAdminState(42, S.EDIT_TOPIC_ID)).text).toBe(
      'Current topic ID: not set\n\nSend the new topic ID, 0 for the General topic.'
    );
  });

  it('has nothing to ask an idle admin', () => {
    expect(() => prompts.build(createAdminState(42))).toThrow('No step to prompt for user 42');
  });
});
