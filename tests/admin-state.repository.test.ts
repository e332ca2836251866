import { AdminStateRepository } from '../src/database/repositories/admin-state.repository.js';
import { createAdminState } from '../src/database/models/admin-state.model.js';
import { ConversationState } from '../src/shared/constants/flow-states.js';
import { DataIntegrityError } from '../src/shared/errors.js';
import { createTestStore, type TestStore } from './helpers/test-store.js';

describe('AdminStateRepository', () => {
  let store: TestStore;
  let repository: AdminStateRepository;

  beforeEach(async () => {
    store = await createTestStore();
    repository = new AdminStateRepository(store.queue);
  });

  afterEach(async () => {
    await store.close();
  });

  it('reports a missing row as not found', () => {
    expect(repository.get(42)).toEqual({ found: false });
  });

  it('stores and reads back every field', async () => {
    const state = createAdminState(42, ConversationState.NEW_POST_CONFIRM, {
      selectedTypeId: 7,
      draftText: 'Hello',
      draftPhotoId: 'photo-1',
      draftEntities: '[{"type":"bold","offset":0,"length":5}]',
      lastBotMessageId: 12,
      replyTargetChatId: -1001,
      replyTargetMessageId: 3,
    });

    await repository.save(state);

    expect(repository.get(42)).toEqual({ found: true, state });
  });

  it('overwrites the whole row on save', async () => {
    await repository.save(
      createAdminState(42, ConversationState.NEW_TYPE_ENTER_IMAGE, { tempName: 'News' })
    );
    await repository.save(createAdminState(42, ConversationState.EDIT_POST_ENTER_LINK));

    expect(repository.get(42)).toEqual({
      found: true,
      state: createAdminState(42, ConversationState.EDIT_POST_ENTER_LINK),
    });
    expect(repository.count()).toBe(1);
  });

  it('keeps an idle row as found with no step', async () => {
    await repository.save(createAdminState(42));

    const stored = store.db.prepare('SELECT current_state FROM admin_state WHERE user_id = 42').get();
    expect(stored).toEqual({ current_state: '' });
    expect(repository.get(42)).toEqual({ found: true, state: createAdminState(42, null) });
  });

  it('reads NULL columns as defaults', () => {
    store.db
      .prepare(
        `INSERT INTO admin_state (user_id, current_state, selected_type_id, draft_text, temp_name)
         VALUES (5, 'new_type_enter_name', NULL, NULL, NULL)`
      )
      .run();

    expect(repository.get(5)).toEqual({
      found: true,
      state: createAdminState(5, ConversationState.NEW_TYPE_ENTER_NAME),
    });
  });

  it('rejects a stored step it does not know', () => {
    store.db.prepare("INSERT INTO admin_state (user_id, current_state) VALUES (9, 'bogus_step')").run();

    expect(() => repository.get(9)).toThrow(DataIntegrityError);
    expect(() => repository.get(9)).toThrow('Unknown conversation state "bogus_step"');
  });

  it('clears the row', async () => {
    await repository.save(createAdminState(42, ConversationState.EDIT_ADMIN_IDS));
    await repository.clear(42);

    expect(repository.get(42)).toEqual({ found: false });
  });

  it('applies writes for one admin in submission order', async () => {
    await Promise.all([
      repository.save(createAdminState(42, ConversationState.EDIT_ADMIN_IDS)),
      repository.clear(42),
    ]);
    expect(repository.get(42)).toEqual({ found: false });

    await Promise.all([
      repository.clear(42),
      repository.save(createAdminState(42, ConversationState.EDIT_TOPIC_ID)),
    ]);
    expect(repository.get(42)).toEqual({
      found: true,
      state: createAdminState(42, ConversationState.EDIT_TOPIC_ID),
    });
  });

  it('remembers the last prompt only for existing rows', async () => {
    await repository.save(createAdminState(42, ConversationState.EDIT_FORUM_ID));

    await expect(repository.rememberPrompt(42, 77)).resolves.toBe(true);
    await expect(repository.rememberPrompt(43, 78)).resolves.toBe(false);

    const lookup = repository.get(42);
    expect(lookup.found && lookup.state.lastBotMessageId).toBe(77);
    expect(repository.get(43)).toEqual({ found: false });
  });
});
