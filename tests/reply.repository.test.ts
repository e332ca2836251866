import { ReplyRepository } from '../src/database/repositories/reply.repository.js';
import { createTestStore, type TestStore } from './helpers/test-store.js';

describe('ReplyRepository', () => {
  let store: TestStore;
  let repository: ReplyRepository;

  beforeEach(async () => {
    store = await createTestStore();
    repository = new ReplyRepository(store.queue);
  });

  afterEach(async () => {
    await store.close();
  });

  it('stores replies and lists them per target message', async () => {
    const first = await repository.create({
      chatId: -1001,
      replyToMessageId: 10,
      messageId: 11,
      text: 'First',
      photoId: '',
      entities: '',
    });
    await repository.create({
      chatId: -1001,
      replyToMessageId: 20,
      messageId: 21,
      text: 'Elsewhere',
      photoId: '',
      entities: '',
    });
    const second = await repository.create({
      chatId: -1001,
      replyToMessageId: 10,
      messageId: 12,
      text: 'Second',
      photoId: 'photo-2',
      entities: '',
    });

    expect(repository.findByTarget(-1001, 10)).toEqual([first, second]);
    expect(repository.findByMessageId(-1001, 12)).toEqual(second);
    expect(repository.findByMessageId(-1001, 99)).toBeNull();
  });

  it('edits a reply', async () => {
    const reply = await repository.create({
      chatId: -1001,
      replyToMessageId: 10,
      messageId: 11,
      text: 'Draft',
      photoId: '',
      entities: '',
    });

    await expect(repository.updateContent(reply.id, 'Final', '')).resolves.toBe(true);
    expect(repository.findById(reply.id)?.text).toBe('Final');
  });
});
