import { ErrorMessages } from '../src/shared/constants/error-messages.js';
import { SuccessMessages } from '../src/shared/constants/success-messages.js';
import { TypeField } from '../src/shared/constants/flow-states.js';
import type { PostType } from '../src/database/models/post-type.model.js';
import type { PublishedPost } from '../src/database/models/published-post.model.js';

const post: PublishedPost = {
  id: 1,
  postTypeId: 7,
  chatId: -1001234567890,
  topicId: 5,
  messageId: 900,
  text: 'Hello',
  photoId: '',
  entities: '',
  createdAt: '2024-01-01 10:00:00',
};

const postType: PostType = {
  id: 7,
  name: 'News',
  emoji: '📰',
  photoId: '',
  template: 'Template',
  templateEntities: '',
  isActive: false,
  createdAt: '2024-01-01 10:00:00',
};

describe('SuccessMessages', () => {
  it('links to a published post', () => {
    expect(SuccessMessages.effect({ type: 'post_published', post })).toBe(
      '✅ Post published!\nhttps://t.me/c/1234567890/5/900'
    );
  });

  it('leaves the link out for chats without one', () => {
    expect(SuccessMessages.effect({ type: 'post_edited', post: { ...post, chatId: -555 } })).toBe(
      '✅ Post updated!'
    );
  });

  it('warns when the forum changed but the record did not', () => {
    expect(
      SuccessMessages.effect({
        type: 'post_unrecorded',
        action: 'published',
        chatId: post.chatId,
        topicId: post.topicId,
        messageId: post.messageId,
      })
    ).toBe('⚠️ Post published, but the bot could not save this in its records.\nhttps://t.me/c/1234567890/5/900');
  });

  it('names the changed type field', () => {
    expect(SuccessMessages.effect({ type: 'type_updated', postType, field: TypeField.EMOJI })).toBe(
      '✅ Emoji of "📰 News" updated.'
    );
    expect(SuccessMessages.effect({ type: 'type_updated', postType, field: 'active' })).toBe(
      '✅ Post type "📰 News" deactivated.'
    );
  });

  it('lists saved admins', () => {
    expect(SuccessMessages.effect({ type: 'admins_updated', adminIds: [42, 43] })).toBe(
      '✅ Admin list saved: 42, 43'
    );
  });
});

describe('ErrorMessages.rejection', () => {
  it('includes the offending value', () => {
    expect(ErrorMessages.rejection('invalid_id', 'abc')).toBe('❌ Invalid ID format: abc');
    expect(ErrorMessages.rejection('invalid_id')).toBe('❌ Invalid ID format:');
  });

  it('names the admin that would be locked out', () => {
    expect(ErrorMessages.rejection('self_not_included', '42')).toBe(
      '❌ The list must include your own ID (42), otherwise you will lose access to the bot.'
    );
  });
});
