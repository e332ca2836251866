import type { InlineKeyboard } from 'grammy';
import type { AdminState } from '../../database/models/admin-state.model.js';
import { postTypeLabel } from '../../database/models/post-type.model.js';
import type { AdminDirectoryService } from '../auth/admin-directory.service.js';
import type { PostManagerService } from '../posting/post-manager.service.js';
import type { PostTypeManagerService } from '../posting/post-type-manager.service.js';
import type { MessageContent } from '../sending/media-sender.service.js';
import { PreviewGeneratorService } from './preview-generator.service.js';
import { ConversationState } from '../../shared/constants/flow-states.js';
import {
  createTypeOptionsKeyboard,
  createTypeSelectKeyboard,
} from '../../bot/keyboards/post-type.keyboard.js';
import {
  createCancelKeyboard,
  createConfirmPostKeyboard,
  createSkipEmojiKeyboard,
  createSkipImageKeyboard,
} from '../../bot/keyboards/prompt.keyboard.js';

export interface Prompt extends MessageContent {
  keyboard: InlineKeyboard;
}

function plain(text: string, keyboard: InlineKeyboard = createCancelKeyboard()): Prompt {
  return { text, entities: [], photoId: '', keyboard };
}

/**
 * Builds the message that asks for the input of a conversation step
 */
export class PromptBuilderService {
  private preview = new PreviewGeneratorService();

  constructor(
    private postTypes: PostTypeManagerService,
    private posts: PostManagerService,
    private directory: AdminDirectoryService
  ) {}

  build(state: AdminState): Prompt {
    const S = ConversationState;

    switch (state.currentState) {
      case null:
        throw new Error(`No step to prompt for user ${state.userId}`);

      case S.NEW_POST_SELECT_TYPE:
        return plain('Select the post type:', createTypeSelectKeyboard(this.postTypes.getActiveTypes()));

      case S.NEW_POST_ENTER_TEXT:
        return {
          ...this.preview.templatePrompt(this.postTypes.getType(state.selectedTypeId)),
          keyboard: createCancelKeyboard(),
        };

      case S.NEW_POST_CONFIRM:
        return { ...this.preview.postPreview(state), keyboard: createConfirmPostKeyboard() };

      case S.EDIT_POST_ENTER_LINK:
        return plain('Send the link to the post you want to edit.');

      case S.EDIT_POST_ENTER_TEXT:
        return {
          ...this.preview.currentPostPrompt(this.posts.getPost(state.editingPostId)),
          keyboard: createCancelKeyboard(),
        };

      case S.DELETE_POST_ENTER_LINK:
        return plain('Send the link to the post you want to delete.');

      case S.NEW_TYPE_ENTER_NAME:
        return plain('Enter a name for the new post type.');

      case S.NEW_TYPE_ENTER_EMOJI:
        return plain(`Send an emoji for "${state.tempName}", or skip.`, createSkipEmojiKeyboard());

      case S.NEW_TYPE_ENTER_IMAGE:
        return plain(`Send an image for "${state.tempName}", or skip.`, createSkipImageKeyboard());

      case S.NEW_TYPE_ENTER_TEMPLATE:
        return plain('Send the template text. Formatting is kept.');

      case S.MANAGE_TYPES: {
        const postType = this.postTypes.getType(state.editingTypeId);
        const lines = [
          postTypeLabel(postType),
          `Status: ${postType.isActive ? 'active' : 'inactive'}`,
          `Image: ${postType.photoId ? 'yes' : 'no'}`,
          '',
          'What do you want to change?',
        ];
        return plain(lines.join('\n'), createTypeOptionsKeyboard(postType));
      }

      case S.EDIT_TYPE_NAME:
        return plain(
          `Current name: ${this.postTypes.getType(state.editingTypeId).name}\n\nSend the new name.`
        );

      case S.EDIT_TYPE_EMOJI:
        return plain(
          `Current emoji: ${this.postTypes.getType(state.editingTypeId).emoji || 'none'}\n\nSend the new emoji.`
        );

      case S.EDIT_TYPE_IMAGE:
        return plain(`Send the new image for "${this.postTypes.getType(state.editingTypeId).name}".`);

      case S.EDIT_TYPE_TEMPLATE:
        return {
          ...this.preview.currentTemplatePrompt(this.postTypes.getType(state.editingTypeId)),
          keyboard: createCancelKeyboard(),
        };

      case S.EDIT_ADMIN_IDS: {
        const admins = this.directory.listAdmins();
        return plain(
          `Current admins: ${admins.length > 0 ? admins.join(', ') : 'none'}\n\n` +
            `Send a comma-separated list of admin IDs. It must include your own ID (${state.userId}).`
        );
      }

      case S.EDIT_FORUM_ID: {
        const target = this.directory.getForumTarget();
        return plain(
          `Current forum chat ID: ${target ? target.chatId : 'not set'}\n\n` +
            'Send the new chat ID, for example -1001234567890.'
        );
      }

      case S.EDIT_TOPIC_ID: {
        const target = this.directory.getForumTarget();
        return plain(
          `Current topic ID: ${target ? target.topicId : 'not set'}\n\n` +
            'Send the new topic ID, 0 for the General topic.'
        );
      }
    }
  }
}
