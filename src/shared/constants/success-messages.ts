import type { WorkflowEffect } from '../../core/workflow/admin-workflow.types.js';
import type { PublishedPost } from '../../database/models/published-post.model.js';
import { postTypeLabel } from '../../database/models/post-type.model.js';
import { buildPostLink } from '../../utils/post-link.js';
import { TypeField } from './flow-states.js';

function linkLine(post: PublishedPost): string {
  const link = buildPostLink(post.chatId, post.messageId, post.topicId);
  return link ? `\n${link}` : '';
}

const FIELD_LABELS: Record<TypeField, string> = {
  [TypeField.NAME]: 'Name',
  [TypeField.EMOJI]: 'Emoji',
  [TypeField.IMAGE]: 'Image',
  [TypeField.TEMPLATE]: 'Template',
};

/**
 * Confirmations shown after a workflow finished
 */
export class SuccessMessages {
  static effect(effect: WorkflowEffect): string {
    switch (effect.type) {
      case 'post_published':
        return `✅ Post published!${linkLine(effect.post)}`;
      case 'post_edited':
        return `✅ Post updated!${linkLine(effect.post)}`;
      case 'post_deleted':
        return '✅ Post deleted.';
      case 'post_unrecorded': {
        const link = buildPostLink(effect.chatId, effect.messageId, effect.topicId);
        return `⚠️ Post ${effect.action}, but the bot could not save this in its records.${link ? `\n${link}` : ''}`;
      }
      case 'type_created':
        return `✅ Post type "${postTypeLabel(effect.postType)}" created.`;
      case 'type_updated':
        if (effect.field === 'active') {
          return effect.postType.isActive
            ? `✅ Post type "${postTypeLabel(effect.postType)}" activated.`
            : `✅ Post type "${postTypeLabel(effect.postType)}" deactivated.`;
        }
        return `✅ ${FIELD_LABELS[effect.field]} of "${postTypeLabel(effect.postType)}" updated.`;
      case 'admins_updated':
        return `✅ Admin list saved: ${effect.adminIds.join(', ')}`;
      case 'forum_target_updated':
        return `✅ Forum target saved: chat ${effect.target.chatId}, topic ${effect.target.topicId}`;
    }
  }

  static readonly CANCELLED = '❌ Cancelled.';
}
