import type { MessageEntity } from 'grammy/types';
import type { AdminState } from '../../database/models/admin-state.model.js';
import type { PostType } from '../../database/models/post-type.model.js';
import type { PublishedPost } from '../../database/models/published-post.model.js';
import type { MessageContent } from '../sending/media-sender.service.js';
import { parseEntities, shiftEntities } from '../../utils/message-entities.js';

export const PREVIEW_HEADINGS = {
  post: 'Post preview:\n\n',
  currentText: 'Current post text:\n\n',
  currentTemplate: 'Current template:\n\n',
  template: (typeName: string) => `Template for "${typeName}":\n\n`,
} as const;

function withHeading(
  heading: string,
  body: string,
  entities: readonly MessageEntity[],
  footer = ''
): Pick<MessageContent, 'text' | 'entities'> {
  return {
    text: heading + body + footer,
    entities: shiftEntities(entities, heading.length),
  };
}

/**
 * Builds the admin-facing copies of posts and templates.
 * Formatting is kept by moving entity offsets past the heading.
 */
export class PreviewGeneratorService {
  /**
   * Shown when a type is picked for a new post
   */
  templatePrompt(postType: PostType): MessageContent {
    return {
      ...withHeading(
        PREVIEW_HEADINGS.template(postType.name),
        postType.template,
        parseEntities(postType.templateEntities),
        '\n\nSend the post text.'
      ),
      photoId: postType.photoId,
    };
  }

  /**
   * The draft exactly as it will be published, under a heading
   */
  postPreview(state: AdminState): MessageContent {
    return {
      ...withHeading(PREVIEW_HEADINGS.post, state.draftText, parseEntities(state.draftEntities)),
      photoId: state.draftPhotoId,
    };
  }

  currentPostPrompt(post: PublishedPost): MessageContent {
    return {
      ...withHeading(
        PREVIEW_HEADINGS.currentText,
        post.text,
        parseEntities(post.entities),
        '\n\nSend the new text.'
      ),
      photoId: '',
    };
  }

  currentTemplatePrompt(postType: PostType): MessageContent {
    return {
      ...withHeading(
        PREVIEW_HEADINGS.currentTemplate,
        postType.template,
        parseEntities(postType.templateEntities),
        '\n\nSend the new template.'
      ),
      photoId: '',
    };
  }
}
