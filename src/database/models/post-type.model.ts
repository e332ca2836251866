import { z } from 'zod';
import { parseRow, textColumn } from './columns.js';

export interface PostType {
  id: number;
  name: string;
  emoji: string;
  photoId: string;
  template: string;
  templateEntities: string;
  isActive: boolean;
  createdAt: string;
}

export type NewPostType = Pick<PostType, 'name' | 'emoji' | 'photoId' | 'template' | 'templateEntities'>;

const postTypeRowSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  emoji: textColumn,
  photo_id: textColumn,
  template: z.string(),
  template_entities: textColumn,
  is_active: z.number().int().nullable(),
  created_at: textColumn,
});

export function toPostType(row: unknown): PostType {
  const data = parseRow(postTypeRowSchema, row, 'post_types');
  return {
    id: data.id,
    name: data.name,
    emoji: data.emoji,
    photoId: data.photo_id,
    template: data.template,
    templateEntities: data.template_entities,
    isActive: data.is_active !== 0,
    createdAt: data.created_at,
  };
}

/** Button label: emoji prefix when the type has one */
export function postTypeLabel(postType: Pick<PostType, 'name' | 'emoji'>): string {
  return postType.emoji ? `${postType.emoji} ${postType.name}` : postType.name;
}
