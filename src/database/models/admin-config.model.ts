export interface ForumTarget {
  chatId: number;
  topicId: number;
}

export interface AdminConfig extends ForumTarget {
  adminIds: number[];
}

export const ADMIN_CONFIG_KEYS = {
  adminIds: 'admin_ids',
  forumChatId: 'forum_chat_id',
  topicId: 'topic_id',
} as const;

/**
 * Parse the stored comma-separated id list, keeping order and dropping
 * blanks and non-numeric parts
 */
export function parseAdminIds(value: string): number[] {
  return value
    .split(',')
    .map((part) => part.trim())
    .filter((part) => /^-?\d+$/.test(part))
    .map((part) => Number(part));
}

export function formatAdminIds(ids: readonly number[]): string {
  return ids.join(',');
}

export function parseConfigNumber(value: string | undefined): number {
  if (value === undefined || !/^-?\d+$/.test(value.trim())) {
    return 0;
  }
  return Number(value.trim());
}
