/**
 * Location of a forum message parsed from a t.me link
 * `chatId` is null for public links, which name the chat by username
 */
export interface PostLink {
  chatId: number | null;
  topicId: number;
  messageId: number;
}

const PRIVATE_WITH_TOPIC = /(?:t\.me|telegram\.me)\/c\/(\d+)\/(\d+)\/(\d+)/;
const PRIVATE = /(?:t\.me|telegram\.me)\/c\/(\d+)\/(\d+)/;
const PUBLIC = /(?:t\.me|telegram\.me)\/([^/\s]+)\/(\d+)/;

// Internal ids in /c/ links drop the -100 prefix of supergroup chat ids
const SUPERGROUP_OFFSET = -1000000000000;

// Topic 1 is the General topic, which the Bot API addresses without a thread id
const GENERAL_TOPIC = 1;

function toChatId(internalId: string): number {
  return SUPERGROUP_OFFSET - Number(internalId);
}

export function parsePostLink(link: string): PostLink | null {
  const input = link.trim();

  const withTopic = PRIVATE_WITH_TOPIC.exec(input);
  if (withTopic) {
    const topicId = Number(withTopic[2]);
    return {
      chatId: toChatId(withTopic[1]),
      topicId: topicId === GENERAL_TOPIC ? 0 : topicId,
      messageId: Number(withTopic[3]),
    };
  }

  const privateLink = PRIVATE.exec(input);
  if (privateLink) {
    return { chatId: toChatId(privateLink[1]), topicId: 0, messageId: Number(privateLink[2]) };
  }

  const publicLink = PUBLIC.exec(input);
  if (publicLink && publicLink[1] !== 'c') {
    return { chatId: null, topicId: 0, messageId: Number(publicLink[2]) };
  }

  return null;
}

/**
 * t.me link to a message in a supergroup, null for chats that have no /c/ links
 */
export function buildPostLink(chatId: number, messageId: number, topicId = 0): string | null {
  if (chatId >= SUPERGROUP_OFFSET) {
    return null;
  }

  const internalId = SUPERGROUP_OFFSET - chatId;
  return topicId
    ? `https://t.me/c/${internalId}/${topicId}/${messageId}`
    : `https://t.me/c/${internalId}/${messageId}`;
}
