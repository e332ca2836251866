export type IdListParse = { ok: true; ids: number[] } | { ok: false; invalidPart: string };

/**
 * Validation helper utilities
 * Parsing of ids typed by administrators in settings steps
 */
export class ValidationHelper {
  /**
   * Forum chats are supergroups, whose ids are negative
   */
  static isValidChatId(value: string): boolean {
    return /^-\d+$/.test(value.trim());
  }

  static isValidTopicId(value: string): boolean {
    return /^\d+$/.test(value.trim());
  }

  /**
   * Parse a comma-separated list of user ids.
   * Blank parts are skipped; the first non-numeric part fails the whole list.
   */
  static parseIdList(text: string): IdListParse {
    const ids: number[] = [];
    for (const raw of text.split(',')) {
      const part = raw.trim();
      if (part === '') {
        continue;
      }
      if (!/^-?\d+$/.test(part)) {
        return { ok: false, invalidPart: part };
      }
      ids.push(Number(part));
    }
    return { ok: true, ids };
  }
}
