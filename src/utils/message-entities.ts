import type { MessageEntity } from 'grammy/types';
import { DataIntegrityError } from '../shared/errors.js';

function isMessageEntity(value: unknown): value is MessageEntity {
  return (
    typeof value === 'object' &&
    value !== null &&
    'type' in value &&
    typeof value.type === 'string' &&
    'offset' in value &&
    typeof value.offset === 'number' &&
    'length' in value &&
    typeof value.length === 'number'
  );
}

/**
 * Encode entities for a TEXT column; no entities is ''
 */
export function serializeEntities(entities: readonly MessageEntity[] | undefined): string {
  return entities && entities.length > 0 ? JSON.stringify(entities) : '';
}

export function parseEntities(encoded: string): MessageEntity[] {
  if (encoded === '') {
    return [];
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(encoded);
  } catch (error) {
    throw new DataIntegrityError(
      `Stored message entities are not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  if (!Array.isArray(parsed) || !parsed.every(isMessageEntity)) {
    throw new DataIntegrityError('Stored message entities have an unexpected shape');
  }
  return parsed.filter(isMessageEntity);
}

/**
 * Move entities right by `by` UTF-16 code units, for text that gets a prefix.
 * JS string length is already counted in UTF-16 units, as Telegram offsets are.
 */
export function shiftEntities(entities: readonly MessageEntity[], by: number): MessageEntity[] {
  return entities.map((entity) => ({ ...entity, offset: entity.offset + by }));
}
