import { z } from 'zod';
import type { SqliteDatabase } from '../connection.js';
import type { WriteQueue } from '../write-queue.js';
import {
  ADMIN_CONFIG_KEYS,
  formatAdminIds,
  parseAdminIds,
  parseConfigNumber,
  type AdminConfig,
} from '../models/admin-config.model.js';

const configRowsSchema = z.array(z.object({ key: z.string(), value: z.string() }));

function readConfig(db: SqliteDatabase): AdminConfig {
  const rows = configRowsSchema.parse(db.prepare('SELECT key, value FROM admin_config').all());
  const values = new Map(rows.map((row) => [row.key, row.value]));

  return {
    adminIds: parseAdminIds(values.get(ADMIN_CONFIG_KEYS.adminIds) ?? ''),
    chatId: parseConfigNumber(values.get(ADMIN_CONFIG_KEYS.forumChatId)),
    topicId: parseConfigNumber(values.get(ADMIN_CONFIG_KEYS.topicId)),
  };
}

function writeConfig(db: SqliteDatabase, config: AdminConfig): void {
  const upsert = db.prepare('INSERT OR REPLACE INTO admin_config (key, value) VALUES (?, ?)');
  db.transaction(() => {
    upsert.run(ADMIN_CONFIG_KEYS.adminIds, formatAdminIds(config.adminIds));
    upsert.run(ADMIN_CONFIG_KEYS.forumChatId, String(config.chatId));
    upsert.run(ADMIN_CONFIG_KEYS.topicId, String(config.topicId));
  })();
}

/**
 * Repository for the admin_config key/value table
 * Read-modify-write operations run inside a single queue job
 */
export class AdminConfigRepository {
  constructor(private readonly queue: WriteQueue) {}

  get(): AdminConfig {
    return this.queue.read(readConfig);
  }

  async save(config: AdminConfig): Promise<void> {
    await this.queue.submit((db) => writeConfig(db, config));
  }

  /**
   * Apply a change to the current config and persist the result as one job
   */
  update(change: (current: AdminConfig) => AdminConfig): Promise<AdminConfig> {
    return this.queue.submit((db) => {
      const next = change(readConfig(db));
      writeConfig(db, next);
      return next;
    });
  }

  /**
   * Insert a value only when the key is absent
   * Resolves true when the value was written
   */
  async insertIfAbsent(key: string, value: string): Promise<boolean> {
    const result = await this.queue.submit((db) =>
      db.prepare('INSERT OR IGNORE INTO admin_config (key, value) VALUES (?, ?)').run(key, value)
    );
    return result.changes > 0;
  }
}
