import { z } from 'zod';
import type { SqliteDatabase } from './connection.js';
import type { WriteQueue } from './write-queue.js';
import { MigrationError } from '../shared/errors.js';
import { logger } from '../utils/logger.js';

const BASE_TABLES = `
CREATE TABLE IF NOT EXISTS admin_state (
  user_id INTEGER PRIMARY KEY,
  current_state TEXT NOT NULL DEFAULT '',
  selected_type_id INTEGER DEFAULT 0,
  draft_text TEXT DEFAULT '',
  draft_photo_id TEXT DEFAULT '',
  draft_entities TEXT DEFAULT '',
  editing_post_id INTEGER DEFAULT 0,
  editing_type_id INTEGER DEFAULT 0,
  temp_name TEXT DEFAULT '',
  temp_emoji TEXT DEFAULT '',
  temp_photo_id TEXT DEFAULT '',
  temp_template TEXT DEFAULT '',
  last_bot_message_id INTEGER DEFAULT 0
);

CREATE TABLE IF NOT EXISTS post_types (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  name TEXT NOT NULL,
  emoji TEXT DEFAULT '',
  photo_id TEXT DEFAULT '',
  template TEXT NOT NULL,
  template_entities TEXT DEFAULT '',
  is_active BOOLEAN DEFAULT TRUE,
  created_at DATETIME DEFAULT CURRENT_TIMESTAMP
);

CREATE TABLE IF NOT EXISTS published_posts (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  post_type_id INTEGER NOT NULL REFERENCES post_types(id),
  chat_id INTEGER NOT NULL,
  topic_id INTEGER NOT NULL,
  message_id INTEGER NOT NULL,
  text TEXT NOT NULL,
  photo_id TEXT DEFAULT '',
  entities TEXT DEFAULT '',
  created_at DATETIME DEFAULT CURRENT_TIMESTAMP,
  UNIQUE(chat_id, message_id)
);

CREATE TABLE IF NOT EXISTS admin_config (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS replies (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  chat_id INTEGER NOT NULL,
  reply_to_message_id INTEGER NOT NULL,
  message_id INTEGER NOT NULL,
  text TEXT NOT NULL DEFAULT '',
  photo_id TEXT DEFAULT '',
  entities TEXT DEFAULT '',
  created_at DATETIME DEFAULT CURRENT_TIMESTAMP,
  UNIQUE(chat_id, message_id)
);

CREATE INDEX IF NOT EXISTS idx_published_posts_message ON published_posts(chat_id, message_id);
CREATE INDEX IF NOT EXISTS idx_post_types_active ON post_types(is_active);
CREATE INDEX IF NOT EXISTS idx_replies_message ON replies(chat_id, message_id);
`;

const MIGRATIONS_TABLE = `
CREATE TABLE IF NOT EXISTS schema_migrations (
  version INTEGER PRIMARY KEY,
  name TEXT NOT NULL,
  applied_at DATETIME DEFAULT CURRENT_TIMESTAMP
)`;

export interface Migration {
  version: number;
  name: string;
  apply: (db: SqliteDatabase) => void;
}

const columnInfoSchema = z.array(z.object({ name: z.string() }));
const versionRowsSchema = z.array(z.object({ version: z.number().int() }));

export function hasColumn(db: SqliteDatabase, table: string, column: string): boolean {
  const columns = columnInfoSchema.parse(db.prepare(`PRAGMA table_info(${table})`).all());
  return columns.some((info) => info.name === column);
}

/**
 * ALTER TABLE ... ADD COLUMN that is a no-op when the column is already there
 * (databases created before migrations were versioned)
 */
function addColumn(db: SqliteDatabase, table: string, column: string, definition: string): void {
  if (hasColumn(db, table, column)) {
    logger.debug(`Column ${table}.${column} already exists, skipping`);
    return;
  }
  db.exec(`ALTER TABLE ${table} ADD COLUMN ${column} ${definition}`);
}

export const MIGRATIONS: readonly Migration[] = [
  {
    version: 1,
    name: 'create_base_tables',
    apply: (db) => {
      db.exec(BASE_TABLES);
    },
  },
  {
    version: 2,
    name: 'admin_state_reply_target',
    apply: (db) => {
      addColumn(db, 'admin_state', 'reply_target_chat_id', 'INTEGER DEFAULT 0');
      addColumn(db, 'admin_state', 'reply_target_message_id', 'INTEGER DEFAULT 0');
    },
  },
];

export function appliedVersions(db: SqliteDatabase): number[] {
  db.exec(MIGRATIONS_TABLE);
  const rows = versionRowsSchema.parse(
    db.prepare('SELECT version FROM schema_migrations ORDER BY version').all()
  );
  return rows.map((row) => row.version);
}

/**
 * Apply every pending migration, each in its own transaction.
 * Returns the versions applied by this call.
 */
export function runMigrations(
  db: SqliteDatabase,
  migrations: readonly Migration[] = MIGRATIONS
): number[] {
  const done = new Set(appliedVersions(db));
  const record = db.prepare('INSERT INTO schema_migrations (version, name) VALUES (?, ?)');
  const applied: number[] = [];

  for (const migration of migrations) {
    if (done.has(migration.version)) {
      continue;
    }

    try {
      db.transaction(() => {
        migration.apply(db);
        record.run(migration.version, migration.name);
      })();
    } catch (error) {
      throw new MigrationError(migration.version, error);
    }

    logger.info(`Applied migration ${migration.version} (${migration.name})`);
    applied.push(migration.version);
  }

  return applied;
}

/**
 * Run pending migrations as one write-queue job
 */
export function applyMigrations(
  queue: WriteQueue,
  migrations: readonly Migration[] = MIGRATIONS
): Promise<number[]> {
  return queue.submit((db) => runMigrations(db, migrations));
}
