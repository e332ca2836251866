import Database from 'better-sqlite3';
import { logger } from '../utils/logger.js';

export type SqliteDatabase = Database.Database;

/**
 * Open the single-file store
 * `:memory:` is accepted and used by tests
 */
export function connectDatabase(path: string): SqliteDatabase {
  try {
    const db = new Database(path);
    db.pragma('journal_mode = WAL');
    db.pragma('busy_timeout = 5000');

    logger.info(`Connected to SQLite database at ${path}`);
    return db;
  } catch (error) {
    logger.error('Failed to open SQLite database:', error);
    throw error;
  }
}

export function disconnectDatabase(db: SqliteDatabase): void {
  if (!db.open) {
    return;
  }

  db.close();
  logger.info('Disconnected from SQLite database');
}
