import { formatISO } from 'date-fns';
import { formatInTimeZone } from 'date-fns-tz';
import { z } from 'zod';
import type { SqliteDatabase } from '../../database/connection.js';
import type { WriteQueue } from '../../database/write-queue.js';
import { ValidationError } from '../../shared/errors.js';
import { logger } from '../../utils/logger.js';

const schemaObjectsSchema = z.array(z.object({ name: z.string(), sql: z.string() }));

function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

function sqlLiteral(value: unknown): string {
  if (value === null || value === undefined) {
    return 'NULL';
  }
  if (typeof value === 'number' || typeof value === 'bigint') {
    return String(value);
  }
  if (Buffer.isBuffer(value)) {
    return `X'${value.toString('hex')}'`;
  }
  return `'${String(value).replace(/'/g, "''")}'`;
}

function userTables(db: SqliteDatabase): Array<{ name: string; sql: string }> {
  return schemaObjectsSchema.parse(
    db
      .prepare(
        "SELECT name, sql FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name"
      )
      .all()
  );
}

function userIndexes(db: SqliteDatabase): Array<{ name: string; sql: string }> {
  return schemaObjectsSchema.parse(
    db
      .prepare(
        "SELECT name, sql FROM sqlite_master WHERE type = 'index' AND sql IS NOT NULL ORDER BY name"
      )
      .all()
  );
}

function buildDump(db: SqliteDatabase, generatedAt: Date): string {
  const lines = [`-- SQLite dump generated ${formatISO(generatedAt)}`, 'BEGIN TRANSACTION;'];

  for (const table of userTables(db)) {
    lines.push(`${table.sql};`);

    const rows = db.prepare(`SELECT * FROM ${quoteIdentifier(table.name)}`).raw(true).all();
    for (const row of rows) {
      if (!Array.isArray(row)) {
        continue;
      }
      lines.push(`INSERT INTO ${quoteIdentifier(table.name)} VALUES (${row.map(sqlLiteral).join(', ')});`);
    }
  }

  for (const index of userIndexes(db)) {
    lines.push(`${index.sql};`);
  }

  lines.push('COMMIT;');
  return `${lines.join('\n')}\n`;
}

/**
 * Textual export of the whole store, and replay of such an export into an empty store
 */
export class BackupService {
  constructor(
    private queue: WriteQueue,
    private timezone: string
  ) {}

  /**
   * Waits for pending writes, then reads everything in one read transaction
   */
  async createDump(now: Date = new Date()): Promise<string> {
    await this.queue.onIdle();

    const dump = this.queue.read((db) => db.transaction(() => buildDump(db, now))());
    logger.info(`Created database dump (${dump.length} characters)`);
    return dump;
  }

  /**
   * Replay a dump as one write job.
   * Fails with ValidationError when the store already has tables.
   */
  async restore(dump: string): Promise<void> {
    await this.queue.submit((db) => {
      const existing = userTables(db);
      if (existing.length > 0) {
        throw new ValidationError(
          `Cannot restore into a non-empty database (found ${existing.map((t) => t.name).join(', ')})`
        );
      }
      db.exec(dump);
    });
    logger.info('Restored database from dump');
  }

  fileName(now: Date = new Date()): string {
    return `backup_${formatInTimeZone(now, this.timezone, 'yyyy-MM-dd_HH-mm-ss')}.sql`;
  }

  caption(now: Date = new Date()): string {
    return `✅ Database backup created: ${formatInTimeZone(now, this.timezone, 'yyyy-MM-dd HH:mm:ss')}`;
  }
}
