import type { WriteQueue, WriteJob, ReadQuery } from '../write-queue.js';

/**
 * Base repository providing common row access for one table
 * Reads go straight to the handle; every mutation is a write-queue job
 */
export abstract class BaseRepository<T> {
  constructor(
    protected readonly queue: WriteQueue,
    protected readonly table: string,
    protected readonly idColumn: string = 'id'
  ) {}

  /**
   * Map a raw row to the domain model
   */
  protected abstract fromRow(row: unknown): T;

  protected read<R>(query: ReadQuery<R>): R {
    return this.queue.read(query);
  }

  protected write<R>(job: WriteJob<R>): Promise<R> {
    return this.queue.submit(job);
  }

  /**
   * Find a row by its key
   */
  findById(id: number): T | null {
    const row = this.read((db) =>
      db.prepare(`SELECT * FROM ${this.table} WHERE ${this.idColumn} = ?`).get(id)
    );
    return row === undefined ? null : this.fromRow(row);
  }

  /**
   * All rows ordered by key
   */
  findAll(): T[] {
    const rows = this.read((db) =>
      db.prepare(`SELECT * FROM ${this.table} ORDER BY ${this.idColumn}`).all()
    );
    return rows.map((row) => this.fromRow(row));
  }

  count(): number {
    const row = this.read((db) => db.prepare(`SELECT COUNT(*) AS total FROM ${this.table}`).get());
    return typeof row === 'object' && row !== null && 'total' in row && typeof row.total === 'number'
      ? row.total
      : 0;
  }

  /**
   * Delete a row by its key
   * Resolves false when nothing matched
   */
  async deleteById(id: number): Promise<boolean> {
    const result = await this.write((db) =>
      db.prepare(`DELETE FROM ${this.table} WHERE ${this.idColumn} = ?`).run(id)
    );
    return result.changes > 0;
  }
}
