import type { SqliteDatabase } from './connection.js';
import { QueueClosedError } from '../shared/errors.js';
import { logger } from '../utils/logger.js';

/**
 * A unit of mutation against the store.
 * Jobs may await between statements; the next job starts only after this one settles.
 * A job must not submit to the queue it runs on.
 */
export type WriteJob<T> = (db: SqliteDatabase) => T | Promise<T>;

export type ReadQuery<T> = (db: SqliteDatabase) => T;

interface QueuedJob {
  run: () => Promise<void>;
}

/**
 * Single-writer queue in front of the database handle
 *
 * Every mutation goes through `submit` and runs in submission order, one at a time.
 * Reads go straight to the handle through `read`.
 */
export class WriteQueue {
  private readonly jobs: QueuedJob[] = [];
  private readonly idleWaiters: Array<() => void> = [];
  private running = false;
  private closed = false;

  constructor(private readonly db: SqliteDatabase) {}

  /**
   * Run a query directly against the handle
   */
  read<T>(query: ReadQuery<T>): T {
    if (!this.db.open) {
      throw new QueueClosedError();
    }
    return query(this.db);
  }

  /**
   * Enqueue a job and resolve with its result once it has run.
   * A failing job rejects only its own promise.
   */
  submit<T>(job: WriteJob<T>): Promise<T> {
    if (this.closed) {
      return Promise.reject(new QueueClosedError());
    }

    return new Promise<T>((resolve, reject) => {
      this.jobs.push({
        run: async () => {
          try {
            resolve(await job(this.db));
          } catch (error) {
            reject(error);
          }
        },
      });
      this.schedule();
    });
  }

  /**
   * Resolves when nothing is queued or running
   */
  onIdle(): Promise<void> {
    if (!this.running && this.jobs.length === 0) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /**
   * Stop accepting jobs and wait for the accepted ones to finish
   */
  async close(): Promise<void> {
    this.closed = true;
    await this.onIdle();
    logger.info('Write queue drained and closed');
  }

  /** Jobs waiting to run, not counting the one in flight */
  get size(): number {
    return this.jobs.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  private schedule(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.drain().catch((error) => {
      logger.error('Write queue drain loop failed:', error);
    });
  }

  private async drain(): Promise<void> {
    try {
      let next: QueuedJob | undefined;
      while ((next = this.jobs.shift()) !== undefined) {
        await next.run();
      }
    } finally {
      this.running = false;
      for (const resolve of this.idleWaiters.splice(0)) {
        resolve();
      }
    }
  }
}
