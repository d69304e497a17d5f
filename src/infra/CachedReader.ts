import type { StoredRow } from '../domain/entities/IntakeRecord.js';
import type { BackingStore } from './store/BackingStore.js';
import { withRetry, type Sleep } from './retry.js';
import { logger } from './logger.js';

export interface CachedReaderOptions {
  ttlSeconds: number;
  retryAttempts: number;
  retryMaxDelaySeconds: number;
  now?: () => number;
  sleep?: Sleep;
}

type CacheEntry = {
  rows: StoredRow[];
  expiresAt: number;
};

/**
 * Read-through cache over a backing store.
 * Each table has its own TTL window. Writers must call invalidate() after a
 * successful write so later reads observe the new row. Callers get their own copy
 * of the cached rows.
 */
export class CachedReader {
  private entries = new Map<string, CacheEntry>();
  private now: () => number;

  constructor(
    private store: BackingStore,
    private options: CachedReaderOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  async read(table: string): Promise<StoredRow[]> {
    const cached = this.entries.get(table);
    if (cached && this.now() < cached.expiresAt) {
      return [...cached.rows];
    }

    const rows = await withRetry(`read ${table}`, () => this.store.readAll(table), {
      attempts: this.options.retryAttempts,
      maxDelaySeconds: this.options.retryMaxDelaySeconds,
      sleep: this.options.sleep,
    });

    this.entries.set(table, {
      rows,
      expiresAt: this.now() + this.options.ttlSeconds * 1000,
    });
    logger.debug('Table cached', { table, rows: rows.length });
    return [...rows];
  }

  invalidate(table: string): void {
    this.entries.delete(table);
  }

  clear(): void {
    this.entries.clear();
  }
}
