import type { StoredRow } from '../../src/domain/entities/IntakeRecord.js';
import type { BackingStore } from '../../src/infra/store/BackingStore.js';
import { mergeColumns } from '../../src/infra/store/BackingStore.js';
import { StoreError } from '../../src/domain/errors.js';

type Table = { columns: string[]; rows: string[][] };

type Operation = 'readAll' | 'appendRow' | 'upsertByKey' | 'ensureSchema';

/**
 * In-process BackingStore for service tests. Failures can be queued per
 * operation and table with failNext().
 */
export class MemoryStore implements BackingStore {
  readonly backendName = 'memory';
  readonly tables = new Map<string, Table>();
  readonly calls: { op: Operation; table: string }[] = [];
  private failures: { op: Operation; table: string; error: Error }[] = [];

  failNext(op: Operation, table: string, error: Error, times = 1): void {
    for (let i = 0; i < times; i++) {
      this.failures.push({ op, table, error });
    }
  }

  rows(table: string): StoredRow[] {
    const stored = this.tables.get(table);
    if (!stored) return [];
    return stored.rows.map((row) => {
      const record: StoredRow = {};
      stored.columns.forEach((column, index) => {
        record[column] = row[index] ?? '';
      });
      return record;
    });
  }

  async readAll(table: string): Promise<StoredRow[]> {
    this.track('readAll', table);
    return this.rows(table);
  }

  async appendRow(table: string, values: readonly string[]): Promise<void> {
    this.track('appendRow', table);
    this.require(table).rows.push([...values]);
  }

  async upsertByKey(table: string, keyColumn: string, record: StoredRow): Promise<void> {
    this.track('upsertByKey', table);
    const stored = this.require(table);
    const keyIndex = stored.columns.indexOf(keyColumn);
    const values = stored.columns.map((column) => record[column] ?? '');
    const existing = stored.rows.findIndex((row) => row[keyIndex] === record[keyColumn]);
    if (existing === -1) {
      stored.rows.push(values);
    } else {
      stored.rows[existing] = values;
    }
  }

  async ensureSchema(table: string, columns: readonly string[]): Promise<void> {
    this.track('ensureSchema', table);
    const stored = this.tables.get(table);
    if (!stored) {
      this.tables.set(table, { columns: [...columns], rows: [] });
      return;
    }
    stored.columns = mergeColumns(stored.columns, columns);
  }

  async close(): Promise<void> {}

  private track(op: Operation, table: string): void {
    this.calls.push({ op, table });
    const index = this.failures.findIndex((failure) => failure.op === op && failure.table === table);
    if (index !== -1) {
      const [failure] = this.failures.splice(index, 1);
      throw failure.error;
    }
  }

  private require(table: string): Table {
    const stored = this.tables.get(table);
    if (!stored) {
      throw new StoreError(`table ${table} does not exist`, 'permanent', 'not_found', { table });
    }
    return stored;
  }
}

export function rateLimited(): StoreError {
  return new StoreError('quota exceeded', 'transient', 'rate_limited');
}

export function unavailable(): StoreError {
  return new StoreError('service unavailable', 'transient', 'unavailable');
}

export const noSleep = async (): Promise<void> => {};
