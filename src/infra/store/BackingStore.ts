import type { StoredRow } from '../../domain/entities/IntakeRecord.js';

/**
 * Uniform access to the tabular store holding intake data, audit logs and reference lists.
 * Tables are addressed by their logical title ("Data", "Logs", "Reference").
 *
 * Implementations throw StoreError, transient for rate limiting or outages and
 * permanent for schema or credential problems.
 */
export interface BackingStore {
  readonly backendName: string;

  /** All rows in store order, keyed by header */
  readAll(table: string): Promise<StoredRow[]>;

  /** Append one row; values are in header order */
  appendRow(table: string, values: readonly string[]): Promise<void>;

  /** Update the first row whose keyColumn matches record[keyColumn], else append */
  upsertByKey(table: string, keyColumn: string, record: StoredRow): Promise<void>;

  /** Create the table and any missing columns. Idempotent. */
  ensureSchema(table: string, columns: readonly string[]): Promise<void>;

  close(): Promise<void>;
}

/**
 * Map a logical title to a safe SQL table name: "Data Pharmacy" -> "data_pharmacy"
 */
export function tableNameFor(title: string): string {
  return title.trim().toLowerCase().replace(/[^a-z0-9_]/g, '_');
}

/**
 * Header order after merging required columns into an existing header
 */
export function mergeColumns(existing: readonly string[], required: readonly string[]): string[] {
  const merged = [...existing];
  for (const column of required) {
    if (!merged.includes(column)) merged.push(column);
  }
  return merged;
}
