import type { Knex } from 'knex';
import type { StoredRow } from '../../domain/entities/IntakeRecord.js';
import { StoreError, describeError, type StoreErrorReason } from '../../domain/errors.js';
import type { DatabaseAdapter, DatabaseConfig } from '../DatabaseAdapter.js';
import { logger } from '../logger.js';
import { type BackingStore, mergeColumns, tableNameFor } from './BackingStore.js';

/** Internal ordering column; never exposed as a business column */
export const ROW_ID = '_row_id';

const TRANSIENT_CODES = new Set([
  'SQLITE_BUSY',
  'SQLITE_LOCKED',
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'EPIPE',
  '57P01', // admin_shutdown
  '57P03', // cannot_connect_now
  '53300', // too_many_connections
  '40001', // serialization_failure
  '40P01', // deadlock_detected
]);

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Classify a driver error from better-sqlite3 or pg
 */
export function classifyDatabaseError(error: unknown): { transient: boolean; reason: StoreErrorReason } {
  const code = errorCode(error);
  if (error instanceof Error && error.name === 'KnexTimeoutError') {
    return { transient: true, reason: 'unavailable' };
  }
  if (code && (TRANSIENT_CODES.has(code) || code.startsWith('08'))) {
    return { transient: true, reason: 'unavailable' };
  }
  if (code === '28P01' || code === '28000' || code === 'SQLITE_CANTOPEN' || code === 'SQLITE_PERM') {
    return { transient: false, reason: 'auth' };
  }
  if (code === '42P01' || code === '42703' || code === 'SQLITE_ERROR') {
    return { transient: false, reason: 'schema' };
  }
  return { transient: false, reason: 'unknown' };
}

function toStoredRow(row: Record<string, unknown>): StoredRow {
  const stored: StoredRow = {};
  for (const [column, value] of Object.entries(row)) {
    if (column === ROW_ID) continue;
    stored[column] = value === null || value === undefined ? '' : String(value);
  }
  return stored;
}

/**
 * Column names in table definition order, without the row id.
 * Positional appends rely on this order, so it is read from the catalog explicitly.
 */
export async function readColumnOrder(
  db: Knex,
  client: DatabaseConfig['client'],
  name: string
): Promise<string[]> {
  const rows: Array<{ name: unknown }> =
    client === 'pg'
      ? await db('information_schema.columns')
          .select({ name: 'column_name' })
          .where('table_name', name)
          .andWhereRaw('table_schema = current_schema()')
          .orderBy('ordinal_position', 'asc')
      : await db.select('name').from(db.raw('pragma_table_info(?)', [name])).orderBy('cid', 'asc');

  return rows.map((row) => String(row.name)).filter((column) => column !== ROW_ID);
}

/**
 * Relational backend: one table per logical title, TEXT columns named after the headers,
 * plus an auto-increment row id that preserves append order.
 */
export class RelationalStore implements BackingStore {
  readonly backendName = 'database';
  private columnOrder = new Map<string, string[]>();

  constructor(private database: DatabaseAdapter) {}

  async readAll(table: string): Promise<StoredRow[]> {
    return this.run('read', table, async (db, name) => {
      if (!(await db.schema.hasTable(name))) {
        return [];
      }
      const rows: Record<string, unknown>[] = await db(name).select('*').orderBy(ROW_ID, 'asc');
      return rows.map(toStoredRow);
    });
  }

  async appendRow(table: string, values: readonly string[]): Promise<void> {
    await this.run('append', table, async (db, name) => {
      const columns = await this.columnsOf(db, name);
      if (values.length > columns.length) {
        throw new StoreError(
          `append to ${table} failed: ${values.length} values for ${columns.length} columns`,
          'permanent',
          'schema',
          { table, step: 'append' }
        );
      }

      const row: Record<string, string> = {};
      columns.forEach((column, index) => {
        row[column] = values[index] ?? '';
      });
      await db(name).insert(row);
    });
  }

  async upsertByKey(table: string, keyColumn: string, record: StoredRow): Promise<void> {
    const keyValue = record[keyColumn];
    if (keyValue === undefined || keyValue === '') {
      throw new StoreError(`upsert into ${table} failed: record has no ${keyColumn}`, 'permanent', 'schema', {
        table,
        step: 'upsert',
      });
    }

    await this.run('upsert', table, async (db, name) => {
      const columns = await this.columnsOf(db, name);
      const unknown = Object.keys(record).filter((column) => !columns.includes(column));
      if (unknown.length > 0) {
        throw new StoreError(`upsert into ${table} failed: unknown columns ${unknown.join(', ')}`, 'permanent', 'schema', {
          table,
          step: 'upsert',
        });
      }

      await db.transaction(async (trx) => {
        const existing: { [ROW_ID]: number } | undefined = await trx(name)
          .select(ROW_ID)
          .where(keyColumn, keyValue)
          .orderBy(ROW_ID, 'asc')
          .first();

        if (existing) {
          await trx(name).where(ROW_ID, existing[ROW_ID]).update(record);
        } else {
          await trx(name).insert(record);
        }
      });
    });
  }

  async ensureSchema(table: string, columns: readonly string[]): Promise<void> {
    await this.run('ensure schema', table, async (db, name) => {
      if (!(await db.schema.hasTable(name))) {
        await db.schema.createTable(name, (builder) => {
          builder.increments(ROW_ID);
          for (const column of columns) {
            builder.text(column);
          }
        });
        this.columnOrder.set(name, [...columns]);
        logger.info('Table created', { table, name, columns: columns.length });
        return;
      }

      const existing = await this.columnsOf(db, name);
      const missing = columns.filter((column) => !existing.includes(column));
      if (missing.length > 0) {
        await db.schema.alterTable(name, (builder) => {
          for (const column of missing) {
            builder.text(column);
          }
        });
        logger.info('Table columns added', { table, name, missing });
      }
      this.columnOrder.set(name, mergeColumns(existing, columns));
    });
  }

  async close(): Promise<void> {
    await this.database.close();
  }

  private async columnsOf(db: Knex, name: string): Promise<string[]> {
    const known = this.columnOrder.get(name);
    if (known) return known;

    const columns = await readColumnOrder(db, this.database.client, name);
    this.columnOrder.set(name, columns);
    return columns;
  }

  private async run<T>(
    step: string,
    table: string,
    operation: (db: Knex, name: string) => Promise<T>
  ): Promise<T> {
    try {
      const db = await this.database.connection();
      return await operation(db, tableNameFor(table));
    } catch (error) {
      if (error instanceof StoreError) throw error;
      const { transient, reason } = classifyDatabaseError(error);
      logger.error('Database operation failed', { step, table, reason, error: describeError(error) });
      throw new StoreError(
        `${step} on ${table} failed: ${describeError(error)}`,
        transient ? 'transient' : 'permanent',
        reason,
        { table, step }
      );
    }
  }
}
