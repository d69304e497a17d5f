import type { StoredRow } from '../../domain/entities/IntakeRecord.js';
import { StoreError } from '../../domain/errors.js';
import { logger } from '../logger.js';
import { type BackingStore, mergeColumns } from './BackingStore.js';

/**
 * The slice of the spreadsheet API the store needs. Ranges use A1 notation.
 */
export interface SheetsGateway {
  listSheetTitles(): Promise<string[]>;
  addSheet(title: string): Promise<void>;
  getValues(range: string): Promise<string[][]>;
  updateValues(range: string, values: string[][]): Promise<void>;
  appendValues(range: string, values: string[][]): Promise<void>;
  close(): Promise<void>;
}

/**
 * A1 range for a sheet title, quoted so spaces and apostrophes are safe
 */
export function sheetRange(title: string, cells?: string): string {
  const quoted = `'${title.replace(/'/g, "''")}'`;
  return cells ? `${quoted}!${cells}` : quoted;
}

function isBlankRow(row: readonly string[]): boolean {
  return row.every((cell) => cell.trim() === '');
}

/**
 * Spreadsheet backend: one sheet per logical title, first row is the header.
 */
export class SheetsStore implements BackingStore {
  readonly backendName = 'sheets';
  private titles: Set<string> | null = null;

  constructor(private gateway: SheetsGateway) {}

  async readAll(table: string): Promise<StoredRow[]> {
    if (!(await this.hasSheet(table))) {
      return [];
    }

    const [headerRow, ...rows] = await this.gateway.getValues(sheetRange(table));
    if (!headerRow) return [];
    const header = headerRow.map((cell) => cell.trim());

    return rows
      .filter((row) => !isBlankRow(row))
      .map((row) => {
        const stored: StoredRow = {};
        header.forEach((column, index) => {
          if (column) stored[column] = row[index] ?? '';
        });
        return stored;
      });
  }

  async appendRow(table: string, values: readonly string[]): Promise<void> {
    await this.gateway.appendValues(sheetRange(table, 'A1'), [[...values]]);
  }

  async upsertByKey(table: string, keyColumn: string, record: StoredRow): Promise<void> {
    const [headerRow = [], ...rows] = await this.gateway.getValues(sheetRange(table));
    const header = headerRow.map((cell) => cell.trim());
    const keyIndex = header.indexOf(keyColumn);
    const keyValue = record[keyColumn];

    if (keyIndex === -1 || keyValue === undefined || keyValue === '') {
      throw new StoreError(`upsert into ${table} failed: missing key column ${keyColumn}`, 'permanent', 'schema', {
        table,
        step: 'upsert',
      });
    }

    const unknown = Object.keys(record).filter((column) => !header.includes(column));
    if (unknown.length > 0) {
      throw new StoreError(`upsert into ${table} failed: unknown columns ${unknown.join(', ')}`, 'permanent', 'schema', {
        table,
        step: 'upsert',
      });
    }

    const rowIndex = rows.findIndex((row) => (row[keyIndex] ?? '') === keyValue);
    const current = rowIndex === -1 ? [] : rows[rowIndex];
    const merged = header.map((column, index) => record[column] ?? current[index] ?? '');

    if (rowIndex === -1) {
      await this.gateway.appendValues(sheetRange(table, 'A1'), [merged]);
    } else {
      // +1 for the header row, +1 because sheet rows are 1-based
      await this.gateway.updateValues(sheetRange(table, `A${rowIndex + 2}`), [merged]);
    }
  }

  async ensureSchema(table: string, columns: readonly string[]): Promise<void> {
    if (!(await this.hasSheet(table))) {
      await this.gateway.addSheet(table);
      this.titles?.add(table);
      await this.gateway.updateValues(sheetRange(table, 'A1'), [[...columns]]);
      logger.info('Sheet created', { table, columns: columns.length });
      return;
    }

    const [headerRow = []] = await this.gateway.getValues(sheetRange(table, '1:1'));
    const header = headerRow.map((cell) => cell.trim());
    const merged = mergeColumns(header, columns);
    if (merged.length !== header.length) {
      await this.gateway.updateValues(sheetRange(table, 'A1'), [merged]);
      logger.info('Sheet header extended', { table, added: merged.slice(header.length) });
    }
  }

  async close(): Promise<void> {
    await this.gateway.close();
  }

  private async hasSheet(table: string): Promise<boolean> {
    if (!this.titles || !this.titles.has(table)) {
      // refresh on a miss; another process may have created the sheet
      this.titles = new Set(await this.gateway.listSheetTitles());
    }
    return this.titles.has(table);
  }
}
