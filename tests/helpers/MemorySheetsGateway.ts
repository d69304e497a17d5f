import type { SheetsGateway } from '../../src/infra/store/SheetsStore.js';

/**
 * Spreadsheet API stand-in. Understands the ranges SheetsStore builds:
 * 'Title', 'Title'!1:1, 'Title'!A1 and 'Title'!A<n>.
 */
export class MemorySheetsGateway implements SheetsGateway {
  readonly sheets = new Map<string, string[][]>();
  listCalls = 0;

  async listSheetTitles(): Promise<string[]> {
    this.listCalls++;
    return [...this.sheets.keys()];
  }

  async addSheet(title: string): Promise<void> {
    this.sheets.set(title, []);
  }

  async getValues(range: string): Promise<string[][]> {
    const { title, cells } = parseRange(range);
    const grid = this.grid(title);
    const values = cells === '1:1' ? grid.slice(0, 1) : grid;
    // the API drops trailing empty cells and rows
    return values.map((row) => trimTrailing(row));
  }

  async updateValues(range: string, values: string[][]): Promise<void> {
    const { title, cells } = parseRange(range);
    const grid = this.grid(title);
    const start = Number((cells ?? 'A1').replace(/^A/, '')) - 1;
    values.forEach((row, offset) => {
      grid[start + offset] = [...row];
    });
  }

  async appendValues(range: string, values: string[][]): Promise<void> {
    const { title } = parseRange(range);
    this.grid(title).push(...values.map((row) => [...row]));
  }

  async close(): Promise<void> {}

  private grid(title: string): string[][] {
    const grid = this.sheets.get(title);
    if (!grid) throw new Error(`Unable to parse range: ${title}`);
    return grid;
  }
}

function parseRange(range: string): { title: string; cells?: string } {
  const match = /^'((?:[^']|'')*)'(?:!(.+))?$/.exec(range);
  if (!match) throw new Error(`bad range ${range}`);
  return { title: match[1].replace(/''/g, "'"), cells: match[2] };
}

function trimTrailing(row: string[]): string[] {
  let end = row.length;
  while (end > 0 && row[end - 1] === '') end--;
  return row.slice(0, end);
}
