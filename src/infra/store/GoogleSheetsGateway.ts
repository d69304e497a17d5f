import { google, type sheets_v4 } from 'googleapis';
import { StoreError, describeError, type StoreErrorReason } from '../../domain/errors.js';
import { extractSpreadsheetId, type Env } from '../env.js';
import { LazyClient } from '../LazyClient.js';
import { logger } from '../logger.js';
import type { SheetsGateway } from './SheetsStore.js';

const SCOPES = ['https://www.googleapis.com/auth/spreadsheets'];

const NETWORK_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'EAI_AGAIN', 'ENOTFOUND', 'EPIPE']);

export interface GoogleSheetsConfig {
  clientEmail: string;
  privateKey: string;
  spreadsheetId: string;
}

export function googleSheetsConfigFromEnv(env: Env): GoogleSheetsConfig {
  const spreadsheetId = env.GOOGLE_SPREADSHEET_ID ?? extractSpreadsheetId(env.GOOGLE_SHEET_URL);
  if (!env.GOOGLE_SERVICE_ACCOUNT_EMAIL || !env.GOOGLE_PRIVATE_KEY || !spreadsheetId) {
    // env validation already enforces these for the sheets backend
    throw new StoreError('Google Sheets credentials are not configured', 'permanent', 'auth', {
      step: 'connect',
    });
  }
  return {
    clientEmail: env.GOOGLE_SERVICE_ACCOUNT_EMAIL,
    privateKey: env.GOOGLE_PRIVATE_KEY,
    spreadsheetId,
  };
}

function httpStatusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('status' in error && typeof error.status === 'number') return error.status;
  if ('response' in error) {
    const response = error.response;
    if (typeof response === 'object' && response !== null && 'status' in response && typeof response.status === 'number') {
      return response.status;
    }
  }
  if ('code' in error && typeof error.code === 'number') return error.code;
  return undefined;
}

function networkCodeOf(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Map a Sheets API failure onto the store error kinds
 */
export function classifyGoogleError(error: unknown): { transient: boolean; reason: StoreErrorReason } {
  const status = httpStatusOf(error);
  if (status === 429) return { transient: true, reason: 'rate_limited' };
  if (status === 500 || status === 502 || status === 503 || status === 504) {
    return { transient: true, reason: 'unavailable' };
  }
  if (status === 401 || status === 403) return { transient: false, reason: 'auth' };
  if (status === 404) return { transient: false, reason: 'not_found' };
  if (status === 400) return { transient: false, reason: 'schema' };

  const code = networkCodeOf(error);
  if (code && NETWORK_CODES.has(code)) return { transient: true, reason: 'unavailable' };

  return { transient: false, reason: 'unknown' };
}

function createSheetsClient(config: GoogleSheetsConfig): sheets_v4.Sheets {
  const auth = new google.auth.JWT({
    email: config.clientEmail,
    key: config.privateKey,
    scopes: SCOPES,
  });
  return google.sheets({ version: 'v4', auth });
}

/**
 * Google Sheets API v4 access for one spreadsheet, authenticated with a service account.
 * The authorized client is created once and reused across requests.
 */
export class GoogleSheetsGateway implements SheetsGateway {
  private readonly client: LazyClient<sheets_v4.Sheets>;

  constructor(private readonly config: GoogleSheetsConfig) {
    this.client = new LazyClient('google-sheets', () => createSheetsClient(config));
  }

  async listSheetTitles(): Promise<string[]> {
    return this.call('list sheets', async (sheets) => {
      const res = await sheets.spreadsheets.get({
        spreadsheetId: this.config.spreadsheetId,
        fields: 'sheets.properties.title',
      });
      return (res.data.sheets ?? [])
        .map((sheet) => sheet.properties?.title)
        .filter((title): title is string => typeof title === 'string');
    });
  }

  async addSheet(title: string): Promise<void> {
    await this.call('add sheet', async (sheets) => {
      await sheets.spreadsheets.batchUpdate({
        spreadsheetId: this.config.spreadsheetId,
        requestBody: { requests: [{ addSheet: { properties: { title } } }] },
      });
    });
  }

  async getValues(range: string): Promise<string[][]> {
    return this.call('get values', async (sheets) => {
      const res = await sheets.spreadsheets.values.get({
        spreadsheetId: this.config.spreadsheetId,
        range,
        valueRenderOption: 'FORMATTED_VALUE',
      });
      const values: unknown[][] = res.data.values ?? [];
      return values.map((row) => row.map((cell) => (cell === null || cell === undefined ? '' : String(cell))));
    });
  }

  async updateValues(range: string, values: string[][]): Promise<void> {
    await this.call('update values', async (sheets) => {
      await sheets.spreadsheets.values.update({
        spreadsheetId: this.config.spreadsheetId,
        range,
        valueInputOption: 'RAW',
        requestBody: { values },
      });
    });
  }

  async appendValues(range: string, values: string[][]): Promise<void> {
    await this.call('append values', async (sheets) => {
      await sheets.spreadsheets.values.append({
        spreadsheetId: this.config.spreadsheetId,
        range,
        valueInputOption: 'RAW',
        insertDataOption: 'INSERT_ROWS',
        requestBody: { values },
      });
    });
  }

  async close(): Promise<void> {
    await this.client.close();
  }

  private async call<T>(step: string, operation: (sheets: sheets_v4.Sheets) => Promise<T>): Promise<T> {
    try {
      const sheets = this.client.get();
      return await operation(sheets);
    } catch (error) {
      if (error instanceof StoreError) throw error;
      const { transient, reason } = classifyGoogleError(error);
      logger.error('Sheets API call failed', { step, reason, error: describeError(error) });
      throw new StoreError(`Sheets ${step} failed: ${describeError(error)}`, transient ? 'transient' : 'permanent', reason, {
        step,
      });
    }
  }
}
