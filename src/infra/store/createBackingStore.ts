import type { Env } from '../env.js';
import { DatabaseAdapter, databaseConfigFromEnv } from '../DatabaseAdapter.js';
import { logger } from '../logger.js';
import type { BackingStore } from './BackingStore.js';
import { GoogleSheetsGateway, googleSheetsConfigFromEnv } from './GoogleSheetsGateway.js';
import { RelationalStore } from './RelationalStore.js';
import { SheetsStore } from './SheetsStore.js';

/**
 * Factory selecting the backing store from configuration at startup
 */
export function createBackingStore(env: Env): BackingStore {
  if (env.STORE_BACKEND === 'sheets') {
    const config = googleSheetsConfigFromEnv(env);
    logger.info('Using Google Sheets backing store', { spreadsheetId: config.spreadsheetId });
    return new SheetsStore(new GoogleSheetsGateway(config));
  }

  logger.info('Using relational backing store', { client: env.DATABASE_CLIENT });
  return new RelationalStore(new DatabaseAdapter(databaseConfigFromEnv(env)));
}
