import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { knex, type Knex } from 'knex';
import { LazyClient } from './LazyClient.js';
import { logger } from './logger.js';
import type { Env } from './env.js';

export interface DatabaseConfig {
  client: 'better-sqlite3' | 'pg';
  url: string;
}

export function databaseConfigFromEnv(env: Pick<Env, 'DATABASE_CLIENT' | 'DATABASE_URL'>): DatabaseConfig {
  return { client: env.DATABASE_CLIENT, url: env.DATABASE_URL };
}

function createKnex(config: DatabaseConfig): Knex {
  if (config.client === 'better-sqlite3') {
    if (config.url !== ':memory:') {
      mkdirSync(dirname(config.url), { recursive: true });
    }
    return knex({
      client: 'better-sqlite3',
      connection: { filename: config.url },
      useNullAsDefault: true,
    });
  }

  return knex({
    client: 'pg',
    connection: config.url,
    pool: { min: 0, max: 10 },
  });
}

/**
 * Owns the process-wide knex instance for the relational backend.
 * Domain code never imports this - stores receive it by constructor injection.
 */
export class DatabaseAdapter {
  private readonly holder: LazyClient<Knex>;

  constructor(private readonly config: DatabaseConfig) {
    this.holder = new LazyClient('database', () => createKnex(config), (db) => db.destroy());
  }

  get client(): DatabaseConfig['client'] {
    return this.config.client;
  }

  async connection(): Promise<Knex> {
    return this.holder.get();
  }

  async close(): Promise<void> {
    await this.holder.close();
    logger.info('Database connection closed');
  }
}
