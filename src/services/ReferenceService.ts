import type { BackingStore } from '../infra/store/BackingStore.js';
import type { CachedReader } from '../infra/CachedReader.js';
import { logger } from '../infra/logger.js';
import {
  DEFAULT_REFERENCE_OPTIONS,
  REFERENCE_CATEGORIES,
  REFERENCE_HEADERS,
  createReferenceOption,
  type ReferenceCategory,
} from '../domain/entities/ReferenceOption.js';
import { describeError } from '../domain/errors.js';

/**
 * Dropdown values (payers, insurers, clinicians) read from the reference table.
 * Falls back to built-in defaults when the table is empty or unreachable.
 */
export class ReferenceService {
  constructor(
    private store: BackingStore,
    private reader: CachedReader,
    private table: string
  ) {}

  async ensureSchema(): Promise<void> {
    await this.store.ensureSchema(this.table, REFERENCE_HEADERS);
  }

  async getOptions(category: ReferenceCategory): Promise<string[]> {
    try {
      const rows = await this.reader.read(this.table);
      const values = rows
        .filter((row) => (row.Category ?? '').trim().toLowerCase() === category)
        .map((row) => (row.Value ?? '').trim())
        .filter((value) => value.length > 0);
      const unique = [...new Set(values)];
      return unique.length > 0 ? unique : [...DEFAULT_REFERENCE_OPTIONS[category]];
    } catch (error) {
      logger.warn('Reference options unavailable, using defaults', {
        category,
        error: describeError(error),
      });
      return [...DEFAULT_REFERENCE_OPTIONS[category]];
    }
  }

  async getAll(): Promise<Record<ReferenceCategory, string[]>> {
    const [payer, insurance, clinician] = await Promise.all(
      REFERENCE_CATEGORIES.map((category) => this.getOptions(category))
    );
    return { payer, insurance, clinician };
  }

  /**
   * Seed default options for categories that have no rows yet.
   * Upserts by key, so running it again never duplicates an option.
   */
  async seedDefaults(): Promise<number> {
    const rows = await this.store.readAll(this.table);
    const populated = new Set(rows.map((row) => (row.Category ?? '').trim().toLowerCase()));

    let seeded = 0;
    for (const category of REFERENCE_CATEGORIES) {
      if (populated.has(category)) continue;
      for (const value of DEFAULT_REFERENCE_OPTIONS[category]) {
        const option = createReferenceOption(category, value);
        await this.store.upsertByKey(this.table, 'Key', {
          Key: option.key,
          Category: option.category,
          Value: option.value,
        });
        seeded++;
      }
    }

    this.reader.invalidate(this.table);
    if (seeded > 0) {
      logger.info('Reference options seeded', { table: this.table, seeded });
    }
    return seeded;
  }
}
