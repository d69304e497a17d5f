import type { BackingStore } from '../store/BackingStore.js';
import type { CachedReader } from '../CachedReader.js';
import type { AuditAction, AuditEntry } from '../../domain/entities/AuditEntry.js';
import {
  LOG_HEADERS,
  auditEntryToRow,
  createAuditEntry,
  isAuditAction,
} from '../../domain/entities/AuditEntry.js';
import { LogError, StoreError, describeError } from '../../domain/errors.js';
import { withRetry, type RetryPolicy } from '../retry.js';
import { logger } from '../logger.js';

function parseDetail(raw: string): Record<string, unknown> | null {
  if (!raw) return null;
  try {
    const parsed: unknown = JSON.parse(raw);
    if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
    return null;
  } catch {
    return null;
  }
}

/**
 * Append-only audit trail stored in the logs table.
 * A failed write surfaces as LogError; it never undoes the action being recorded.
 */
export class AuditRepository {
  private headersEnsured = new Set<string>();

  constructor(
    private store: BackingStore,
    private reader: CachedReader,
    private retryPolicy: Omit<RetryPolicy, 'shouldRetry'>
  ) {}

  /**
   * Record one action. Ensures the header row once per table, then appends
   * `[timestamp, user, action, detail JSON]`.
   */
  async log(
    table: string,
    user: string,
    action: AuditAction,
    detail: Record<string, unknown>
  ): Promise<AuditEntry> {
    const entry = createAuditEntry({ user, action, detail });

    try {
      if (!this.headersEnsured.has(table)) {
        await this.store.ensureSchema(table, LOG_HEADERS);
        this.headersEnsured.add(table);
      }

      await withRetry(`audit ${action}`, () => this.store.appendRow(table, auditEntryToRow(entry)), {
        ...this.retryPolicy,
        shouldRetry: (error) => error instanceof StoreError && error.reason === 'rate_limited',
      });
    } catch (error) {
      logger.error('Failed to write audit entry', { table, user, action, error: describeError(error) });
      throw new LogError(`Audit log: failed to record ${action}: ${describeError(error)}`, {
        step: 'audit',
        action,
        cause: describeError(error),
      });
    }

    this.reader.invalidate(table);
    logger.debug('Audit event logged', { table, user, action });
    return entry;
  }

  /**
   * Most recent entries first
   */
  async getRecent(table: string, limit = 100): Promise<AuditEntry[]> {
    const rows = await this.reader.read(table);
    const entries: AuditEntry[] = [];

    for (let i = rows.length - 1; i >= 0 && entries.length < limit; i--) {
      const row = rows[i];
      const action = row.Action ?? '';
      if (!isAuditAction(action)) continue;
      entries.push({
        timestamp: row.TS ?? '',
        user: row.User ?? '',
        action,
        detail: parseDetail(row.DetailsJSON ?? ''),
      });
    }

    return entries;
  }
}
