import type { StoredRow } from '../domain/entities/IntakeRecord.js';
import { toCents } from '../domain/entities/IntakeRecord.js';
import { parseServiceDate } from '../domain/serviceDate.js';
import { describeError } from '../domain/errors.js';
import { logger } from './logger.js';

/**
 * The key that identifies a probable re-submission of the same service
 */
export interface DuplicateKey {
  erx: string;
  memberId: string;
  netAmount: string | number;
  serviceDate: string;
}

const KEY_COLUMNS = ['ERXNumber', 'MemberID', 'Net', 'ServiceDate'] as const;

/**
 * Same-day duplicate check over the existing data rows.
 *
 * ERX and member ID match exactly after trimming, net amounts match by value in
 * cents and service dates match as calendar days. When the history cannot be
 * interpreted the check fails open and reports no duplicate.
 */
export class DuplicateDetector {
  isDuplicate(existing: readonly StoredRow[], candidate: DuplicateKey): boolean {
    return this.findDuplicate(existing, candidate) !== null;
  }

  findDuplicate(existing: readonly StoredRow[], candidate: DuplicateKey): StoredRow | null {
    if (existing.length === 0) return null;

    try {
      const missing = KEY_COLUMNS.filter((column) => !(column in existing[0]));
      if (missing.length > 0) {
        logger.warn('Duplicate check skipped, history lacks key columns', { missing });
        return null;
      }

      const erx = candidate.erx.trim();
      const memberId = candidate.memberId.trim();
      const cents = toCents(candidate.netAmount);
      const serviceDate = parseServiceDate(candidate.serviceDate);
      if (cents === null || serviceDate === null) return null;

      return (
        existing.find(
          (row) =>
            parseServiceDate(row.ServiceDate) === serviceDate &&
            (row.ERXNumber ?? '').trim() === erx &&
            (row.MemberID ?? '').trim() === memberId &&
            toCents(row.Net) === cents
        ) ?? null
      );
    } catch (error) {
      logger.warn('Duplicate check failed open', { error: describeError(error) });
      return null;
    }
  }
}

export const duplicateDetector = new DuplicateDetector();
