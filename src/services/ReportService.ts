import type { CachedReader } from '../infra/CachedReader.js';
import type { AuditRepository } from '../infra/repositories/AuditRepository.js';
import type { DeliveryResult, ReportDelivery } from '../infra/WhatsAppAdapter.js';
import { logger } from '../infra/logger.js';
import {
  DATA_HEADERS,
  rowToRecord,
  toCents,
  type DataHeader,
  type IntakeRecord,
  type StoredRow,
} from '../domain/entities/IntakeRecord.js';
import type { SendReportAuditDetail } from '../domain/entities/AuditEntry.js';
import { MAX_PERIOD_DAYS, addDays, isWithinRange, parseServiceDate, todayIn } from '../domain/serviceDate.js';
import { toCsv } from '../domain/csv.js';
import { ConfigError, LogError, ValidationError, describeError } from '../domain/errors.js';

export const CSV_MIME_TYPE = 'text/csv';

export interface ReportServiceOptions {
  dataTable: string;
  logsTable: string;
  timeZone: string;
  now?: () => Date;
}

export interface Report {
  csv: Buffer;
  filename: string;
  rowCount: number;
  startDate: string;
  endDate: string;
}

export type SendReportResult =
  | { sent: false; reason: 'empty'; periodDays: number; rowCount: 0 }
  | {
      sent: true;
      periodDays: number;
      rowCount: number;
      filename: string;
      delivery: DeliveryResult;
      auditLogged: boolean;
    };

export interface RecordFilters {
  q?: string;
  erx?: string;
  memberId?: string;
  emiratesId?: string;
  patientName?: string;
  insurance?: string;
  from?: string;
  to?: string;
}

export interface SummaryTotals {
  rowCount: number;
  net: string;
}

export interface SummaryDateRow extends SummaryTotals {
  serviceDate: string;
  byInsurance: Record<string, SummaryTotals>;
}

/**
 * Row counts and Net sums pivoted by service date and insurance
 */
export interface RecordSummary {
  insurances: string[];
  rows: SummaryDateRow[];
  byInsurance: Record<string, SummaryTotals>;
  total: SummaryTotals;
}

/** Bucket for blank insurance and unparseable service dates */
export const UNKNOWN_BUCKET = 'Unknown';

type Tally = { rowCount: number; cents: number };

function addTo(tallies: Map<string, Tally>, key: string, cents: number): void {
  const tally = tallies.get(key) ?? { rowCount: 0, cents: 0 };
  tally.rowCount += 1;
  tally.cents += cents;
  tallies.set(key, tally);
}

function totalsOf(tally: Tally): SummaryTotals {
  return { rowCount: tally.rowCount, net: (tally.cents / 100).toFixed(2) };
}

function sortedKeys(keys: Iterable<string>): string[] {
  return [...keys].sort((a, b) => {
    if (a === b) return 0;
    if (a === UNKNOWN_BUCKET) return 1;
    if (b === UNKNOWN_BUCKET) return -1;
    return a < b ? -1 : 1;
  });
}

function totalsByKey(tallies: Map<string, Tally>): Record<string, SummaryTotals> {
  const result: Record<string, SummaryTotals> = {};
  for (const key of sortedKeys(tallies.keys())) {
    const tally = tallies.get(key);
    if (tally) result[key] = totalsOf(tally);
  }
  return result;
}

const FILTER_KEYS = ['erx', 'memberId', 'emiratesId', 'patientName', 'insurance'] as const;

const FILTER_COLUMNS: Record<(typeof FILTER_KEYS)[number], DataHeader> = {
  erx: 'ERXNumber',
  memberId: 'MemberID',
  emiratesId: 'EmiratesID',
  patientName: 'PatientName',
  insurance: 'Insurance',
};

function contains(cell: string | undefined, needle: string): boolean {
  return (cell ?? '').toLowerCase().includes(needle.toLowerCase());
}

function toCsvRows(rows: readonly StoredRow[]): string[][] {
  return rows.map((row) => DATA_HEADERS.map((header) => row[header] ?? ''));
}

/**
 * ReportService - period reports, filtered exports and report delivery.
 * Reads go through the shared cache; nothing here writes intake rows.
 */
export class ReportService {
  private now: () => Date;

  constructor(
    private reader: CachedReader,
    private auditRepo: AuditRepository,
    private delivery: ReportDelivery,
    private options: ReportServiceOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  today(): string {
    return todayIn(this.options.timeZone, this.now());
  }

  /**
   * Rows whose service date lies in [today - (periodDays - 1), today], as CSV with a header row
   */
  async buildReport(periodDays: number, today: string = this.today()): Promise<Report> {
    if (!Number.isInteger(periodDays) || periodDays < 1) {
      throw new ValidationError('Report: periodDays must be a positive whole number', {
        fields: ['periodDays'],
      });
    }
    if (periodDays > MAX_PERIOD_DAYS) {
      throw new ValidationError(`Report: periodDays must be at most ${MAX_PERIOD_DAYS}`, {
        fields: ['periodDays'],
      });
    }

    const endDate = today;
    const startDate = addDays(endDate, -(periodDays - 1));
    const rows = await this.reader.read(this.options.dataTable);
    const inPeriod = rows.filter((row) => {
      const serviceDate = parseServiceDate(row.ServiceDate);
      return serviceDate !== null && isWithinRange(serviceDate, startDate, endDate);
    });

    return {
      csv: Buffer.from(toCsv(DATA_HEADERS, toCsvRows(inPeriod)), 'utf-8'),
      filename: `rcm-intake_${startDate}_${endDate}.csv`,
      rowCount: inPeriod.length,
      startDate,
      endDate,
    };
  }

  /**
   * Build the period report and deliver it. An empty report is skipped when asked;
   * a delivered report is recorded in the audit log.
   */
  async sendReport(
    user: string,
    periodDays: number,
    options: { skipEmpty?: boolean } = {}
  ): Promise<SendReportResult> {
    if (!this.delivery.isConfigured()) {
      throw new ConfigError('Report delivery: messaging is not configured', { step: 'configure' });
    }

    const report = await this.buildReport(periodDays);
    if (report.rowCount === 0 && options.skipEmpty) {
      logger.info('Report skipped, no rows in period', { periodDays, startDate: report.startDate });
      return { sent: false, reason: 'empty', periodDays, rowCount: 0 };
    }

    const delivery = await this.delivery.sendDocumentReport({
      bytes: report.csv,
      filename: report.filename,
      mimeType: CSV_MIME_TYPE,
      note: `RCM intake report ${report.startDate} to ${report.endDate}: ${report.rowCount} record(s)`,
    });

    const detail: SendReportAuditDetail = { rowCount: report.rowCount, periodDays };
    const auditLogged = await this.tryAudit(user, 'send-report', detail);

    logger.info('Report sent', {
      user,
      periodDays,
      rowCount: report.rowCount,
      recipients: delivery.recipients.length,
    });
    return {
      sent: true,
      periodDays,
      rowCount: report.rowCount,
      filename: report.filename,
      delivery,
      auditLogged,
    };
  }

  async search(filters: RecordFilters): Promise<IntakeRecord[]> {
    const rows = await this.reader.read(this.options.dataTable);
    return this.filterRows(rows, filters).map(rowToRecord);
  }

  /**
   * Filtered rows as a CSV file; the fallback when delivery is unavailable
   */
  async exportCsv(filters: RecordFilters, user: string): Promise<Omit<Report, 'startDate' | 'endDate'>> {
    const rows = this.filterRows(await this.reader.read(this.options.dataTable), filters);
    await this.tryAudit(user, 'export-report', { rowCount: rows.length, filters: { ...filters } });

    return {
      csv: Buffer.from(toCsv(DATA_HEADERS, toCsvRows(rows)), 'utf-8'),
      filename: `rcm-intake_export_${this.today()}.csv`,
      rowCount: rows.length,
    };
  }

  /**
   * Counts and Net totals of the filtered rows per service date and insurance.
   * Net is summed in integer cents; a cell that is not an amount counts as zero.
   */
  async summary(filters: RecordFilters): Promise<RecordSummary> {
    const rows = this.filterRows(await this.reader.read(this.options.dataTable), filters);
    const byDate = new Map<string, Map<string, Tally>>();
    const dateTotals = new Map<string, Tally>();
    const insuranceTotals = new Map<string, Tally>();
    const grand: Tally = { rowCount: 0, cents: 0 };

    for (const row of rows) {
      const serviceDate = parseServiceDate(row.ServiceDate) ?? UNKNOWN_BUCKET;
      const insurance = row.Insurance?.trim() || UNKNOWN_BUCKET;
      const cents = toCents(row.Net) ?? 0;

      const cells = byDate.get(serviceDate) ?? new Map<string, Tally>();
      addTo(cells, insurance, cents);
      byDate.set(serviceDate, cells);
      addTo(dateTotals, serviceDate, cents);
      addTo(insuranceTotals, insurance, cents);
      grand.rowCount += 1;
      grand.cents += cents;
    }

    return {
      insurances: sortedKeys(insuranceTotals.keys()),
      rows: sortedKeys(byDate.keys()).map((serviceDate) => ({
        serviceDate,
        ...totalsOf(dateTotals.get(serviceDate) ?? { rowCount: 0, cents: 0 }),
        byInsurance: totalsByKey(byDate.get(serviceDate) ?? new Map<string, Tally>()),
      })),
      byInsurance: totalsByKey(insuranceTotals),
      total: totalsOf(grand),
    };
  }

  private filterRows(rows: readonly StoredRow[], filters: RecordFilters): StoredRow[] {
    const from = filters.from ? parseServiceDate(filters.from) : null;
    const to = filters.to ? parseServiceDate(filters.to) : null;
    if ((filters.from && !from) || (filters.to && !to)) {
      throw new ValidationError('Search: from/to must be valid dates (YYYY-MM-DD)', { fields: ['from', 'to'] });
    }

    const q = filters.q?.trim();
    return rows.filter((row) => {
      for (const key of FILTER_KEYS) {
        const needle = filters[key]?.trim();
        if (needle && !contains(row[FILTER_COLUMNS[key]], needle)) return false;
      }

      if (from || to) {
        const serviceDate = parseServiceDate(row.ServiceDate);
        if (!serviceDate) return false;
        if (from && serviceDate < from) return false;
        if (to && serviceDate > to) return false;
      }

      if (q) {
        return Object.values(row).some((cell) => contains(cell, q));
      }
      return true;
    });
  }

  private async tryAudit(
    user: string,
    action: 'send-report' | 'export-report',
    detail: Record<string, unknown>
  ): Promise<boolean> {
    try {
      await this.auditRepo.log(this.options.logsTable, user, action, detail);
      return true;
    } catch (error) {
      if (!(error instanceof LogError)) throw error;
      logger.error('Report action completed without audit entry', { user, action, error: describeError(error) });
      return false;
    }
  }
}
