import { z } from 'zod';

/**
 * IntakeRecord entity - one patient-service submission.
 * Write-once: appended to the data table and never updated in place.
 */
export interface IntakeRecord {
  timestamp: string; // ISO-8601, assigned at append time
  serviceDate: string; // YYYY-MM-DD
  patientName: string;
  emiratesId: string;
  insurance: string;
  memberId: string;
  policyNumber: string;
  erxNumber: string;
  payer: string;
  clinician: string | null;
  netAmount: string; // two decimals, e.g. "150.00"
  remarks: string | null;
  enteredBy: string;
}

/**
 * Column order of the data table. Changing it breaks existing sheets.
 */
export const DATA_HEADERS = [
  'Timestamp',
  'ServiceDate',
  'PatientName',
  'EmiratesID',
  'Insurance',
  'MemberID',
  'PolicyNumber',
  'ERXNumber',
  'Payer',
  'Clinician',
  'Net',
  'Remarks',
  'EnteredBy',
] as const;

export type DataHeader = (typeof DATA_HEADERS)[number];

/**
 * A row as read back from any backing store: header name -> cell text
 */
export type StoredRow = Record<string, string>;

const text = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? undefined : String(value).trim()));

/**
 * Shape of a submission as received from a client. Requiredness is checked by the
 * intake service so that every missing field can be named at once.
 */
export const intakeSubmissionSchema = z.object({
  serviceDate: text,
  patientName: text,
  emiratesId: text,
  insurance: text,
  memberId: text,
  policyNumber: text,
  erx: text,
  payer: text,
  clinician: text,
  net: text,
  remarks: text,
});

export type IntakeSubmission = z.input<typeof intakeSubmissionSchema>;
export type ParsedSubmission = z.output<typeof intakeSubmissionSchema>;

const DECIMAL = /^\d+(\.\d+)?$/;

/**
 * Parse a net amount from user input or a stored cell.
 * Returns null for anything that is not a plain non-negative decimal.
 */
export function parseNetAmount(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) && value >= 0 ? value : null;
  }
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  if (!DECIMAL.test(trimmed)) return null;
  return Number(trimmed);
}

export function formatNetAmount(value: number): string {
  return value.toFixed(2);
}

/**
 * Integer cents, so that "150", "150.0" and "150.00" compare equal
 */
export function toCents(value: unknown): number | null {
  const amount = parseNetAmount(value);
  return amount === null ? null : Math.round(amount * 100);
}

export function createIntakeRecord(params: {
  timestamp: Date;
  serviceDate: string;
  patientName?: string;
  emiratesId?: string;
  insurance?: string;
  memberId: string;
  policyNumber?: string;
  erxNumber: string;
  payer?: string;
  clinician?: string;
  netAmount: number;
  remarks?: string;
  enteredBy: string;
}): IntakeRecord {
  return {
    timestamp: params.timestamp.toISOString(),
    serviceDate: params.serviceDate,
    patientName: params.patientName ?? '',
    emiratesId: params.emiratesId ?? '',
    insurance: params.insurance ?? '',
    memberId: params.memberId,
    policyNumber: params.policyNumber ?? '',
    erxNumber: params.erxNumber,
    payer: params.payer ?? '',
    clinician: params.clinician ? params.clinician : null,
    netAmount: formatNetAmount(params.netAmount),
    remarks: params.remarks ? params.remarks : null,
    enteredBy: params.enteredBy,
  };
}

/**
 * Cell values in DATA_HEADERS order
 */
export function recordToRow(record: IntakeRecord): string[] {
  const byHeader: Record<DataHeader, string> = {
    Timestamp: record.timestamp,
    ServiceDate: record.serviceDate,
    PatientName: record.patientName,
    EmiratesID: record.emiratesId,
    Insurance: record.insurance,
    MemberID: record.memberId,
    PolicyNumber: record.policyNumber,
    ERXNumber: record.erxNumber,
    Payer: record.payer,
    Clinician: record.clinician ?? '',
    Net: record.netAmount,
    Remarks: record.remarks ?? '',
    EnteredBy: record.enteredBy,
  };
  return DATA_HEADERS.map((header) => byHeader[header]);
}

export function rowToRecord(row: StoredRow): IntakeRecord {
  const cell = (header: DataHeader) => row[header] ?? '';
  return {
    timestamp: cell('Timestamp'),
    serviceDate: cell('ServiceDate'),
    patientName: cell('PatientName'),
    emiratesId: cell('EmiratesID'),
    insurance: cell('Insurance'),
    memberId: cell('MemberID'),
    policyNumber: cell('PolicyNumber'),
    erxNumber: cell('ERXNumber'),
    payer: cell('Payer'),
    clinician: cell('Clinician') || null,
    netAmount: cell('Net'),
    remarks: cell('Remarks') || null,
    enteredBy: cell('EnteredBy'),
  };
}

const EMIRATES_ID = /^784-?\d{4}-?\d{7}-?\d$/;

export function isValidEmiratesId(value: string): boolean {
  return EMIRATES_ID.test(value);
}
