/**
 * AuditEntry entity - immutable audit log record.
 * Records who did what, when, with an action-specific detail payload.
 */
export interface AuditEntry {
  timestamp: string;
  user: string;
  action: AuditAction;
  detail: Record<string, unknown> | null;
}

export type AuditAction = 'submit' | 'override-submit' | 'send-report' | 'export-report';

export const AUDIT_ACTIONS: readonly AuditAction[] = [
  'submit',
  'override-submit',
  'send-report',
  'export-report',
];

export const LOG_HEADERS = ['TS', 'User', 'Action', 'DetailsJSON'] as const;

export interface SubmitAuditDetail extends Record<string, unknown> {
  serviceDate: string;
  memberId: string;
  erxNumber: string;
  netAmount: string;
  override: boolean;
}

export interface SendReportAuditDetail extends Record<string, unknown> {
  rowCount: number;
  periodDays: number;
}

export function isAuditAction(value: string): value is AuditAction {
  return AUDIT_ACTIONS.some((action) => action === value);
}

/**
 * Factory function to create a new AuditEntry stamped with the current time
 */
export function createAuditEntry(params: {
  user: string;
  action: AuditAction;
  detail?: Record<string, unknown>;
  now?: Date;
}): AuditEntry {
  return {
    timestamp: (params.now ?? new Date()).toISOString(),
    user: params.user,
    action: params.action,
    detail: params.detail ?? null,
  };
}

export function auditEntryToRow(entry: AuditEntry): string[] {
  return [
    entry.timestamp,
    entry.user,
    entry.action,
    entry.detail ? JSON.stringify(entry.detail) : '',
  ];
}
