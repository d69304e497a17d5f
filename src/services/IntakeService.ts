import type { BackingStore } from '../infra/store/BackingStore.js';
import type { CachedReader } from '../infra/CachedReader.js';
import type { AuditRepository } from '../infra/repositories/AuditRepository.js';
import type { DuplicateDetector } from '../infra/DuplicateDetector.js';
import { withRetry, type RetryPolicy } from '../infra/retry.js';
import { logger } from '../infra/logger.js';
import {
  DATA_HEADERS,
  createIntakeRecord,
  intakeSubmissionSchema,
  isValidEmiratesId,
  parseNetAmount,
  recordToRow,
  type IntakeRecord,
  type ParsedSubmission,
} from '../domain/entities/IntakeRecord.js';
import type { SubmitAuditDetail } from '../domain/entities/AuditEntry.js';
import { parseServiceDate, todayIn } from '../domain/serviceDate.js';
import {
  DuplicateRejectedError,
  LogError,
  StoreError,
  ValidationError,
  describeError,
} from '../domain/errors.js';

const REQUIRED_FIELDS = ['erx', 'memberId', 'net'] as const;

export interface IntakeServiceOptions {
  dataTable: string;
  logsTable: string;
  timeZone: string;
  validateEmiratesId: boolean;
  retry: Omit<RetryPolicy, 'shouldRetry'>;
  now?: () => Date;
}

export interface SubmitOptions {
  override?: boolean;
}

export interface SubmitResult {
  record: IntakeRecord;
  /** True when a duplicate was found and accepted because override was set */
  override: boolean;
  duplicateDetected: boolean;
  auditLogged: boolean;
  auditError?: string;
}

type ValidSubmission = {
  fields: ParsedSubmission;
  erx: string;
  memberId: string;
  netAmount: number;
  serviceDate: string;
};

/**
 * IntakeService - runs one submission through
 * validate -> duplicate check -> append -> audit -> cache invalidation.
 * Nothing is written unless validation and the duplicate check pass.
 */
export class IntakeService {
  private now: () => Date;

  constructor(
    private store: BackingStore,
    private reader: CachedReader,
    private duplicates: DuplicateDetector,
    private auditRepo: AuditRepository,
    private options: IntakeServiceOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Create the data table or add missing columns. Run once at startup.
   */
  async ensureSchema(): Promise<void> {
    await this.store.ensureSchema(this.options.dataTable, DATA_HEADERS);
  }

  async submit(input: unknown, user: string, options: SubmitOptions = {}): Promise<SubmitResult> {
    const submission = this.validate(input);
    const { dataTable, logsTable } = this.options;

    const existing = await this.reader.read(dataTable);
    const duplicate = this.duplicates.findDuplicate(existing, {
      erx: submission.erx,
      memberId: submission.memberId,
      netAmount: submission.netAmount,
      serviceDate: submission.serviceDate,
    });

    if (duplicate && !options.override) {
      logger.info('Submission rejected as duplicate', {
        user,
        erx: submission.erx,
        serviceDate: submission.serviceDate,
      });
      throw new DuplicateRejectedError({
        erx: submission.erx,
        memberId: submission.memberId,
        netAmount: submission.netAmount.toFixed(2),
        serviceDate: submission.serviceDate,
      });
    }

    const { fields } = submission;
    const record = createIntakeRecord({
      timestamp: this.now(),
      serviceDate: submission.serviceDate,
      patientName: fields.patientName,
      emiratesId: fields.emiratesId,
      insurance: fields.insurance,
      memberId: submission.memberId,
      policyNumber: fields.policyNumber,
      erxNumber: submission.erx,
      payer: fields.payer,
      clinician: fields.clinician,
      netAmount: submission.netAmount,
      remarks: fields.remarks,
      enteredBy: user,
    });

    // A rate-limited append was refused by the store, so retrying it cannot create a second row
    await withRetry(`append ${dataTable}`, () => this.store.appendRow(dataTable, recordToRow(record)), {
      ...this.options.retry,
      shouldRetry: (error) => error instanceof StoreError && error.reason === 'rate_limited',
    });

    const override = duplicate !== null;
    const detail: SubmitAuditDetail = {
      serviceDate: record.serviceDate,
      memberId: record.memberId,
      erxNumber: record.erxNumber,
      netAmount: record.netAmount,
      override,
    };

    let auditLogged = true;
    let auditError: string | undefined;
    try {
      await this.auditRepo.log(logsTable, user, 'submit', detail);
    } catch (error) {
      if (!(error instanceof LogError)) throw error;
      // The row is already committed; report the missing audit entry instead of failing the submission
      auditLogged = false;
      auditError = error.message;
      logger.error('Submission saved without audit entry', { user, erx: record.erxNumber, error: describeError(error) });
    }

    this.reader.invalidate(dataTable);

    logger.info('Submission accepted', { user, erx: record.erxNumber, override });
    return {
      record,
      override,
      duplicateDetected: duplicate !== null,
      auditLogged,
      ...(auditError ? { auditError } : {}),
    };
  }

  private validate(input: unknown): ValidSubmission {
    const parsed = intakeSubmissionSchema.safeParse(input ?? {});
    if (!parsed.success) {
      throw new ValidationError('Validation: submission has fields of the wrong type', {
        fields: parsed.error.issues.map((issue) => issue.path.join('.')),
      });
    }
    const fields = parsed.data;

    const missing = REQUIRED_FIELDS.filter((field) => !fields[field]);
    if (missing.length > 0) {
      throw new ValidationError(`Validation: missing required fields: ${missing.join(', ')}`, {
        fields: missing,
      });
    }

    const erx = fields.erx ?? '';
    const memberId = fields.memberId ?? '';
    const netAmount = parseNetAmount(fields.net);
    if (netAmount === null) {
      throw new ValidationError('Validation: net must be a non-negative amount', { fields: ['net'] });
    }

    let serviceDate = todayIn(this.options.timeZone, this.now());
    if (fields.serviceDate) {
      const parsedDate = parseServiceDate(fields.serviceDate);
      if (!parsedDate) {
        throw new ValidationError('Validation: serviceDate must be a valid date (YYYY-MM-DD)', {
          fields: ['serviceDate'],
        });
      }
      serviceDate = parsedDate;
    }

    if (this.options.validateEmiratesId && fields.emiratesId && !isValidEmiratesId(fields.emiratesId)) {
      throw new ValidationError('Validation: emiratesId must look like 784-YYYY-NNNNNNN-N', {
        fields: ['emiratesId'],
      });
    }

    return { fields, erx, memberId, netAmount, serviceDate };
  }
}
