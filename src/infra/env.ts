import cron from 'node-cron';
import { z, ZodError } from 'zod';
import { ConfigError } from '../domain/errors.js';
import { MAX_PERIOD_DAYS } from '../domain/serviceDate.js';

const emptyToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalString = z.preprocess(emptyToUndefined, z.string().trim().optional());

const booleanFlag = (fallback: 'true' | 'false') =>
  z
    .preprocess(emptyToUndefined, z.enum(['true', 'false']).default(fallback))
    .transform((value) => value === 'true');

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-CA', { timeZone });
    return true;
  } catch (error) {
    if (error instanceof RangeError) return false;
    throw error;
  }
}

const commaList = z.preprocess(
  emptyToUndefined,
  z
    .string()
    .optional()
    .transform((value) =>
      (value ?? '')
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item.length > 0)
    )
);

/**
 * Environment variable schema with strict validation.
 * Cross-field requirements (per store backend, per scheduled delivery) are checked below
 * so a misconfigured deployment fails at startup instead of mid-request.
 */
const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.coerce.number().int().default(3000),

    // Logging
    LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
    LOG_FILE: optionalString,

    APP_TIMEZONE: z
      .string()
      .trim()
      .min(1)
      .default('Asia/Dubai')
      .refine(isValidTimeZone, { message: 'must be an IANA time zone such as Asia/Dubai' }),

    // Backing store
    STORE_BACKEND: z.enum(['database', 'sheets']).default('database'),
    DATABASE_CLIENT: z.enum(['better-sqlite3', 'pg']).default('better-sqlite3'),
    DATABASE_URL: z.string().min(1).default('./data/intake.db'),

    GOOGLE_SERVICE_ACCOUNT_EMAIL: optionalString,
    GOOGLE_PRIVATE_KEY: z.preprocess(
      emptyToUndefined,
      z
        .string()
        .optional()
        .transform((value) => value?.replace(/\\n/g, '\n'))
    ),
    GOOGLE_SPREADSHEET_ID: optionalString,
    GOOGLE_SHEET_URL: optionalString,

    DATA_TABLE: z.string().min(1).default('Data'),
    LOGS_TABLE: z.string().min(1).default('Logs'),
    REFERENCE_TABLE: z.string().min(1).default('Reference'),

    // Read cache and retry policy
    CACHE_TTL_SECONDS: z.coerce.number().int().min(0).default(60),
    STORE_RETRY_ATTEMPTS: z.coerce
      .number()
      .int()
      .min(1, { message: 'STORE_RETRY_ATTEMPTS must be at least 1' })
      .default(5),
    STORE_RETRY_MAX_DELAY_SECONDS: z.coerce.number().min(0).default(10),

    VALIDATE_EMIRATES_ID: booleanFlag('false'),
    SEED_REFERENCE: booleanFlag('true'),

    // Caller identity
    AUTH_USER_HEADER: z.string().min(1).default('x-intake-user').transform((value) => value.toLowerCase()),
    ALLOWED_USERS: commaList,

    // WhatsApp Cloud API delivery
    WHATSAPP_ACCESS_TOKEN: optionalString,
    WHATSAPP_PHONE_NUMBER_ID: optionalString,
    WHATSAPP_API_BASE_URL: z.string().url().default('https://graph.facebook.com'),
    WHATSAPP_API_VERSION: z.string().default('v20.0'),
    REPORT_RECIPIENTS: commaList,

    // Scheduled report
    REPORT_SCHEDULE: optionalString,
    REPORT_PERIOD_DAYS: z.coerce
      .number()
      .int()
      .min(1, { message: 'REPORT_PERIOD_DAYS must be at least 1' })
      .max(MAX_PERIOD_DAYS, { message: `REPORT_PERIOD_DAYS must be at most ${MAX_PERIOD_DAYS}` })
      .default(7),

    // Rate limiting (API)
    RATE_LIMIT_WINDOW_MS: z.coerce.number().int().default(60000),
    RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().default(120),
  })
  .superRefine((env, ctx) => {
    if (env.STORE_BACKEND === 'sheets') {
      if (!env.GOOGLE_SERVICE_ACCOUNT_EMAIL) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['GOOGLE_SERVICE_ACCOUNT_EMAIL'],
          message: 'required when STORE_BACKEND=sheets',
        });
      }
      if (!env.GOOGLE_PRIVATE_KEY) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['GOOGLE_PRIVATE_KEY'],
          message: 'required when STORE_BACKEND=sheets',
        });
      }
      if (!env.GOOGLE_SPREADSHEET_ID && !extractSpreadsheetId(env.GOOGLE_SHEET_URL)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['GOOGLE_SPREADSHEET_ID'],
          message: 'GOOGLE_SPREADSHEET_ID or a GOOGLE_SHEET_URL containing /spreadsheets/d/<id> is required',
        });
      }
    }

    if (env.REPORT_SCHEDULE) {
      if (!cron.validate(env.REPORT_SCHEDULE)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['REPORT_SCHEDULE'],
          message: `invalid cron expression "${env.REPORT_SCHEDULE}"`,
        });
      }
      for (const key of ['WHATSAPP_ACCESS_TOKEN', 'WHATSAPP_PHONE_NUMBER_ID'] as const) {
        if (!env[key]) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [key],
            message: 'required when REPORT_SCHEDULE is set',
          });
        }
      }
      if (env.REPORT_RECIPIENTS.length === 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['REPORT_RECIPIENTS'],
          message: 'at least one recipient is required when REPORT_SCHEDULE is set',
        });
      }
    }
  });

export type Env = z.infer<typeof envSchema>;

/**
 * Pull the spreadsheet id out of a Google Sheets URL
 */
export function extractSpreadsheetId(url: string | undefined): string | null {
  if (!url) return null;
  const match = /\/spreadsheets\/d\/([a-zA-Z0-9-_]+)/.exec(url);
  return match ? match[1] : null;
}

/**
 * Parses environment variables, throwing ConfigError with every issue found
 */
export function parseEnv(source: Record<string, string | undefined>): Env {
  try {
    return envSchema.parse(source);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigError(
        'Environment validation failed',
        error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      );
    }
    throw error;
  }
}

/**
 * Validates and parses environment variables
 * Exits process with code 1 if validation fails (fail-fast principle)
 */
export function validateEnv(): Env {
  try {
    return parseEnv(process.env);
  } catch (error) {
    if (error instanceof ConfigError && Array.isArray(error.details)) {
      console.error('❌ Environment validation failed:');
      error.details.forEach((issue) => {
        console.error(`  - ${String(issue)}`);
      });
      console.error('\nCheck .env.example for required variables');
      process.exit(1);
    }
    throw error;
  }
}
