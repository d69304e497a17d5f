import dotenv from 'dotenv';
import { validateEnv } from './infra/env.js';
import { createLogger, setLogger } from './infra/logger.js';
import { createBackingStore } from './infra/store/createBackingStore.js';
import { CachedReader } from './infra/CachedReader.js';
import { duplicateDetector } from './infra/DuplicateDetector.js';
import { AuditRepository } from './infra/repositories/AuditRepository.js';
import { WhatsAppAdapter, whatsAppConfigFromEnv } from './infra/WhatsAppAdapter.js';
import { IntakeService } from './services/IntakeService.js';
import { ReportService } from './services/ReportService.js';
import { ReferenceService } from './services/ReferenceService.js';
import { startReportScheduler, type ReportScheduler } from './scheduler/ReportScheduler.js';
import { createApp } from './app.js';
import { describeError } from './domain/errors.js';

// Load environment variables
dotenv.config();

// Validate environment (fail-fast)
const env = validateEnv();

// Initialize logger
const loggerInstance = createLogger(env);
setLogger(loggerInstance);

const retry = {
  attempts: env.STORE_RETRY_ATTEMPTS,
  maxDelaySeconds: env.STORE_RETRY_MAX_DELAY_SECONDS,
};

// Initialize infrastructure adapters
const store = createBackingStore(env);
const reader = new CachedReader(store, {
  ttlSeconds: env.CACHE_TTL_SECONDS,
  retryAttempts: retry.attempts,
  retryMaxDelaySeconds: retry.maxDelaySeconds,
});
const auditRepo = new AuditRepository(store, reader, retry);
const whatsApp = new WhatsAppAdapter(whatsAppConfigFromEnv(env));

// Initialize services
const intakeService = new IntakeService(store, reader, duplicateDetector, auditRepo, {
  dataTable: env.DATA_TABLE,
  logsTable: env.LOGS_TABLE,
  timeZone: env.APP_TIMEZONE,
  validateEmiratesId: env.VALIDATE_EMIRATES_ID,
  retry,
});
const reportService = new ReportService(reader, auditRepo, whatsApp, {
  dataTable: env.DATA_TABLE,
  logsTable: env.LOGS_TABLE,
  timeZone: env.APP_TIMEZONE,
});
const referenceService = new ReferenceService(store, reader, env.REFERENCE_TABLE);

// Prepare tables before accepting requests
await intakeService.ensureSchema();
await referenceService.ensureSchema();
if (env.SEED_REFERENCE) {
  try {
    await referenceService.seedDefaults();
  } catch (error) {
    loggerInstance.warn('Reference seeding failed, defaults will be served', { error: describeError(error) });
  }
}

const app = createApp({
  intakeService,
  reportService,
  referenceService,
  auditRepo,
  reader,
  dataTable: env.DATA_TABLE,
  logsTable: env.LOGS_TABLE,
  reportPeriodDays: env.REPORT_PERIOD_DAYS,
  auth: { header: env.AUTH_USER_HEADER, allowedUsers: env.ALLOWED_USERS },
  rateLimit: { windowMs: env.RATE_LIMIT_WINDOW_MS, max: env.RATE_LIMIT_MAX_REQUESTS },
  env,
});

let scheduler: ReportScheduler | null = null;

// Start server
const server = app.listen(env.PORT, () => {
  loggerInstance.info('Server started', {
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
    store: store.backendName,
  });

  if (env.REPORT_SCHEDULE) {
    scheduler = startReportScheduler(reportService, env.REPORT_SCHEDULE, env.REPORT_PERIOD_DAYS, env.APP_TIMEZONE);
  }
});

// Graceful shutdown
process.on('SIGTERM', () => {
  loggerInstance.info('SIGTERM received, shutting down gracefully');
  scheduler?.stop();
  server.close(() => {
    store
      .close()
      .then(() => {
        loggerInstance.info('Server closed');
        process.exit(0);
      })
      .catch((error: unknown) => {
        loggerInstance.error('Failed to close backing store', { error: describeError(error) });
        process.exit(1);
      });
  });
});

export { app };
