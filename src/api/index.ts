import { Router } from 'express';
import { createIntakeRouter } from './intakeRoutes.js';
import { createRecordRouter } from './recordRoutes.js';
import { createReportRouter } from './reportRoutes.js';
import { createReferenceRouter } from './referenceRoutes.js';
import { createAuditRouter } from './auditRoutes.js';
import { createRequireUser } from './auth.js';
import { createRateLimiter } from '../infra/rateLimiter.js';
import type { IntakeService } from '../services/IntakeService.js';
import type { ReportService } from '../services/ReportService.js';
import type { ReferenceService } from '../services/ReferenceService.js';
import type { AuditRepository } from '../infra/repositories/AuditRepository.js';

export interface ApiDependencies {
  intakeService: IntakeService;
  reportService: ReportService;
  referenceService: ReferenceService;
  auditRepo: AuditRepository;
  logsTable: string;
  reportPeriodDays: number;
  auth: { header: string; allowedUsers: string[] };
  rateLimit: { windowMs: number; max: number };
}

/**
 * Main API router - composes all route handlers.
 * Every route requires a caller identity; limits are counted per caller.
 */
export function createApiRouter(deps: ApiDependencies): Router {
  const router = Router();

  router.use(createRequireUser(deps.auth));
  router.use(createRateLimiter(deps.rateLimit));

  router.use('/intake', createIntakeRouter(deps.intakeService));
  router.use('/records', createRecordRouter(deps.reportService));
  router.use('/reports', createReportRouter(deps.reportService, deps.reportPeriodDays));
  router.use('/reference', createReferenceRouter(deps.referenceService));
  router.use('/audit', createAuditRouter(deps.auditRepo, deps.logsTable));

  return router;
}
