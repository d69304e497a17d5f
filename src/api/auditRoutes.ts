import { Router } from 'express';
import type { AuditRepository } from '../infra/repositories/AuditRepository.js';
import type { Request, Response, NextFunction } from 'express';
import { queryPositiveInt } from './query.js';

const MAX_LIMIT = 500;

/**
 * Audit route handler
 */
export function createAuditRouter(auditRepo: AuditRepository, logsTable: string): Router {
  const router = Router();

  /**
   * GET /api/audit - Get recent audit events, newest first
   */
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const limit = Math.min(queryPositiveInt(req.query.limit, 'limit', 100), MAX_LIMIT);
      const events = await auditRepo.getRecent(logsTable, limit);
      res.json({ events });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
