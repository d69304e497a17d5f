import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { IntakeService } from '../services/IntakeService.js';
import { currentUser } from './auth.js';
import { bodyBoolean } from './query.js';

/**
 * Intake route handler
 */
export function createIntakeRouter(intakeService: IntakeService): Router {
  const router = Router();

  /**
   * POST /api/intake - Submit one intake record
   * Body: submission fields plus optional `override` to accept a probable duplicate
   */
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body: unknown = req.body;
      const override =
        body !== null && typeof body === 'object' && 'override' in body ? bodyBoolean(body.override) : false;

      const result = await intakeService.submit(body, currentUser(res), { override });
      res.status(201).json(result);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
