import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { ReferenceService } from '../services/ReferenceService.js';
import { isReferenceCategory } from '../domain/entities/ReferenceOption.js';
import { NotFoundError } from '../domain/errors.js';

export function createReferenceRouter(referenceService: ReferenceService): Router {
  const router = Router();

  /**
   * GET /api/reference - Dropdown options for every category
   */
  router.get('/', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await referenceService.getAll());
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/reference/:category - Options for one category (payer, insurance, clinician)
   */
  router.get('/:category', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { category } = req.params;
      if (!isReferenceCategory(category)) {
        throw new NotFoundError('Reference category', category);
      }
      res.json({ category, options: await referenceService.getOptions(category) });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
