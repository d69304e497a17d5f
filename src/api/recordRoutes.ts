import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { RecordFilters, ReportService } from '../services/ReportService.js';
import { CSV_MIME_TYPE } from '../services/ReportService.js';
import { currentUser } from './auth.js';
import { queryString } from './query.js';

export function parseRecordFilters(query: Request['query']): RecordFilters {
  return {
    q: queryString(query.q),
    erx: queryString(query.erx),
    memberId: queryString(query.memberId),
    emiratesId: queryString(query.emiratesId),
    patientName: queryString(query.patientName),
    insurance: queryString(query.insurance),
    from: queryString(query.from),
    to: queryString(query.to),
  };
}

/**
 * Record search and export route handler
 */
export function createRecordRouter(reportService: ReportService): Router {
  const router = Router();

  /**
   * GET /api/records - Search submitted records
   */
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const records = await reportService.search(parseRecordFilters(req.query));
      res.json({ records, count: records.length });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/records/export - Download the filtered records as CSV
   */
  router.get('/export', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const file = await reportService.exportCsv(parseRecordFilters(req.query), currentUser(res));
      res
        .status(200)
        .type(CSV_MIME_TYPE)
        .attachment(file.filename)
        .set('X-Row-Count', String(file.rowCount))
        .send(file.csv);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
