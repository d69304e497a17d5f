import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { ReportService } from '../services/ReportService.js';
import { CSV_MIME_TYPE } from '../services/ReportService.js';
import { ValidationError } from '../domain/errors.js';
import { currentUser } from './auth.js';
import { bodyBoolean, queryPositiveInt } from './query.js';
import { parseRecordFilters } from './recordRoutes.js';

/**
 * Period report route handler
 */
export function createReportRouter(reportService: ReportService, defaultPeriodDays: number): Router {
  const router = Router();

  /**
   * GET /api/reports/preview - Row count and date range for a period, without the file
   */
  router.get('/preview', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const periodDays = queryPositiveInt(req.query.periodDays, 'periodDays', defaultPeriodDays);
      const report = await reportService.buildReport(periodDays);
      res.json({
        periodDays,
        rowCount: report.rowCount,
        startDate: report.startDate,
        endDate: report.endDate,
        filename: report.filename,
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/reports/summary - Row counts and Net totals by service date and insurance
   */
  router.get('/summary', async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await reportService.summary(parseRecordFilters(req.query)));
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/reports/download - Period report as a CSV attachment
   */
  router.get('/download', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const periodDays = queryPositiveInt(req.query.periodDays, 'periodDays', defaultPeriodDays);
      const report = await reportService.buildReport(periodDays);
      res
        .status(200)
        .type(CSV_MIME_TYPE)
        .attachment(report.filename)
        .set('X-Row-Count', String(report.rowCount))
        .send(report.csv);
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/reports/send - Deliver the period report to the configured recipients
   */
  router.post('/send', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body: unknown = req.body ?? {};
      let periodDays = defaultPeriodDays;
      let skipEmpty = false;

      if (body !== null && typeof body === 'object') {
        if ('periodDays' in body && body.periodDays !== undefined) {
          const value = body.periodDays;
          if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
            throw new ValidationError('periodDays must be a positive whole number', { fields: ['periodDays'] });
          }
          periodDays = value;
        }
        if ('skipEmpty' in body) {
          skipEmpty = bodyBoolean(body.skipEmpty);
        }
      }

      const result = await reportService.sendReport(currentUser(res), periodDays, { skipEmpty });
      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
