import cron, { type ScheduledTask } from 'node-cron';
import { logger } from '../infra/logger.js';
import type { ReportService } from '../services/ReportService.js';
import { ConfigError } from '../domain/errors.js';

export const SCHEDULER_USER = 'scheduler';

/**
 * ReportScheduler - sends the period report on a cron schedule.
 * Failures are logged; the next tick tries again.
 */
export class ReportScheduler {
  private task: ScheduledTask | null = null;
  private isPaused = false;
  private running = false;

  constructor(
    private reportService: ReportService,
    private schedule: string,
    private periodDays: number,
    private timeZone?: string
  ) {}

  pause(): void {
    this.isPaused = true;
    logger.info('ReportScheduler paused');
  }

  resume(): void {
    this.isPaused = false;
    logger.info('ReportScheduler resumed');
  }

  start(): void {
    if (!cron.validate(this.schedule)) {
      throw new ConfigError(`REPORT_SCHEDULE is not a valid cron expression: ${this.schedule}`);
    }

    this.task = cron.schedule(
      this.schedule,
      async () => {
        await this.runOnce();
      },
      { timezone: this.timeZone }
    );

    logger.info('ReportScheduler started', {
      schedule: this.schedule,
      periodDays: this.periodDays,
      timeZone: this.timeZone,
    });
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      logger.info('ReportScheduler stopped');
    }
  }

  /**
   * One scheduled send; empty periods are skipped
   */
  async runOnce(): Promise<void> {
    if (this.isPaused) {
      logger.info('Scheduled report skipped - scheduler is paused');
      return;
    }
    if (this.running) {
      logger.warn('Scheduled report skipped - previous run still in progress');
      return;
    }

    this.running = true;
    try {
      const result = await this.reportService.sendReport(SCHEDULER_USER, this.periodDays, {
        skipEmpty: true,
      });
      logger.info('Scheduled report finished', { sent: result.sent, rowCount: result.rowCount });
    } catch (error) {
      logger.error('Scheduled report failed', {
        periodDays: this.periodDays,
        error: error instanceof Error ? error.message : String(error),
      });
    } finally {
      this.running = false;
    }
  }
}

/**
 * Factory function to create and start scheduler
 */
export function startReportScheduler(
  reportService: ReportService,
  schedule: string,
  periodDays: number,
  timeZone?: string
): ReportScheduler {
  const scheduler = new ReportScheduler(reportService, schedule, periodDays, timeZone);
  scheduler.start();
  return scheduler;
}
