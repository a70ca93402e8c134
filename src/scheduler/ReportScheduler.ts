import cron, { type ScheduledTask } from 'node-cron';
import { logger } from '../infra/logger.js';
import type { ChatAdapter } from '../infra/chat/ChatAdapter.js';
import type { ReportService } from '../services/ReportService.js';

/**
 * ReportScheduler - pushes the weekly expense report to the authorized user on a cron schedule.
 * Private chats share their id with the user, so the report goes to ALLOWED_USER_ID.
 */
export class ReportScheduler {
  private task: ScheduledTask | null = null;

  constructor(
    private cronExpression: string,
    private chatId: number,
    private reportService: ReportService,
    private chat: ChatAdapter
  ) {}

  start(): void {
    if (this.task) return;

    this.task = cron.schedule(this.cronExpression, async () => {
      await this.pushWeeklyReport();
    });

    logger.info('ReportScheduler started', { cronExpression: this.cronExpression });
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      logger.info('ReportScheduler stopped');
    }
  }

  /**
   * Runs one scheduled push. Failures are logged and the schedule keeps going.
   */
  async pushWeeklyReport(): Promise<boolean> {
    try {
      const text = await this.reportService.run('weekly_expense');
      const delivered = await this.chat.sendText(this.chatId, text);
      logger.info('Scheduled weekly report pushed', { delivered });
      return delivered;
    } catch (error) {
      logger.error('Scheduled weekly report failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }
}
