import type { ChatAdapter } from '../infra/chat/ChatAdapter.js';
import type { ReportKind } from '../infra/reports/index.js';
import type { CommandEvent, InboundEvent, TextEvent } from '../domain/entities/InboundEvent.js';
import type { DialogService } from './DialogService.js';
import type { SummaryService } from './SummaryService.js';
import { REPORT_FAILED_MESSAGE, type ReportService } from './ReportService.js';
import { logger } from '../infra/logger.js';

export const BOT_COMMANDS = [
  { command: 'add', description: 'record an income or expense' },
  { command: 'summary', description: 'totals for the current month' },
  { command: 'get_latest_report', description: 'full transactions report' },
  { command: 'get_weekly_expense', description: 'expenses of the last 7 days' },
  { command: 'cancel', description: 'abandon the transaction being entered' },
] as const;

export const ROUTER_MESSAGES = {
  unauthorized: 'You are not authorized to use this bot.',
  notUnderstood: "I don't understand that command.",
  cancelled: 'Transaction entry cancelled.',
  nothingToCancel: 'Nothing to cancel.',
  help: [
    'Available commands:',
    ...BOT_COMMANDS.map(({ command, description }) => `/${command} - ${description}`),
  ].join('\n'),
} as const;

const REPORT_COMMANDS: Record<string, ReportKind> = {
  get_latest_report: 'latest',
  get_weekly_expense: 'weekly_expense',
};

export interface UpdateRouterDeps {
  allowedUserId: number;
  chat: ChatAdapter;
  dialogService: DialogService;
  summaryService: SummaryService;
  reportService: ReportService;
  now?: () => Date;
}

/**
 * UpdateRouter - entry point for every inbound event.
 * Authorization first, then commands, then the dialog in progress.
 * Events are expected one at a time, in delivery order.
 */
export class UpdateRouter {
  private now: () => Date;

  constructor(private deps: UpdateRouterDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async handle(event: InboundEvent): Promise<void> {
    if (event.userId !== this.deps.allowedUserId) {
      logger.warn('Rejected event from unauthorized user', { userId: event.userId, kind: event.kind });
      await this.deps.chat.sendText(event.chatId, ROUTER_MESSAGES.unauthorized);
      return;
    }

    switch (event.kind) {
      case 'command':
        await this.handleCommand(event);
        return;
      case 'text':
        await this.handleText(event);
        return;
      case 'selection': {
        const outcome = await this.deps.dialogService.handle(event);
        if (outcome === 'no_dialog' || outcome === 'ignored') {
          logger.debug('Selection ignored', { userId: event.userId, outcome });
        }
        return;
      }
    }
  }

  private async handleCommand(event: CommandEvent): Promise<void> {
    const { chat, dialogService, summaryService } = this.deps;

    switch (event.command) {
      case 'add':
        await dialogService.start(event.userId, event.chatId);
        return;
      case 'summary': {
        const result = summaryService.computeMonthlySummary(this.now());
        await chat.sendText(event.chatId, result.text);
        return;
      }
      case 'get_latest_report':
      case 'get_weekly_expense':
        await this.runReport(event.chatId, REPORT_COMMANDS[event.command]);
        return;
      case 'cancel':
        await chat.sendText(
          event.chatId,
          dialogService.cancel(event.userId)
            ? ROUTER_MESSAGES.cancelled
            : ROUTER_MESSAGES.nothingToCancel
        );
        return;
      case 'start':
      case 'help':
        await chat.sendText(event.chatId, ROUTER_MESSAGES.help);
        return;
      default:
        // Unknown commands are ordinary text to the dialog
        await this.handleText({
          kind: 'text',
          userId: event.userId,
          chatId: event.chatId,
          text: event.text,
        });
    }
  }

  private async handleText(event: TextEvent): Promise<void> {
    const outcome = await this.deps.dialogService.handle(event);
    if (outcome === 'no_dialog') {
      await this.deps.chat.sendText(event.chatId, ROUTER_MESSAGES.notUnderstood);
    }
  }

  private async runReport(chatId: number, kind: ReportKind): Promise<void> {
    let text: string;
    try {
      text = await this.deps.reportService.run(kind);
    } catch (error) {
      logger.warn('Report request failed', { kind, error });
      text = REPORT_FAILED_MESSAGE;
    }
    await this.deps.chat.sendText(chatId, text);
  }
}
