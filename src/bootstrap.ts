import type { Bot } from 'grammy';
import { loadEnv, type Env } from './infra/env.js';
import { createLogger, logger, setLogger } from './infra/logger.js';
import { DatabaseAdapter } from './infra/DatabaseAdapter.js';
import { TransactionRepository } from './infra/repositories/TransactionRepository.js';
import { TelegramChatAdapter } from './infra/chat/TelegramChatAdapter.js';
import type { ChatAdapter } from './infra/chat/ChatAdapter.js';
import { createReportGenerators } from './infra/reports/index.js';
import { DialogSessionStore } from './services/DialogSessionStore.js';
import { DialogService } from './services/DialogService.js';
import { SummaryService } from './services/SummaryService.js';
import { ReportService } from './services/ReportService.js';
import { BOT_COMMANDS, UpdateRouter } from './services/UpdateRouter.js';
import { ReportScheduler } from './scheduler/ReportScheduler.js';
import { createBot, registerHandlers } from './bot/createBot.js';
import {
  AppError,
  ConfigError,
  DatabaseError,
  TransportError,
  isAppError,
} from './domain/errors.js';

export interface AppContext {
  env: Env;
  db: DatabaseAdapter;
  bot: Bot;
  chat: ChatAdapter;
  transactionRepo: TransactionRepository;
  router: UpdateRouter;
  scheduler: ReportScheduler | null;
}

export type InitResult = { ok: true; context: AppContext } | { ok: false; error: AppError };

function asAppError(error: unknown, fallback: (details: unknown) => AppError): AppError {
  return isAppError(error) ? error : fallback({ error });
}

/**
 * Builds every collaborator in dependency order.
 * Any failure comes back as a result so the caller can halt before polling starts.
 */
export async function initialize(source: NodeJS.ProcessEnv = process.env): Promise<InitResult> {
  const envResult = loadEnv(source);
  if (!envResult.ok) {
    return envResult;
  }
  const env = envResult.env;

  setLogger(createLogger(env));

  let db: DatabaseAdapter;
  try {
    db = new DatabaseAdapter(env.DB_PATH);
  } catch (error) {
    return {
      ok: false,
      error: asAppError(error, (details) => new DatabaseError('Failed to open database', details)),
    };
  }

  const transactionRepo = new TransactionRepository(db);

  let reportService: ReportService;
  try {
    reportService = new ReportService(createReportGenerators(env, transactionRepo));
  } catch (error) {
    db.close();
    return {
      ok: false,
      error: asAppError(error, (details) => new ConfigError('Invalid report configuration', details)),
    };
  }

  const bot = createBot(env.API_TOKEN);
  try {
    // getMe: rejects an invalid credential
    await bot.init();
  } catch (error) {
    db.close();
    return {
      ok: false,
      error: new TransportError('Bot credential rejected or Telegram unreachable', { error }),
    };
  }
  logger.info('Authorized on account', { username: bot.botInfo.username });

  try {
    await bot.api.setMyCommands([...BOT_COMMANDS]);
  } catch (error) {
    logger.warn('Failed to publish command list', { error });
  }

  const chat = new TelegramChatAdapter(bot.api);
  const dialogService = new DialogService(
    new DialogSessionStore(),
    transactionRepo,
    chat,
    env.CATEGORIES
  );
  const router = new UpdateRouter({
    allowedUserId: env.ALLOWED_USER_ID,
    chat,
    dialogService,
    summaryService: new SummaryService(transactionRepo),
    reportService,
  });
  registerHandlers(bot, router);

  const scheduler = env.WEEKLY_REPORT_CRON
    ? new ReportScheduler(env.WEEKLY_REPORT_CRON, env.ALLOWED_USER_ID, reportService, chat)
    : null;

  logger.info('Bot initialized', {
    categories: env.CATEGORIES.length,
    weeklyReportCron: env.WEEKLY_REPORT_CRON ?? null,
  });

  return {
    ok: true,
    context: { env, db, bot, chat, transactionRepo, router, scheduler },
  };
}
