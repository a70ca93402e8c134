import type { Env } from '../env.js';
import type { TransactionRepository } from '../repositories/TransactionRepository.js';
import type { ReportGenerator, ReportKind } from './ReportGenerator.js';
import { CommandReportGenerator } from './CommandReportGenerator.js';
import { LedgerReportGenerator } from './LedgerReportGenerator.js';
import { logger } from '../logger.js';

export type ReportGenerators = Record<ReportKind, ReportGenerator>;

/**
 * Picks a generator per report kind: the configured script, or the built-in ledger report
 */
export function createReportGenerators(
  env: Pick<Env, 'LATEST_REPORT_COMMAND' | 'WEEKLY_EXPENSE_REPORT_COMMAND' | 'REPORT_TIMEOUT_MS'>,
  transactionRepo: TransactionRepository
): ReportGenerators {
  const pick = (kind: ReportKind, commandLine: string | undefined): ReportGenerator => {
    const generator = commandLine
      ? new CommandReportGenerator(kind, commandLine, env.REPORT_TIMEOUT_MS)
      : new LedgerReportGenerator(kind, transactionRepo);
    logger.info('Report generator selected', { kind, generator: generator.describe() });
    return generator;
  };

  return {
    latest: pick('latest', env.LATEST_REPORT_COMMAND),
    weekly_expense: pick('weekly_expense', env.WEEKLY_EXPENSE_REPORT_COMMAND),
  };
}
