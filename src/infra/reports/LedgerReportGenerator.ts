import { ReportError } from '../../domain/errors.js';
import { formatLedgerTimestamp } from '../../domain/entities/Transaction.js';
import type { TransactionRepository } from '../repositories/TransactionRepository.js';
import type { ReportGenerator, ReportKind } from './ReportGenerator.js';

const WEEK_MS = 7 * 24 * 60 * 60 * 1000;

export function renderLatestReport(repo: TransactionRepository): string {
  const months = repo.monthlyBreakdown();
  if (months.length === 0) {
    return 'Transactions report\n\nNo transactions recorded yet.';
  }

  const lines = months.map(
    (month) =>
      `${month.month}: income ${month.income.toFixed(2)}, expense ${month.expense.toFixed(2)} (${month.count} transactions)`
  );
  return `Transactions report\n\n${lines.join('\n')}`;
}

export function renderWeeklyExpenseReport(repo: TransactionRepository, now: Date): string {
  const since = formatLedgerTimestamp(new Date(now.getTime() - WEEK_MS));
  const header = `Weekly expense report (since ${since})`;
  const categories = repo.expenseTotalsByCategorySince(since);
  if (categories.length === 0) {
    return `${header}\n\nNo expenses recorded in the last 7 days.`;
  }

  const total = categories.reduce((sum, category) => sum + category.total, 0);
  const lines = categories.map(
    (category) => `${category.category}: ${category.total.toFixed(2)} (${category.count})`
  );
  return `${header}\n\n${lines.join('\n')}\n\nTotal: ${total.toFixed(2)}`;
}

/**
 * Built-in reports computed straight from the ledger, used when no script is configured
 */
export class LedgerReportGenerator implements ReportGenerator {
  constructor(
    readonly kind: ReportKind,
    private transactionRepo: TransactionRepository,
    private now: () => Date = () => new Date()
  ) {}

  describe(): string {
    return `ledger:${this.kind}`;
  }

  async generate(): Promise<string> {
    try {
      return this.kind === 'latest'
        ? renderLatestReport(this.transactionRepo)
        : renderWeeklyExpenseReport(this.transactionRepo, this.now());
    } catch (error) {
      throw new ReportError('Failed to build report from ledger', this.kind, { error });
    }
  }
}
