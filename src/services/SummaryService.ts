import type {
  TransactionRepository,
  TypeTotal,
} from '../infra/repositories/TransactionRepository.js';
import { logger } from '../infra/logger.js';

const MONTH_NAMES = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
];

export const SUMMARY_ERROR_MESSAGE = 'Error retrieving transactions.';

export interface MonthlySummary {
  /** Two-digit UTC month used to filter the ledger */
  monthDigits: string;
  /** e.g. "October 2026" */
  periodLabel: string;
  incomeTotal: number;
  expenseTotal: number;
  balance: number;
}

export type SummaryResult =
  | { ok: true; summary: MonthlySummary; text: string }
  | { ok: false; text: string };

export function renderSummary(summary: MonthlySummary): string {
  return (
    `Monthly Summary Report for ${summary.periodLabel}:\n\n` +
    `Total Income: ${summary.incomeTotal.toFixed(2)}\n` +
    `Total Expense: ${summary.expenseTotal.toFixed(2)}\n\n` +
    `Balance: ${summary.balance.toFixed(2)}`
  );
}

/**
 * SummaryService - income/expense totals for the current month.
 * The month is taken from the UTC calendar and compared against the month digits of the
 * stored UTC+7 timestamps; the year is not compared.
 */
export class SummaryService {
  constructor(private transactionRepo: TransactionRepository) {}

  computeMonthlySummary(now: Date): SummaryResult {
    const monthDigits = String(now.getUTCMonth() + 1).padStart(2, '0');
    const periodLabel = `${MONTH_NAMES[now.getUTCMonth()]} ${now.getUTCFullYear()}`;

    let totals: TypeTotal[];
    try {
      totals = this.transactionRepo.queryMonthlyTotals(monthDigits);
    } catch (error) {
      logger.error('Monthly summary query failed', { monthDigits, error });
      return { ok: false, text: SUMMARY_ERROR_MESSAGE };
    }

    let incomeTotal = 0;
    let expenseTotal = 0;
    for (const row of totals) {
      if (row.type === 'income') {
        incomeTotal = row.total;
      } else if (row.type === 'expense') {
        expenseTotal = row.total;
      }
    }

    const summary: MonthlySummary = {
      monthDigits,
      periodLabel,
      incomeTotal,
      expenseTotal,
      balance: incomeTotal - expenseTotal,
    };
    return { ok: true, summary, text: renderSummary(summary) };
  }
}
