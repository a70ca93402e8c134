import type { DatabaseAdapter } from '../DatabaseAdapter.js';
import type { NewTransaction, TransactionType } from '../../domain/entities/Transaction.js';
import { logger } from '../logger.js';

export type TypeTotal = {
  type: string;
  total: number;
};

export type MonthBreakdown = {
  /** `YYYYMM` of the stored timestamp */
  month: string;
  income: number;
  expense: number;
  count: number;
};

export type CategoryTotal = {
  category: string;
  total: number;
  count: number;
};

type TypeTotalRow = {
  type: string | null;
  total: number | null;
};

type MonthTypeRow = {
  month: string | null;
  type: string;
  total: number;
  count: number;
};

/**
 * Append-only ledger of transactions plus read-only aggregations.
 * Rows are never updated or deleted here.
 */
export class TransactionRepository {
  constructor(private db: DatabaseAdapter) {}

  append(transaction: NewTransaction): number {
    const sql = `
      INSERT INTO transactions (type, category, amount, description, created_at)
      VALUES (?, ?, ?, ?, ?)
    `;

    const id = this.db.insert(sql, [
      transaction.type,
      transaction.category,
      transaction.amount,
      transaction.description,
      transaction.createdAt,
    ]);

    logger.debug('Transaction appended', { id, type: transaction.type });
    return id;
  }

  /**
   * Sums amounts per type for rows whose stored month equals `monthDigits` ("01".."12").
   * Rows that cannot be read as a (type, total) pair are skipped.
   */
  queryMonthlyTotals(monthDigits: string): TypeTotal[] {
    const sql = `
      SELECT type, SUM(amount) AS total
      FROM transactions
      WHERE strftime('%m', created_at) = ?
      GROUP BY type
    `;

    const rows = this.db.query<TypeTotalRow>(sql, [monthDigits]);
    const totals: TypeTotal[] = [];
    for (const row of rows) {
      if (row.type === null || typeof row.total !== 'number') {
        logger.warn('Skipping unreadable monthly total row', { row });
        continue;
      }
      totals.push({ type: row.type, total: row.total });
    }
    return totals;
  }

  monthlyBreakdown(): MonthBreakdown[] {
    const sql = `
      SELECT strftime('%Y%m', created_at) AS month, type, SUM(amount) AS total, COUNT(*) AS count
      FROM transactions
      GROUP BY month, type
      ORDER BY month ASC
    `;

    const rows = this.db.query<MonthTypeRow>(sql);
    const byMonth = new Map<string, MonthBreakdown>();
    for (const row of rows) {
      if (row.month === null) continue;
      const entry = byMonth.get(row.month) ?? { month: row.month, income: 0, expense: 0, count: 0 };
      // Anything that is not an expense counts as income, matching the spreadsheet export
      if (row.type === 'expense') {
        entry.expense += row.total;
      } else {
        entry.income += row.total;
      }
      entry.count += row.count;
      byMonth.set(row.month, entry);
    }
    return [...byMonth.values()];
  }

  expenseTotalsByCategorySince(since: string): CategoryTotal[] {
    const type: TransactionType = 'expense';
    const sql = `
      SELECT category, SUM(amount) AS total, COUNT(*) AS count
      FROM transactions
      WHERE type = ? AND created_at >= ?
      GROUP BY category
      ORDER BY total DESC, category ASC
    `;

    return this.db.query<CategoryTotal>(sql, [type, since]);
  }

  countAll(): number {
    const row = this.db.queryOne<{ count: number }>('SELECT COUNT(*) AS count FROM transactions');
    return row?.count ?? 0;
  }
}
