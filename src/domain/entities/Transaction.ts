import { ValidationError } from '../errors.js';

/**
 * Transaction entity - one immutable ledger row
 */
export const TRANSACTION_TYPES = ['income', 'expense'] as const;
export type TransactionType = (typeof TRANSACTION_TYPES)[number];

export const MAX_DESCRIPTION_LENGTH = 100;

// Ledger timestamps are civil time in a fixed UTC+7 zone
export const LEDGER_UTC_OFFSET_HOURS = 7;

export interface Transaction {
  id: number;
  type: TransactionType;
  category: string;
  amount: number;
  description: string | null;
  /** `YYYY-MM-DD HH:mm:ss` in UTC+7 */
  createdAt: string;
}

export type NewTransaction = Omit<Transaction, 'id'>;

export function isTransactionType(value: string): value is TransactionType {
  return TRANSACTION_TYPES.some((type) => type === value);
}

/**
 * Formats an instant as `YYYY-MM-DD HH:mm:ss` civil time in the ledger zone
 */
export function formatLedgerTimestamp(instant: Date): string {
  const shifted = new Date(instant.getTime() + LEDGER_UTC_OFFSET_HOURS * 60 * 60 * 1000);
  return shifted.toISOString().slice(0, 19).replace('T', ' ');
}

/**
 * Parses a user-typed amount. Returns null unless it is a finite decimal number > 0.
 */
export function parseAmount(input: string): number | null {
  const trimmed = input.trim();
  if (!/^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/.test(trimmed)) {
    return null;
  }

  const amount = Number(trimmed);
  if (!Number.isFinite(amount) || amount <= 0) {
    return null;
  }
  return amount;
}

/**
 * Length in code points, so an emoji counts once
 */
export function descriptionLength(description: string): number {
  return Array.from(description).length;
}

export function isValidDescription(description: string): boolean {
  return descriptionLength(description) <= MAX_DESCRIPTION_LENGTH;
}

/**
 * Factory for a transaction about to be appended.
 * Throws ValidationError when a field breaks the ledger rules.
 */
export function createTransaction(params: {
  type: TransactionType;
  category: string;
  amount: number;
  description: string;
  categories: readonly string[];
  now: Date;
}): NewTransaction {
  if (!params.categories.includes(params.category)) {
    throw new ValidationError(`Unknown category: ${params.category}`, {
      category: params.category,
    });
  }
  if (!Number.isFinite(params.amount) || params.amount <= 0) {
    throw new ValidationError('Amount must be a positive number', { amount: params.amount });
  }
  if (!isValidDescription(params.description)) {
    throw new ValidationError(`Description exceeds ${MAX_DESCRIPTION_LENGTH} characters`, {
      length: descriptionLength(params.description),
    });
  }

  return {
    type: params.type,
    category: params.category,
    amount: params.amount,
    description: params.description,
    createdAt: formatLedgerTimestamp(params.now),
  };
}
