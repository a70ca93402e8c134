import { describe, it, expect } from 'vitest';
import {
  createTransaction,
  descriptionLength,
  formatLedgerTimestamp,
  isTransactionType,
  isValidDescription,
  parseAmount,
} from '../../../src/domain/entities/Transaction.js';
import { ValidationError } from '../../../src/domain/errors.js';

const CATEGORIES = ['Food', 'Salary', 'Rent'];

describe('Transaction', () => {
  describe('parseAmount', () => {
    it('should accept positive decimals', () => {
      expect(parseAmount('12.50')).toBe(12.5);
      expect(parseAmount('0.01')).toBe(0.01);
      expect(parseAmount('100')).toBe(100);
      expect(parseAmount('.5')).toBe(0.5);
      expect(parseAmount('1e3')).toBe(1000);
    });

    it('should ignore surrounding whitespace', () => {
      expect(parseAmount('  42.75 ')).toBe(42.75);
    });

    it.each(['0', '0.00', '-1', '-0.01', 'abc', '', '1,5', '12 50', 'Infinity', 'NaN', '0x10', '1e400'])(
      'should reject %j',
      (input) => {
        expect(parseAmount(input)).toBeNull();
      }
    );
  });

  describe('descriptions', () => {
    it('should accept exactly 100 characters', () => {
      expect(isValidDescription('a'.repeat(100))).toBe(true);
    });

    it('should reject 101 characters', () => {
      expect(isValidDescription('a'.repeat(101))).toBe(false);
    });

    it('should count an emoji as one character', () => {
      expect(descriptionLength('🍜 lunch')).toBe(7);
      expect(isValidDescription('🍜'.repeat(100))).toBe(true);
    });
  });

  describe('formatLedgerTimestamp', () => {
    it('should render civil time at UTC+7', () => {
      expect(formatLedgerTimestamp(new Date('2026-10-19T05:00:00Z'))).toBe('2026-10-19 12:00:00');
    });

    it('should roll over to the next day', () => {
      expect(formatLedgerTimestamp(new Date('2026-10-31T20:30:15.900Z'))).toBe(
        '2026-11-01 03:30:15'
      );
    });
  });

  describe('isTransactionType', () => {
    it('should recognise income and expense only', () => {
      expect(isTransactionType('income')).toBe(true);
      expect(isTransactionType('expense')).toBe(true);
      expect(isTransactionType('transfer')).toBe(false);
    });
  });

  describe('createTransaction', () => {
    const now = new Date('2026-10-19T05:00:00Z');

    it('should build a row stamped in UTC+7', () => {
      const transaction = createTransaction({
        type: 'expense',
        category: 'Food',
        amount: 12.5,
        description: 'lunch',
        categories: CATEGORIES,
        now,
      });

      expect(transaction).toEqual({
        type: 'expense',
        category: 'Food',
        amount: 12.5,
        description: 'lunch',
        createdAt: '2026-10-19 12:00:00',
      });
    });

    it('should reject a category outside the configured list', () => {
      expect(() =>
        createTransaction({
          type: 'expense',
          category: 'Travel',
          amount: 1,
          description: '',
          categories: CATEGORIES,
          now,
        })
      ).toThrow(ValidationError);
    });

    it('should reject a non-positive amount', () => {
      expect(() =>
        createTransaction({
          type: 'income',
          category: 'Salary',
          amount: 0,
          description: '',
          categories: CATEGORIES,
          now,
        })
      ).toThrow('Amount must be a positive number');
    });

    it('should reject an oversized description', () => {
      expect(() =>
        createTransaction({
          type: 'income',
          category: 'Salary',
          amount: 10,
          description: 'x'.repeat(101),
          categories: CATEGORIES,
          now,
        })
      ).toThrow('Description exceeds 100 characters');
    });
  });
});
