import type { TransactionType } from './Transaction.js';

/**
 * DialogState - where one user is inside the add-transaction conversation.
 * Each step carries exactly the fields collected before it, in the fixed order
 * type -> category -> amount -> description.
 */
export type DialogStep = 'SELECT_TYPE' | 'SELECT_CATEGORY' | 'ENTER_AMOUNT' | 'ENTER_DESCRIPTION';

export type SelectTypeState = {
  step: 'SELECT_TYPE';
  userId: number;
};

export type SelectCategoryState = {
  step: 'SELECT_CATEGORY';
  userId: number;
  transactionType: TransactionType;
};

export type EnterAmountState = {
  step: 'ENTER_AMOUNT';
  userId: number;
  transactionType: TransactionType;
  category: string;
};

export type EnterDescriptionState = {
  step: 'ENTER_DESCRIPTION';
  userId: number;
  transactionType: TransactionType;
  category: string;
  amount: number;
  /** Last accepted description; set only while its commit is pending or failed */
  description: string | null;
};

export type DialogState =
  | SelectTypeState
  | SelectCategoryState
  | EnterAmountState
  | EnterDescriptionState;

export function createDialogState(userId: number): SelectTypeState {
  return { step: 'SELECT_TYPE', userId };
}
