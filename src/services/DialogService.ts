import type { ChatAdapter, OptionRows } from '../infra/chat/ChatAdapter.js';
import type { TransactionRepository } from '../infra/repositories/TransactionRepository.js';
import type { DialogSessionStore } from './DialogSessionStore.js';
import type {
  DialogState,
  DialogStep,
  EnterAmountState,
  EnterDescriptionState,
  SelectCategoryState,
  SelectTypeState,
} from '../domain/entities/DialogState.js';
import type { SelectionEvent, TextEvent } from '../domain/entities/InboundEvent.js';
import {
  MAX_DESCRIPTION_LENGTH,
  createTransaction,
  isTransactionType,
  isValidDescription,
  parseAmount,
} from '../domain/entities/Transaction.js';
import { lookupTransition } from '../domain/dialogTransitions.js';
import { logger } from '../infra/logger.js';

export const DIALOG_MESSAGES = {
  chooseType: 'Please choose the type of transaction:',
  typeSelected: (type: string) => `You selected ${type}. Choose a category:`,
  categorySelected: (category: string) =>
    `Selected category: ${category}. Enter the transaction amount.`,
  invalidAmount: 'Invalid amount. Please enter a positive number.',
  enterDescription: `Enter a description for the transaction (max ${MAX_DESCRIPTION_LENGTH} characters).`,
  descriptionTooLong: `Description too long. Please keep it to ${MAX_DESCRIPTION_LENGTH} characters or fewer.`,
  saved: 'Transaction added successfully!',
  saveFailed: 'Failed to save transaction.',
} as const;

export const TYPE_OPTIONS: OptionRows = [
  [
    { label: 'Income', value: 'income' },
    { label: 'Expense', value: 'expense' },
  ],
];

export type DialogInput = TextEvent | SelectionEvent;

export type DialogOutcome =
  | 'no_dialog'
  | 'ignored'
  | 'advanced'
  | 'rejected'
  | 'committed'
  | 'commit_failed';

function inStep<S extends DialogStep>(
  state: DialogState,
  step: S
): state is Extract<DialogState, { step: S }> {
  return state.step === step;
}

/**
 * DialogService - the add-transaction state machine.
 * Each accepted event sends exactly one message; a rejected input re-prompts and leaves
 * the state untouched.
 */
export class DialogService {
  constructor(
    private sessions: DialogSessionStore,
    private transactionRepo: TransactionRepository,
    private chat: ChatAdapter,
    private categories: readonly string[],
    private now: () => Date = () => new Date()
  ) {}

  /**
   * Begins a new dialog, discarding any unfinished one
   */
  async start(userId: number, chatId: number): Promise<void> {
    const replaced = this.sessions.get(userId);
    this.sessions.create(userId);
    logger.debug('Dialog started', { userId, replacedStep: replaced?.step ?? null });
    await this.chat.sendOptions(chatId, DIALOG_MESSAGES.chooseType, TYPE_OPTIONS);
  }

  cancel(userId: number): boolean {
    const cancelled = this.sessions.delete(userId);
    if (cancelled) logger.debug('Dialog cancelled', { userId });
    return cancelled;
  }

  async handle(event: DialogInput): Promise<DialogOutcome> {
    const state = this.sessions.get(event.userId);
    if (!state) {
      return 'no_dialog';
    }

    const transition = lookupTransition(state.step, event.kind);
    logger.debug('Dialog event', {
      userId: event.userId,
      step: state.step,
      kind: event.kind,
      action: transition.action,
    });

    switch (transition.action) {
      case 'ignore':
        return 'ignored';
      case 'recordType':
        if (event.kind === 'selection' && inStep(state, 'SELECT_TYPE')) {
          return this.recordType(state, event);
        }
        break;
      case 'recordCategory':
        if (event.kind === 'selection' && inStep(state, 'SELECT_CATEGORY')) {
          return this.recordCategory(state, event);
        }
        break;
      case 'recordAmount':
        if (event.kind === 'text' && inStep(state, 'ENTER_AMOUNT')) {
          return this.recordAmount(state, event);
        }
        break;
      case 'commitDescription':
        if (event.kind === 'text' && inStep(state, 'ENTER_DESCRIPTION')) {
          return this.commitDescription(state, event);
        }
        break;
    }

    logger.error('Dialog transition does not match state', {
      step: state.step,
      kind: event.kind,
      action: transition.action,
    });
    return 'ignored';
  }

  private async recordType(state: SelectTypeState, event: SelectionEvent): Promise<DialogOutcome> {
    if (!isTransactionType(event.payload)) {
      logger.debug('Ignoring stale transaction type option', { payload: event.payload });
      return 'ignored';
    }

    const next: SelectCategoryState = {
      step: 'SELECT_CATEGORY',
      userId: state.userId,
      transactionType: event.payload,
    };
    this.sessions.save(next);

    await this.chat.editText(
      { chatId: event.chatId, messageId: event.messageId },
      DIALOG_MESSAGES.typeSelected(next.transactionType),
      this.categories.map((category) => [{ label: category, value: category }])
    );
    return 'advanced';
  }

  private async recordCategory(
    state: SelectCategoryState,
    event: SelectionEvent
  ): Promise<DialogOutcome> {
    if (!this.categories.includes(event.payload)) {
      logger.debug('Ignoring stale category option', { payload: event.payload });
      return 'ignored';
    }

    const next: EnterAmountState = {
      step: 'ENTER_AMOUNT',
      userId: state.userId,
      transactionType: state.transactionType,
      category: event.payload,
    };
    this.sessions.save(next);

    await this.chat.editText(
      { chatId: event.chatId, messageId: event.messageId },
      DIALOG_MESSAGES.categorySelected(next.category)
    );
    return 'advanced';
  }

  private async recordAmount(state: EnterAmountState, event: TextEvent): Promise<DialogOutcome> {
    const amount = parseAmount(event.text);
    if (amount === null) {
      await this.chat.sendText(event.chatId, DIALOG_MESSAGES.invalidAmount);
      return 'rejected';
    }

    const next: EnterDescriptionState = {
      step: 'ENTER_DESCRIPTION',
      userId: state.userId,
      transactionType: state.transactionType,
      category: state.category,
      amount,
      description: null,
    };
    this.sessions.save(next);

    await this.chat.sendText(event.chatId, DIALOG_MESSAGES.enterDescription);
    return 'advanced';
  }

  /**
   * Appends the transaction and ends the dialog.
   * A failed write keeps the dialog at ENTER_DESCRIPTION so the description can be resent.
   */
  private async commitDescription(
    state: EnterDescriptionState,
    event: TextEvent
  ): Promise<DialogOutcome> {
    if (!isValidDescription(event.text)) {
      await this.chat.sendText(event.chatId, DIALOG_MESSAGES.descriptionTooLong);
      return 'rejected';
    }

    this.sessions.save({ ...state, description: event.text });

    try {
      const transaction = createTransaction({
        type: state.transactionType,
        category: state.category,
        amount: state.amount,
        description: event.text,
        categories: this.categories,
        now: this.now(),
      });
      const id = this.transactionRepo.append(transaction);
      logger.info('Transaction recorded', { id, type: transaction.type, category: transaction.category });
    } catch (error) {
      logger.error('Failed to save transaction', { userId: state.userId, error });
      await this.chat.sendText(event.chatId, DIALOG_MESSAGES.saveFailed);
      return 'commit_failed';
    }

    this.sessions.delete(state.userId);
    await this.chat.sendText(event.chatId, DIALOG_MESSAGES.saved);
    return 'committed';
  }
}
