import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DatabaseAdapter } from '../../../src/infra/DatabaseAdapter.js';
import { TransactionRepository } from '../../../src/infra/repositories/TransactionRepository.js';
import { DialogSessionStore } from '../../../src/services/DialogSessionStore.js';
import {
  DIALOG_MESSAGES,
  DialogService,
  TYPE_OPTIONS,
} from '../../../src/services/DialogService.js';
import type { SelectionEvent, TextEvent } from '../../../src/domain/entities/InboundEvent.js';
import { DatabaseError } from '../../../src/domain/errors.js';
import { createFakeChat } from '../../helpers/fakes.js';

const loggerMock = vi.hoisted(() => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
}));

vi.mock('../../../src/infra/logger.js', () => loggerMock);

const USER = 42;
const PROMPT_MESSAGE = { chatId: USER, messageId: 7 };
const CATEGORIES = ['Food', 'Salary', 'Rent'];
const NOW = new Date('2026-10-19T05:00:00Z');

const select = (payload: string): SelectionEvent => ({
  kind: 'selection',
  userId: USER,
  chatId: USER,
  messageId: PROMPT_MESSAGE.messageId,
  payload,
});

const text = (value: string): TextEvent => ({ kind: 'text', userId: USER, chatId: USER, text: value });

type StoredRow = {
  id: number;
  type: string;
  category: string;
  amount: number;
  description: string | null;
  created_at: string;
};

describe('DialogService', () => {
  let db: DatabaseAdapter;
  let repo: TransactionRepository;
  let sessions: DialogSessionStore;
  let chat: ReturnType<typeof createFakeChat>;
  let service: DialogService;

  const storedRows = () => db.query<StoredRow>('SELECT * FROM transactions ORDER BY id');

  async function advanceToAmount(type = 'expense', category = 'Food') {
    await service.start(USER, USER);
    await service.handle(select(type));
    await service.handle(select(category));
  }

  async function advanceToDescription(amount = '12.50') {
    await advanceToAmount();
    await service.handle(text(amount));
  }

  beforeEach(() => {
    db = new DatabaseAdapter(':memory:');
    repo = new TransactionRepository(db);
    sessions = new DialogSessionStore();
    chat = createFakeChat();
    service = new DialogService(sessions, repo, chat, CATEGORIES, () => NOW);
  });

  afterEach(() => {
    db.close();
  });

  describe('start', () => {
    it('should open a dialog at SELECT_TYPE and offer both types', async () => {
      await service.start(USER, USER);

      expect(sessions.get(USER)).toEqual({ step: 'SELECT_TYPE', userId: USER });
      expect(chat.sendOptions).toHaveBeenCalledWith(USER, DIALOG_MESSAGES.chooseType, TYPE_OPTIONS);
    });

    it('should replace a dialog already in progress', async () => {
      await advanceToDescription();
      expect(sessions.get(USER)?.step).toBe('ENTER_DESCRIPTION');

      await service.start(USER, USER);

      expect(sessions.get(USER)).toEqual({ step: 'SELECT_TYPE', userId: USER });
      expect(sessions.size()).toBe(1);
    });
  });

  describe('selection steps', () => {
    it('should record the type and list every category on its own row', async () => {
      await service.start(USER, USER);

      await expect(service.handle(select('income'))).resolves.toBe('advanced');

      expect(sessions.get(USER)).toEqual({
        step: 'SELECT_CATEGORY',
        userId: USER,
        transactionType: 'income',
      });
      expect(chat.editText).toHaveBeenCalledWith(PROMPT_MESSAGE, 'You selected income. Choose a category:', [
        [{ label: 'Food', value: 'Food' }],
        [{ label: 'Salary', value: 'Salary' }],
        [{ label: 'Rent', value: 'Rent' }],
      ]);
    });

    it('should record the category and ask for the amount', async () => {
      await advanceToAmount('expense', 'Rent');

      expect(sessions.get(USER)).toEqual({
        step: 'ENTER_AMOUNT',
        userId: USER,
        transactionType: 'expense',
        category: 'Rent',
      });
      expect(chat.editText).toHaveBeenLastCalledWith(
        PROMPT_MESSAGE,
        'Selected category: Rent. Enter the transaction amount.'
      );
    });

    it('should ignore an unknown transaction type', async () => {
      await service.start(USER, USER);

      await expect(service.handle(select('transfer'))).resolves.toBe('ignored');

      expect(sessions.get(USER)?.step).toBe('SELECT_TYPE');
      expect(chat.editText).not.toHaveBeenCalled();
    });

    it('should ignore a category that is not configured', async () => {
      await service.start(USER, USER);
      await service.handle(select('expense'));
      chat.editText.mockClear();

      await expect(service.handle(select('Travel'))).resolves.toBe('ignored');

      expect(sessions.get(USER)?.step).toBe('SELECT_CATEGORY');
      expect(chat.editText).not.toHaveBeenCalled();
    });

    it('should ignore free text while a selection is expected', async () => {
      await service.start(USER, USER);

      await expect(service.handle(text('expense'))).resolves.toBe('ignored');

      expect(sessions.get(USER)).toEqual({ step: 'SELECT_TYPE', userId: USER });
      expect(chat.sendText).not.toHaveBeenCalled();
    });
  });

  describe('amount step', () => {
    it('should accept the smallest positive amount', async () => {
      await advanceToAmount();

      await expect(service.handle(text('0.01'))).resolves.toBe('advanced');

      expect(sessions.get(USER)).toEqual({
        step: 'ENTER_DESCRIPTION',
        userId: USER,
        transactionType: 'expense',
        category: 'Food',
        amount: 0.01,
        description: null,
      });
      expect(chat.sendText).toHaveBeenCalledWith(
        USER,
        'Enter a description for the transaction (max 100 characters).'
      );
    });

    it.each(['0', '-3', 'twelve', '12,50', ''])('should re-prompt on %j and keep the state', async (input) => {
      await advanceToAmount();
      const before = sessions.get(USER);

      await expect(service.handle(text(input))).resolves.toBe('rejected');

      expect(sessions.get(USER)).toEqual(before);
      expect(chat.sendText).toHaveBeenCalledWith(USER, DIALOG_MESSAGES.invalidAmount);
    });

    it('should allow unlimited retries', async () => {
      await advanceToAmount();

      await service.handle(text('x'));
      await service.handle(text('y'));
      await expect(service.handle(text('5'))).resolves.toBe('advanced');

      expect(chat.sendText).toHaveBeenCalledTimes(3);
    });

    it('should ignore a button tap while an amount is expected', async () => {
      await advanceToAmount();

      await expect(service.handle(select('Food'))).resolves.toBe('ignored');
      expect(sessions.get(USER)?.step).toBe('ENTER_AMOUNT');
    });
  });

  describe('description step', () => {
    it('should commit the transaction and clear the dialog', async () => {
      await advanceToDescription('12.50');

      await expect(service.handle(text('lunch'))).resolves.toBe('committed');

      expect(storedRows()).toEqual([
        {
          id: 1,
          type: 'expense',
          category: 'Food',
          amount: 12.5,
          description: 'lunch',
          created_at: '2026-10-19 12:00:00',
        },
      ]);
      expect(sessions.get(USER)).toBeNull();
      expect(chat.sendText).toHaveBeenLastCalledWith(USER, DIALOG_MESSAGES.saved);
    });

    it('should accept exactly 100 characters', async () => {
      await advanceToDescription();
      const description = 'd'.repeat(100);

      await expect(service.handle(text(description))).resolves.toBe('committed');
      expect(storedRows()[0]?.description).toBe(description);
    });

    it('should reject 101 characters and keep the state', async () => {
      await advanceToDescription();
      const before = sessions.get(USER);

      await expect(service.handle(text('d'.repeat(101)))).resolves.toBe('rejected');

      expect(sessions.get(USER)).toEqual(before);
      expect(storedRows()).toEqual([]);
      expect(chat.sendText).toHaveBeenLastCalledWith(USER, DIALOG_MESSAGES.descriptionTooLong);
    });

    it('should keep the chosen type through the later steps', async () => {
      await advanceToAmount('income', 'Salary');
      await service.handle(text('2500'));
      await service.handle(text('October pay'));

      expect(storedRows()).toMatchObject([{ type: 'income', category: 'Salary', amount: 2500 }]);
    });

    it('should keep the dialog when the write fails so the description can be resent', async () => {
      await advanceToDescription();
      const append = vi.spyOn(repo, 'append').mockImplementationOnce(() => {
        throw new DatabaseError('Insert failed');
      });

      await expect(service.handle(text('lunch'))).resolves.toBe('commit_failed');

      expect(chat.sendText).toHaveBeenLastCalledWith(USER, DIALOG_MESSAGES.saveFailed);
      expect(sessions.get(USER)).toMatchObject({ step: 'ENTER_DESCRIPTION', description: 'lunch' });

      await expect(service.handle(text('lunch'))).resolves.toBe('committed');
      expect(append).toHaveBeenCalledTimes(2);
      expect(storedRows()).toHaveLength(1);
    });
  });

  describe('without a dialog', () => {
    it('should report that nothing is in progress', async () => {
      await expect(service.handle(text('12'))).resolves.toBe('no_dialog');
      await expect(service.handle(select('income'))).resolves.toBe('no_dialog');
      expect(sessions.get(USER)).toBeNull();
    });

    it('should cancel only an open dialog', async () => {
      expect(service.cancel(USER)).toBe(false);
      await service.start(USER, USER);
      expect(service.cancel(USER)).toBe(true);
      expect(sessions.get(USER)).toBeNull();
    });
  });
});
