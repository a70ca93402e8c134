import type { DialogStep } from './entities/DialogState.js';

/**
 * Transition table for the add-transaction dialog.
 * Each step accepts exactly one event kind; the other kind maps to an explicit no-op.
 * `next` is the step reached when the action succeeds; a rejected input stays put.
 */
export type DialogEventKind = 'selection' | 'text';

export type DialogAction =
  | 'recordType'
  | 'recordCategory'
  | 'recordAmount'
  | 'commitDescription'
  | 'ignore';

export type DialogTransition = {
  action: DialogAction;
  next: DialogStep | 'COMMITTED';
};

export const DIALOG_TRANSITIONS: Record<DialogStep, Record<DialogEventKind, DialogTransition>> = {
  SELECT_TYPE: {
    selection: { action: 'recordType', next: 'SELECT_CATEGORY' },
    text: { action: 'ignore', next: 'SELECT_TYPE' },
  },
  SELECT_CATEGORY: {
    selection: { action: 'recordCategory', next: 'ENTER_AMOUNT' },
    text: { action: 'ignore', next: 'SELECT_CATEGORY' },
  },
  ENTER_AMOUNT: {
    selection: { action: 'ignore', next: 'ENTER_AMOUNT' },
    text: { action: 'recordAmount', next: 'ENTER_DESCRIPTION' },
  },
  ENTER_DESCRIPTION: {
    selection: { action: 'ignore', next: 'ENTER_DESCRIPTION' },
    text: { action: 'commitDescription', next: 'COMMITTED' },
  },
};

export function lookupTransition(step: DialogStep, kind: DialogEventKind): DialogTransition {
  return DIALOG_TRANSITIONS[step][kind];
}
