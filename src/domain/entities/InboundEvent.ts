/**
 * Inbound chat events, already stripped of provider specifics
 */
export type CommandEvent = {
  kind: 'command';
  userId: number;
  chatId: number;
  command: string;
  /** Full message text, kept so an unknown command can be read as free text */
  text: string;
};

export type TextEvent = {
  kind: 'text';
  userId: number;
  chatId: number;
  text: string;
};

export type SelectionEvent = {
  kind: 'selection';
  userId: number;
  chatId: number;
  /** The message whose option was tapped */
  messageId: number;
  payload: string;
};

export type InboundEvent = CommandEvent | TextEvent | SelectionEvent;
