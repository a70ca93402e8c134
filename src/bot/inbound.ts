import type { InboundEvent } from '../domain/entities/InboundEvent.js';

/**
 * Structural views of the Bot API objects the router needs.
 * grammy's Message and CallbackQuery types satisfy them.
 */
export type IncomingEntity = {
  type: string;
  offset: number;
  length: number;
};

export type IncomingTextMessage = {
  message_id: number;
  chat: { id: number };
  from?: { id: number };
  text: string;
  entities?: readonly IncomingEntity[];
};

export type IncomingCallbackQuery = {
  from: { id: number };
  data: string;
  message?: { message_id: number; chat: { id: number } };
};

/**
 * Returns the command name when the message starts with a bot command entity.
 * `/add@my_bot` yields `add`.
 */
export function parseCommand(text: string, entities: readonly IncomingEntity[] = []): string | null {
  const command = entities.find((entity) => entity.type === 'bot_command' && entity.offset === 0);
  if (!command) return null;

  const [name] = text.slice(1, command.length).split('@');
  return name ? name : null;
}

export function messageToEvent(message: IncomingTextMessage): InboundEvent | null {
  if (!message.from) return null;

  const base = { userId: message.from.id, chatId: message.chat.id };
  const command = parseCommand(message.text, message.entities);
  if (command) {
    return { kind: 'command', ...base, command, text: message.text };
  }
  return { kind: 'text', ...base, text: message.text };
}

/**
 * Callbacks from inline-mode messages carry no message and cannot be answered by edit
 */
export function callbackToEvent(query: IncomingCallbackQuery): InboundEvent | null {
  if (!query.message) return null;

  return {
    kind: 'selection',
    userId: query.from.id,
    chatId: query.message.chat.id,
    messageId: query.message.message_id,
    payload: query.data,
  };
}
