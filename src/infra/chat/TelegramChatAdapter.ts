import { InlineKeyboard, type Api } from 'grammy';
import type { ChatAdapter, MessageRef, OptionRows } from './ChatAdapter.js';
import { logger } from '../logger.js';

// Bot API limit for a single text message
export const MAX_MESSAGE_LENGTH = 4096;

export type TelegramApi = Pick<Api, 'sendMessage' | 'editMessageText'>;

export function toInlineKeyboard(options: OptionRows): InlineKeyboard {
  const keyboard = new InlineKeyboard();
  options.forEach((row, index) => {
    if (index > 0) keyboard.row();
    for (const option of row) {
      keyboard.text(option.label, option.value);
    }
  });
  return keyboard;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/**
 * Splits text into chunks the Bot API accepts, preferring line breaks.
 * A hard cut never separates a surrogate pair; whitespace-only pieces are dropped.
 */
export function splitMessage(text: string, limit = MAX_MESSAGE_LENGTH): string[] {
  if (text.length <= limit) return [text];

  const chunks: string[] = [];
  const push = (chunk: string) => {
    if (chunk.trim().length > 0) chunks.push(chunk);
  };

  let rest = text;
  while (rest.length > limit) {
    const newline = rest.lastIndexOf('\n', limit);
    if (newline > 0) {
      push(rest.slice(0, newline));
      rest = rest.slice(newline + 1);
      continue;
    }
    let cut = limit;
    if (cut > 1 && isHighSurrogate(rest.charCodeAt(cut - 1))) cut -= 1;
    push(rest.slice(0, cut));
    rest = rest.slice(cut);
  }
  push(rest);
  return chunks;
}

/**
 * Telegram Bot API implementation of ChatAdapter
 */
export class TelegramChatAdapter implements ChatAdapter {
  constructor(private api: TelegramApi) {}

  /**
   * Sends every chunk even when an earlier one fails; resolves false if any failed
   */
  async sendText(chatId: number, text: string): Promise<boolean> {
    let delivered = true;
    for (const chunk of splitMessage(text)) {
      try {
        await this.api.sendMessage(chatId, chunk);
      } catch (error) {
        logger.error('Error sending message', { chatId, error });
        delivered = false;
      }
    }
    return delivered;
  }

  async sendOptions(chatId: number, text: string, options: OptionRows): Promise<boolean> {
    try {
      await this.api.sendMessage(chatId, text, { reply_markup: toInlineKeyboard(options) });
      return true;
    } catch (error) {
      logger.error('Error sending message with keyboard', { chatId, error });
      return false;
    }
  }

  async editText(message: MessageRef, text: string, options?: OptionRows): Promise<boolean> {
    try {
      await this.api.editMessageText(
        message.chatId,
        message.messageId,
        text,
        options ? { reply_markup: toInlineKeyboard(options) } : undefined
      );
      return true;
    } catch (error) {
      logger.error('Error editing message', { ...message, withOptions: Boolean(options), error });
      return false;
    }
  }
}
