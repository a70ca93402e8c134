import { Bot } from 'grammy';
import type { UpdateRouter } from '../services/UpdateRouter.js';
import { callbackToEvent, messageToEvent } from './inbound.js';
import { logger } from '../infra/logger.js';

/**
 * Wires grammy updates to the router.
 * grammy's long polling hands over one update at a time, which keeps dialog handling sequential.
 */
export function registerHandlers(bot: Bot, router: UpdateRouter): void {
  bot.on('message:text', async (ctx) => {
    const event = messageToEvent(ctx.message);
    if (!event) {
      logger.debug('Ignoring text message without sender', { chatId: ctx.chat.id });
      return;
    }
    await router.handle(event);
  });

  bot.on('callback_query:data', async (ctx) => {
    const event = callbackToEvent(ctx.callbackQuery);
    try {
      if (event) {
        await router.handle(event);
      }
    } finally {
      // Stops the client's loading indicator on the tapped button
      await ctx.answerCallbackQuery().catch((error: unknown) => {
        logger.warn('Failed to answer callback query', { error });
      });
    }
  });

  bot.catch((err) => {
    logger.error('Unhandled error while processing update', {
      updateId: err.ctx.update.update_id,
      error: err.error,
    });
  });
}

export function createBot(token: string): Bot {
  return new Bot(token);
}
