import dotenv from 'dotenv';
import { initialize } from './bootstrap.js';
import { createHttpApp } from './api/index.js';
import { logger } from './infra/logger.js';

// Load environment variables
dotenv.config();

const result = await initialize(process.env);
if (!result.ok) {
  console.error(`❌ Startup failed: ${result.error.message}`);
  process.exit(1);
}

const { env, db, bot, transactionRepo, scheduler } = result.context;

let polling = false;

const app = createHttpApp({ transactionRepo, isPolling: () => polling });
const server = app.listen(env.PORT, () => {
  logger.info('Health server started', { port: env.PORT, nodeEnv: env.NODE_ENV });
});

scheduler?.start();

async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down gracefully`);
  scheduler?.stop();
  await bot.stop();
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      logger.error('Shutdown failed', { error });
      process.exit(1);
    });
  });
}

try {
  // Resolves once bot.stop() has been called
  await bot.start({
    onStart: (me) => {
      polling = true;
      logger.info('Bot polling started', { username: me.username });
    },
  });
} catch (error) {
  logger.error('Polling stopped with an error', { error });
  process.exitCode = 1;
} finally {
  polling = false;
  scheduler?.stop();
  server.close(() => {
    logger.info('Health server closed');
  });
  db.close();
}
