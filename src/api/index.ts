import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { createHealthRouter } from './healthRoutes.js';
import type { TransactionRepository } from '../infra/repositories/TransactionRepository.js';
import { logger } from '../infra/logger.js';

/**
 * HTTP surface of the bot process: health probes only
 */
export function createHttpApp(deps: {
  transactionRepo: TransactionRepository;
  isPolling: () => boolean;
}): Express {
  const app = express();

  app.use((req: Request, _res: Response, next: NextFunction) => {
    logger.debug('Incoming request', { method: req.method, path: req.path });
    next();
  });

  app.use(createHealthRouter(deps));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'NOT_FOUND' });
  });

  return app;
}
