import { Router, type Request, type Response } from 'express';
import type { TransactionRepository } from '../infra/repositories/TransactionRepository.js';

/**
 * Liveness and readiness probes
 */
export function createHealthRouter(deps: {
  transactionRepo: TransactionRepository;
  isPolling: () => boolean;
}): Router {
  const router = Router();

  router.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  router.get('/ready', (_req: Request, res: Response) => {
    if (!deps.isPolling()) {
      res.status(503).json({ status: 'not-ready' });
      return;
    }
    try {
      const transactions = deps.transactionRepo.countAll();
      res.json({ status: 'ready', transactions });
    } catch {
      res.status(503).json({ status: 'not-ready' });
    }
  });

  return router;
}
