import { Router } from 'express';
import { NotFoundError } from '@tiered/errors';
import { createServiceLogger } from '@tiered/logger';
import type { RepositoryFactory } from '@tiered/storage';
import { asyncHandler } from '../middleware/errorHandler.js';

const logger = createServiceLogger('admin');

/**
 * Operator actions. Deletes are the only way rows leave an atomic
 * repository outside of legacy eviction.
 */
export function createAdminRouter(factory: RepositoryFactory) {
  const router = Router();

  router.delete(
    '/orders/:orderId',
    asyncHandler(async (req, res) => {
      const orderId = req.params['orderId'] ?? '';
      const orders = await factory.get('orders');
      if (!orders.delete(orderId)) {
        throw new NotFoundError('Order', orderId);
      }
      logger.warn({ orderId }, 'Order deleted by operator');
      res.status(204).end();
    })
  );

  router.post(
    '/sync',
    asyncHandler(async (_req, res) => {
      res.json(await factory.forceSyncAll());
    })
  );

  router.post(
    '/dump',
    asyncHandler(async (_req, res) => {
      res.json(await factory.forceDumpAll());
    })
  );

  return router;
}
