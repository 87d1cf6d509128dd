import { Router, Request, Response } from 'express';
import { authenticate } from '../middleware/auth.js';
import { sendError } from '../middleware/errorHandler.js';
import { OrderStore } from '../services/orderStore.js';

export interface OrdersRouterDeps {
  store: OrderStore;
}

export function createOrdersRouter({ store }: OrdersRouterDeps): Router {
  const router = Router();
  router.use(authenticate());

  // GET /api/orders
  router.get('/', async (req: Request, res: Response) => {
    try {
      const orders = await store.listOrdersForUser(req.user?.id ?? '');
      res.json(orders);
    } catch (err) {
      sendError(res, err, 'Failed to fetch orders');
    }
  });

  // POST /api/orders
  // Orders are only created by paying at checkout.
  router.post('/', (_req: Request, res: Response) => {
    res.status(409).json({
      error: 'Please go to checkout and complete payment before placing an order.',
      redirectTo: '/api/checkout',
    });
  });

  return router;
}
