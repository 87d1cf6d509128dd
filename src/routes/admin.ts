import { Router, Request, Response } from 'express';
import { SecretResolver } from '../lib/secrets.js';
import { authenticate, requireRoles } from '../middleware/auth.js';
import { sendError } from '../middleware/errorHandler.js';
import { MenuItem } from '../models/menuItem.js';
import { toCatalogEntry } from '../services/catalog.js';
import { runDailySummary } from '../services/dailySummary.js';
import { OrderStore } from '../services/orderStore.js';

export interface AdminRouterDeps {
  store: OrderStore;
  secrets: SecretResolver;
}

export function createAdminRouter({ store, secrets }: AdminRouterDeps): Router {
  const router = Router();
  router.use(authenticate(), requireRoles('admin'));

  // GET /api/admin/menu
  router.get('/menu', async (_req: Request, res: Response) => {
    try {
      const items = await MenuItem.find().sort({ _id: -1 }).lean();
      res.json(items.map(toCatalogEntry));
    } catch (err) {
      sendError(res, err, 'Failed to fetch menu');
    }
  });

  // POST /api/admin/summary/run
  router.post('/summary/run', async (_req: Request, res: Response) => {
    try {
      const summary = await runDailySummary(store, secrets);
      res.json({
        ...summary,
        message: `Daily summary ${summary.sent ? 'sent' : 'computed'} for ${summary.date} (orders: ${summary.orderCount}, sales: £${summary.totalSales.toFixed(2)})`,
      });
    } catch (err) {
      sendError(res, err, 'Failed to run daily summary');
    }
  });

  return router;
}
