import { Express, Request, Response } from 'express';
import { SecretResolver } from '../lib/secrets.js';
import { CatalogReader } from '../services/catalog.js';
import { NotificationDeps } from '../services/notificationService.js';
import { OrderStore } from '../services/orderStore.js';
import { createAdminRouter } from './admin.js';
import { authRouter } from './auth.js';
import { createCartRouter } from './cart.js';
import { createCheckoutRouter } from './checkout.js';
import { menuRouter } from './menu.js';
import { createOrdersRouter } from './orders.js';

export interface RouteDeps {
  catalog: CatalogReader;
  store: OrderStore;
  notifications: NotificationDeps;
  secrets: SecretResolver;
}

export function registerRoutes(app: Express, deps: RouteDeps): void {
  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  // API Routes
  app.use('/api/auth', authRouter);
  app.use('/api/menu', menuRouter);
  app.use('/api/cart', createCartRouter({ catalog: deps.catalog }));
  app.use('/api/checkout', createCheckoutRouter({ store: deps.store, notifications: deps.notifications }));
  app.use('/api/orders', createOrdersRouter({ store: deps.store }));
  app.use('/api/admin', createAdminRouter({ store: deps.store, secrets: deps.secrets }));
}
