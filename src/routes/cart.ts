// src/routes/cart.ts
import { Router, Request, Response } from 'express';
import { authenticate } from '../middleware/auth.js';
import { sendError } from '../middleware/errorHandler.js';
import { CatalogReader } from '../services/catalog.js';
import { addToCart, isCartAction, removeFromCart, updateCart, viewCart } from '../services/cart.js';
import { parseItemId } from './menu.js';

export interface CartRouterDeps {
  catalog: CatalogReader;
}

export function createCartRouter({ catalog }: CartRouterDeps): Router {
  const router = Router();
  router.use(authenticate());

  // GET /api/cart
  router.get('/', async (req: Request, res: Response) => {
    try {
      const view = await viewCart(req.session.cart ?? {}, catalog);
      res.json(view);
    } catch (err) {
      sendError(res, err, 'Failed to load cart');
    }
  });

  // POST /api/cart/items/:itemId
  router.post('/items/:itemId', (req: Request, res: Response) => {
    const itemId = parseItemId(req.params.itemId);
    if (itemId === null) return res.status(400).json({ error: 'Invalid menu item id' });

    req.session.cart = addToCart(req.session.cart ?? {}, itemId);
    res.json({ message: 'Added to cart.', cart: req.session.cart });
  });

  // PATCH /api/cart/items/:itemId  { action: 'inc' | 'dec' }
  router.patch('/items/:itemId', (req: Request, res: Response) => {
    const itemId = parseItemId(req.params.itemId);
    if (itemId === null) return res.status(400).json({ error: 'Invalid menu item id' });

    const action: unknown = req.body?.action;
    req.session.cart = updateCart(req.session.cart ?? {}, itemId, isCartAction(action) ? action : undefined);
    res.json({ cart: req.session.cart });
  });

  // DELETE /api/cart/items/:itemId
  router.delete('/items/:itemId', (req: Request, res: Response) => {
    const itemId = parseItemId(req.params.itemId);
    if (itemId === null) return res.status(400).json({ error: 'Invalid menu item id' });

    req.session.cart = removeFromCart(req.session.cart ?? {}, itemId);
    res.json({ cart: req.session.cart });
  });

  return router;
}
