// src/routes/menu.ts
import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { logger } from '../lib/logger.js';
import { authenticate, requireRoles } from '../middleware/auth.js';
import { validateBody } from '../middleware/validate.js';
import { nextSequence } from '../models/counter.js';
import { MenuItem } from '../models/menuItem.js';
import { toCatalogEntry } from '../services/catalog.js';
import { parsePrice } from '../utils/money.js';

export const menuRouter = Router();

const priceField = z
  .unknown()
  .transform((value) => parsePrice(value))
  .refine((value): value is number => value !== null, 'Price must be a number like 9.99 (don’t include £).');

const optionalText = (max: number) =>
  z.preprocess((v) => (typeof v === 'string' ? v.trim() || undefined : v), z.string().max(max).optional());

export const menuItemSchema = z.object({
  name: z.string().trim().min(1, 'Name is required.').max(120),
  category: z.preprocess(
    (v) => (typeof v === 'string' && v.trim() ? v.trim() : 'Main'),
    z.string().max(60)
  ),
  description: optionalText(500),
  price: priceField,
  image: optionalText(255),
});

type MenuItemInput = z.infer<typeof menuItemSchema>;

export function parseItemId(raw: string): number | null {
  return /^\d+$/.test(raw) ? Number(raw) : null;
}

// GET /api/menu?category=
menuRouter.get('/', async (req: Request, res: Response) => {
  try {
    const category = typeof req.query.category === 'string' ? req.query.category.trim() : '';
    const filter = category ? { category } : {};
    const items = await MenuItem.find(filter).sort({ category: 1, name: 1 }).lean();
    res.json({ items: items.map(toCatalogEntry), selected: category });
  } catch (err) {
    logger.error({ err }, 'Failed to fetch menu');
    res.status(500).json({ error: 'Failed to fetch menu' });
  }
});

// GET /api/menu/categories
menuRouter.get('/categories', async (_req: Request, res: Response) => {
  try {
    const categories: unknown[] = await MenuItem.distinct('category');
    const names = categories
      .filter((c): c is string => typeof c === 'string' && c.length > 0)
      .sort((a, b) => a.localeCompare(b));
    res.json(names);
  } catch (err) {
    logger.error({ err }, 'Failed to fetch categories');
    res.status(500).json({ error: 'Failed to fetch categories' });
  }
});

// GET /api/menu/:id
menuRouter.get('/:id', async (req: Request, res: Response) => {
  try {
    const id = parseItemId(req.params.id);
    const item = id === null ? null : await MenuItem.findById(id).lean();
    if (!item) return res.status(404).json({ error: 'Menu item not found' });
    res.json(toCatalogEntry(item));
  } catch (err) {
    logger.error({ err }, 'Failed to fetch menu item');
    res.status(500).json({ error: 'Failed to fetch menu item' });
  }
});

// POST /api/menu
menuRouter.post(
  '/',
  authenticate(),
  requireRoles('admin'),
  validateBody(menuItemSchema),
  async (req: Request, res: Response) => {
    try {
      const payload: MenuItemInput = req.body;
      const id = await nextSequence('menuItems');
      const created = await MenuItem.create({ _id: id, ...payload });
      res.status(201).json(toCatalogEntry(created));
    } catch (err) {
      logger.error({ err }, 'Failed to create menu item');
      res.status(400).json({ error: 'Failed to create menu item' });
    }
  }
);

// PUT /api/menu/:id
menuRouter.put(
  '/:id',
  authenticate(),
  requireRoles('admin'),
  validateBody(menuItemSchema),
  async (req: Request, res: Response) => {
    try {
      const id = parseItemId(req.params.id);
      if (id === null) return res.status(404).json({ error: 'Menu item not found' });

      const { image, ...fields }: MenuItemInput = req.body;
      // A missing image keeps the current one
      const update = image ? { ...fields, image } : fields;
      const updated = await MenuItem.findByIdAndUpdate(id, update, { new: true, runValidators: true }).lean();
      if (!updated) return res.status(404).json({ error: 'Menu item not found' });
      res.json(toCatalogEntry(updated));
    } catch (err) {
      logger.error({ err }, 'Failed to update menu item');
      res.status(400).json({ error: 'Failed to update menu item' });
    }
  }
);

// DELETE /api/menu/:id
menuRouter.delete('/:id', authenticate(), requireRoles('admin'), async (req: Request, res: Response) => {
  try {
    const id = parseItemId(req.params.id);
    const deleted = id === null ? null : await MenuItem.findByIdAndDelete(id).lean();
    if (!deleted) return res.status(404).json({ error: 'Menu item not found' });
    res.json({ message: 'Menu item deleted successfully' });
  } catch (err) {
    logger.error({ err }, 'Failed to delete menu item');
    res.status(400).json({ error: 'Failed to delete menu item' });
  }
});
