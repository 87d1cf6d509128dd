// src/services/cart.ts
import { lineTotal, sumTotals } from '../utils/money.js';
import { CatalogEntry, CatalogReader } from './catalog.js';

/** Menu item id (as a string key) → quantity. Quantities are always >= 1. */
export type Cart = Record<string, number>;

export type CartAction = 'inc' | 'dec';

export interface CartLine {
  item: CatalogEntry;
  qty: number;
  lineTotal: number;
}

export interface CartView {
  lines: CartLine[];
  total: number;
  /** Ids still in the cart that no longer exist in the catalog. */
  unavailable: number[];
}

const key = (itemId: number) => String(itemId);

export function isCartAction(value: unknown): value is CartAction {
  return value === 'inc' || value === 'dec';
}

export function isCartEmpty(cart: Cart | undefined): boolean {
  return !cart || Object.keys(cart).length === 0;
}

export function cartItemIds(cart: Cart): number[] {
  return Object.keys(cart).map(Number);
}

export function addToCart(cart: Cart, itemId: number): Cart {
  return { ...cart, [key(itemId)]: (cart[key(itemId)] ?? 0) + 1 };
}

export function updateCart(cart: Cart, itemId: number, action: CartAction | undefined): Cart {
  let qty = cart[key(itemId)] ?? 0;
  if (action === 'inc') qty += 1;
  else if (action === 'dec') qty -= 1;

  if (qty <= 0) return removeFromCart(cart, itemId);
  return { ...cart, [key(itemId)]: qty };
}

export function removeFromCart(cart: Cart, itemId: number): Cart {
  const { [key(itemId)]: _removed, ...rest } = cart;
  return rest;
}

/**
 * Prices the cart against catalog entries. Entries whose item is missing
 * are left out of the lines and the total and reported as unavailable.
 */
export function priceCart(cart: Cart, items: CatalogEntry[]): CartView {
  const byId = new Map(items.map((item) => [item.id, item]));
  const lines: CartLine[] = [];
  const unavailable: number[] = [];

  for (const [rawId, qty] of Object.entries(cart)) {
    const item = byId.get(Number(rawId));
    if (!item) {
      unavailable.push(Number(rawId));
      continue;
    }
    lines.push({ item, qty, lineTotal: lineTotal(item.price, qty) });
  }

  return { lines, total: sumTotals(lines.map((l) => l.lineTotal)), unavailable };
}

export async function viewCart(cart: Cart, catalog: CatalogReader): Promise<CartView> {
  const items = await catalog.findMenuItemsByIds(cartItemIds(cart));
  return priceCart(cart, items);
}
