// src/services/orderCommit.ts
import { PreconditionError } from '../utils/errors.js';
import { Cart, CartLine, cartItemIds, priceCart } from './cart.js';
import { OrderStore } from './orderStore.js';

export interface CommitResult {
  orderId: number;
  total: number;
  lines: CartLine[];
}

/**
 * Turns a cart into an order and its items inside one storage transaction.
 * Unit prices are read from the catalog at this moment and frozen on the
 * order items. Cart entries for items that no longer exist are skipped.
 * The cart itself is never touched here.
 */
export async function commitOrder(cart: Cart, userId: string, store: OrderStore): Promise<CommitResult> {
  const ids = cartItemIds(cart);

  return store.transaction(async (tx) => {
    const items = await tx.findMenuItemsByIds(ids);
    const { lines, total } = priceCart(cart, items);

    if (!lines.length) {
      throw new PreconditionError('None of the items in your cart are available any more.', '/api/cart');
    }

    const orderId = await tx.createOrder(userId);
    await tx.addOrderItems(
      orderId,
      lines.map((line) => ({ menuItemId: line.item.id, qty: line.qty, unitPrice: line.item.price }))
    );

    return { orderId, total, lines };
  });
}
