// src/services/orderStore.ts
import mongoose, { ClientSession } from 'mongoose';
import { nextSequence } from '../models/counter.js';
import { Order, OrderItem, OrderStatus } from '../models/order.js';
import { lineTotal, sumTotals } from '../utils/money.js';
import { CatalogReader, findMenuItemsByIds } from './catalog.js';

export interface NewOrderItem {
  menuItemId: number;
  qty: number;
  unitPrice: number;
}

/** Reads and writes available inside one storage transaction. */
export interface OrderWriter extends CatalogReader {
  createOrder(userId: string): Promise<number>;
  addOrderItems(orderId: number, items: NewOrderItem[]): Promise<void>;
}

export interface PlacedOrderItem extends NewOrderItem {
  lineTotal: number;
}

export interface PlacedOrder {
  id: number;
  userId: string;
  status: OrderStatus;
  createdAt: Date;
  items: PlacedOrderItem[];
  total: number;
}

export interface SalesSummary {
  orderCount: number;
  totalSales: number;
}

export interface OrderStore extends CatalogReader {
  /** Runs `work` in a transaction: everything it wrote is committed, or nothing is. */
  transaction<T>(work: (tx: OrderWriter) => Promise<T>): Promise<T>;
  /** Orders of one user, newest first. */
  listOrdersForUser(userId: string): Promise<PlacedOrder[]>;
  summarizeSales(from: Date, to: Date): Promise<SalesSummary>;
}

export function toPlacedItem(item: NewOrderItem): PlacedOrderItem {
  return {
    menuItemId: item.menuItemId,
    qty: item.qty,
    unitPrice: item.unitPrice,
    lineTotal: lineTotal(item.unitPrice, item.qty),
  };
}

/** Order total from the prices frozen on its items. */
export function orderTotal(items: NewOrderItem[]): number {
  return sumTotals(items.map((i) => lineTotal(i.unitPrice, i.qty)));
}

function createWriter(session: ClientSession): OrderWriter {
  return {
    findMenuItemsByIds: (ids) => findMenuItemsByIds(ids, session),

    async createOrder(userId) {
      const id = await nextSequence('orders', session);
      await Order.create([{ _id: id, userId, status: 'PLACED' }], { session });
      return id;
    },

    async addOrderItems(orderId, items) {
      if (!items.length) return;
      await OrderItem.insertMany(
        items.map((i) => ({ orderId, ...i })),
        { session }
      );
    },
  };
}

async function itemsByOrder(orderIds: number[]): Promise<Map<number, NewOrderItem[]>> {
  const grouped = new Map<number, NewOrderItem[]>();
  if (!orderIds.length) return grouped;

  const rows = await OrderItem.find({ orderId: { $in: orderIds } }).sort({ _id: 1 }).lean();
  for (const row of rows) {
    const list = grouped.get(row.orderId) ?? [];
    list.push({ menuItemId: row.menuItemId, qty: row.qty, unitPrice: row.unitPrice });
    grouped.set(row.orderId, list);
  }
  return grouped;
}

export const mongoOrderStore: OrderStore = {
  findMenuItemsByIds: (ids) => findMenuItemsByIds(ids),

  // Multi-document transactions need MongoDB running as a replica set.
  // Transient errors (such as two checkouts bumping the order counter at
  // once) make the driver run `work` again from the start.
  transaction(work) {
    return mongoose.connection.transaction((session) => work(createWriter(session)));
  },

  async listOrdersForUser(userId) {
    const orders = await Order.find({ userId }).sort({ createdAt: -1, _id: -1 }).lean();
    const grouped = await itemsByOrder(orders.map((o) => o._id));

    return orders.map((o) => {
      const items = grouped.get(o._id) ?? [];
      return {
        id: o._id,
        userId: o.userId.toString(),
        status: o.status,
        createdAt: o.createdAt,
        items: items.map(toPlacedItem),
        total: orderTotal(items),
      };
    });
  },

  async summarizeSales(from, to) {
    const orders = await Order.find({ createdAt: { $gte: from, $lt: to } }).select('_id').lean();
    const grouped = await itemsByOrder(orders.map((o) => o._id));
    const totals = [...grouped.values()].map(orderTotal);
    return { orderCount: orders.length, totalSales: sumTotals(totals) };
  },
};
