// src/models/order.ts
import mongoose, { ClientSession, Document, FilterQuery, Model, QueryOptions, Schema, Types } from 'mongoose';

export const ORDER_STATUSES = ['PLACED'] as const;
export type OrderStatus = (typeof ORDER_STATUSES)[number];

export interface IOrderItem extends Document<Types.ObjectId> {
  orderId: number;
  menuItemId: number;
  qty: number;
  unitPrice: number; // price at the time the order was placed
}

export interface IOrder extends Document<number> {
  userId: Types.ObjectId;
  status: OrderStatus;
  createdAt: Date;
  updatedAt: Date;
}

const OrderItemSchema = new Schema<IOrderItem>({
  orderId: { type: Number, ref: 'Order', required: true, index: true },
  menuItemId: { type: Number, ref: 'MenuItem', required: true },
  qty: { type: Number, required: true, min: 1, default: 1 },
  unitPrice: { type: Number, required: true, min: 0 },
});

export const OrderItem: Model<IOrderItem> = mongoose.model<IOrderItem>('OrderItem', OrderItemSchema);

const OrderSchema = new Schema<IOrder>(
  {
    _id: { type: Number, required: true },
    userId: { type: Schema.Types.ObjectId, ref: 'User', required: true },
    status: { type: String, enum: ORDER_STATUSES, default: 'PLACED', index: true },
  },
  { timestamps: true }
);

OrderSchema.index({ userId: 1, createdAt: -1 });

interface OrderDocumentScope {
  _id: number;
  $session(): ClientSession | null;
}

interface OrderQueryScope {
  getFilter(): FilterQuery<IOrder>;
  getOptions(): QueryOptions;
}

// Order items belong to their order: removing an order removes its items
export async function cascadeFromDocument(this: OrderDocumentScope): Promise<void> {
  await OrderItem.deleteMany({ orderId: this._id }, { session: this.$session() ?? undefined });
}

export async function cascadeFromQuery(this: OrderQueryScope): Promise<void> {
  const session = this.getOptions().session ?? undefined;
  const doomed = await Order.findOne(this.getFilter())
    .select('_id')
    .session(session ?? null)
    .lean<{ _id: number }>();
  if (doomed) {
    await OrderItem.deleteMany({ orderId: doomed._id }, { session });
  }
}

OrderSchema.pre('deleteOne', { document: true, query: false }, cascadeFromDocument);
OrderSchema.pre('findOneAndDelete', cascadeFromQuery);

export const Order: Model<IOrder> = mongoose.model<IOrder>('Order', OrderSchema);
