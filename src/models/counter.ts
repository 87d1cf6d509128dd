// src/models/counter.ts
import mongoose, { ClientSession, Model, Schema } from 'mongoose';

export interface ICounter {
  _id: string;
  seq: number;
}

const CounterSchema = new Schema<ICounter>(
  {
    _id: { type: String, required: true },
    seq: { type: Number, default: 0 },
  },
  { versionKey: false }
);

export const Counter: Model<ICounter> = mongoose.model<ICounter>('Counter', CounterSchema);

/**
 * Allocates the next integer id for a collection. When called with a
 * session the increment rolls back together with the surrounding
 * transaction.
 */
export async function nextSequence(name: string, session?: ClientSession): Promise<number> {
  const counter = await Counter.findOneAndUpdate(
    { _id: name },
    { $inc: { seq: 1 } },
    { new: true, upsert: true, session }
  ).lean();
  if (!counter) {
    throw new Error(`Sequence ${name} could not be allocated`);
  }
  return counter.seq;
}
