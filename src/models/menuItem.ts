// src/models/menuItem.ts
import mongoose, { Schema, Document, Model } from 'mongoose';

export interface IMenuItem extends Document<number> {
  name: string;
  category: string;
  description?: string;
  price: number;
  image?: string; // filename or URL of the picture
  createdAt: Date;
  updatedAt: Date;
}

const MenuItemSchema = new Schema<IMenuItem>(
  {
    _id: { type: Number, required: true },
    name: { type: String, required: true, trim: true, maxlength: 120 },
    category: { type: String, required: true, trim: true, maxlength: 60, index: true },
    description: { type: String, maxlength: 500 },
    price: { type: Number, required: true, min: 0 },
    image: { type: String, maxlength: 255 },
  },
  { timestamps: true }
);

export const MenuItem: Model<IMenuItem> = mongoose.model<IMenuItem>('MenuItem', MenuItemSchema);
