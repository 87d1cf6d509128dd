// src/services/catalog.ts
import { ClientSession } from 'mongoose';
import { IMenuItem, MenuItem } from '../models/menuItem.js';

export interface CatalogEntry {
  id: number;
  name: string;
  category: string;
  description?: string;
  price: number;
  image?: string;
}

export interface CatalogReader {
  findMenuItemsByIds(ids: number[]): Promise<CatalogEntry[]>;
}

type MenuItemFields = Pick<IMenuItem, 'name' | 'category' | 'description' | 'price' | 'image'> & { _id: number };

export function toCatalogEntry(doc: MenuItemFields): CatalogEntry {
  return {
    id: doc._id,
    name: doc.name,
    category: doc.category,
    description: doc.description,
    price: doc.price,
    image: doc.image,
  };
}

export async function findMenuItemsByIds(ids: number[], session?: ClientSession): Promise<CatalogEntry[]> {
  if (!ids.length) return [];
  const docs = await MenuItem.find({ _id: { $in: ids } })
    .session(session ?? null)
    .lean();
  return docs.map(toCatalogEntry);
}

export const mongoCatalog: CatalogReader = {
  findMenuItemsByIds: (ids) => findMenuItemsByIds(ids),
};
