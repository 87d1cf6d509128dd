import { db } from '../lib/firebaseAdmin.js';
import { EventSink } from './eventLog.js';

export const firestoreEventSink: EventSink = {
  async append(collection, document) {
    const ref = await db.collection(collection).add(document);
    return ref.id;
  },
};
