import MongoStore from 'connect-mongo';
import { Request, RequestHandler } from 'express';
import session, { Store } from 'express-session';
import mongoose, { Connection } from 'mongoose';
import { config } from '../lib/config.js';
import { UserRole } from '../models/user.js';
import { Cart } from '../services/cart.js';
import { CheckoutDraft } from '../services/checkout.js';

declare module 'express-session' {
  interface SessionData {
    userId: string;
    email: string;
    role: UserRole;
    cart: Cart;
    checkout: CheckoutDraft;
  }
}

const ONE_WEEK_MS = 7 * 24 * 60 * 60 * 1000;

/** Sessions live beside the rest of the data, on the Mongoose connection's client. */
export function createMongoSessionStore(connection: Connection = mongoose.connection): Store {
  return MongoStore.create({
    clientPromise: connection.asPromise().then((conn) => conn.getClient()),
    collectionName: 'sessions',
    ttl: ONE_WEEK_MS / 1000,
  });
}

/** Without a store the in-memory one is used, which is only fit for tests. */
export function createSessionMiddleware(store?: Store): RequestHandler {
  return session({
    name: 'sid',
    secret: config.sessionSecret,
    resave: false,
    saveUninitialized: false,
    store,
    cookie: {
      httpOnly: true,
      sameSite: 'lax',
      secure: config.isProduction,
      maxAge: ONE_WEEK_MS,
    },
  });
}

export function regenerateSession(req: Request): Promise<void> {
  return new Promise((resolve, reject) => {
    req.session.regenerate((err: unknown) => (err ? reject(err) : resolve()));
  });
}

export function destroySession(req: Request): Promise<void> {
  return new Promise((resolve, reject) => {
    req.session.destroy((err: unknown) => (err ? reject(err) : resolve()));
  });
}
