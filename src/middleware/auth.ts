import { NextFunction, Request, Response } from 'express';
import { UserRole } from '../models/user.js';
// Brings in the SessionData fields read below
import './session.js';

export interface AuthUser {
  id: string;
  email: string;
  role: UserRole;
}

declare global {
  namespace Express {
    interface Request {
      user?: AuthUser;
    }
  }
}

/** Requires a logged-in session and exposes its identity as `req.user`. */
export function authenticate() {
  return (req: Request, res: Response, next: NextFunction) => {
    const { userId, email, role } = req.session;
    if (!userId || !email || !role) {
      return res.status(401).json({ error: 'Please login first.' });
    }

    req.user = { id: userId, email, role };
    return next();
  };
}

export function requireRoles(...allowed: UserRole[]) {
  return (req: Request, res: Response, next: NextFunction) => {
    const user = req.user;
    if (!user) return res.status(401).json({ error: 'Unauthenticated' });

    if (!allowed.length) return next();

    if (!allowed.includes(user.role)) {
      return res.status(403).json({ error: 'Admin access required.' });
    }

    return next();
  };
}
