import { Request, Response, Router } from 'express';
import { z } from 'zod';
import { config } from '../lib/config.js';
import { logger } from '../lib/logger.js';
import { authenticate } from '../middleware/auth.js';
import { destroySession, regenerateSession } from '../middleware/session.js';
import { validateBody } from '../middleware/validate.js';
import { User, UserRole } from '../models/user.js';
import { hashPassword, verifyPassword } from '../utils/password.js';

export const authRouter = Router();

const credentialsSchema = z.object({
  email: z.string().trim().toLowerCase().email('A valid email is required.'),
  password: z.string().min(1, 'Password is required.'),
});

const registrationSchema = credentialsSchema.extend({
  password: z.string().min(8, 'Password must be at least 8 characters.'),
});

type Credentials = z.infer<typeof credentialsSchema>;

/**
 * POST /api/auth/register
 * Creates a customer account. Emails listed in ADMIN_EMAILS become admins.
 */
authRouter.post('/register', validateBody(registrationSchema), async (req: Request, res: Response) => {
  try {
    const { email, password }: Credentials = req.body;

    if (await User.findOne({ email }).lean()) {
      return res.status(409).json({ error: 'Email already exists.' });
    }

    const role: UserRole = config.adminEmails.includes(email) ? 'admin' : 'customer';
    const user = await User.create({ email, passwordHash: hashPassword(password), role });

    res.status(201).json({ id: user.id, email: user.email, role: user.role, message: 'Account created. Please login.' });
  } catch (err) {
    logger.error({ err }, 'Registration failed');
    res.status(500).json({ error: 'Registration failed due to server error' });
  }
});

/**
 * POST /api/auth/login
 * Starts a fresh session for the account.
 */
authRouter.post('/login', validateBody(credentialsSchema), async (req: Request, res: Response) => {
  try {
    const { email, password }: Credentials = req.body;
    const user = await User.findOne({ email }).lean();

    if (!user || !verifyPassword(password, user.passwordHash)) {
      return res.status(401).json({ error: 'Invalid login.' });
    }

    await regenerateSession(req);
    req.session.userId = user._id.toString();
    req.session.email = user.email;
    req.session.role = user.role;

    res.json({ id: req.session.userId, email: user.email, role: user.role, message: 'Logged in.' });
  } catch (err) {
    logger.error({ err }, 'Login failed');
    res.status(500).json({ error: 'Login failed due to server error' });
  }
});

/**
 * POST /api/auth/logout
 * Ends the session; the cart goes with it.
 */
authRouter.post('/logout', async (req: Request, res: Response) => {
  try {
    await destroySession(req);
    res.clearCookie('sid');
    res.json({ message: 'Logged out.' });
  } catch (err) {
    logger.error({ err }, 'Logout failed');
    res.status(500).json({ error: 'Logout failed' });
  }
});

// GET /api/auth/me
authRouter.get('/me', authenticate(), (req: Request, res: Response) => {
  res.json(req.user);
});
