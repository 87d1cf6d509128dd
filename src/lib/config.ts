import dotenv from 'dotenv';

dotenv.config();

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function listFromEnv(name: string): string[] {
  return (process.env[name] || '')
    .split(',')
    .map((v) => v.trim().toLowerCase())
    .filter(Boolean);
}

export const config = {
  port: intFromEnv('PORT', 3000),
  mongoUri: process.env.MONGO_URI || 'mongodb://localhost:27017/food-ordering',
  sessionSecret: process.env.SESSION_SECRET || 'dev-secret',
  isProduction: process.env.NODE_ENV === 'production',
  logLevel: process.env.LOG_LEVEL || 'info',
  // Registrations with these emails get the admin role
  adminEmails: listFromEnv('ADMIN_EMAILS'),
  eventLog: {
    collection: 'order_events',
    maxAttempts: 3,
    baseDelayMs: intFromEnv('EVENT_LOG_BASE_DELAY_MS', 1000),
    maxDelayMs: 5000,
  },
  notificationTimeoutMs: 10_000,
};
