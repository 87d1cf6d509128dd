// src/services/eventLog.ts
import { config } from '../lib/config.js';
import { logger } from '../lib/logger.js';
import { RetryPolicy, withRetry } from '../utils/retry.js';

/** Append-only document store for order lifecycle events. */
export interface EventSink {
  append(collection: string, document: Record<string, unknown>): Promise<string>;
}

export type OrderEventType = 'PAYMENT_AUTHORISED';

export interface OrderEvent {
  orderId: number;
  userEmail: string;
  event: OrderEventType;
  payload: Record<string, unknown>;
}

export interface EventLogOptions {
  sink: EventSink;
  collection?: string;
  policy?: Partial<RetryPolicy>;
  now?: () => Date;
}

// gRPC status codes worth another attempt
const TRANSIENT_CODES = new Set([4, 8, 10, 13, 14]);
const TRANSIENT_NAMES = new Set(['deadline-exceeded', 'resource-exhausted', 'aborted', 'internal', 'unavailable']);

export function isTransientSinkError(err: unknown): boolean {
  if (typeof err !== 'object' || err === null) return true;
  const code: unknown = Reflect.get(err, 'code');
  if (typeof code === 'number') return TRANSIENT_CODES.has(code);
  if (typeof code === 'string') return TRANSIENT_NAMES.has(code.replace(/^firestore\//, ''));
  // No status code: a transport failure rather than a rejected request
  return true;
}

/**
 * Appends an order event, retrying transient failures. Throws once the
 * retry budget is spent; callers decide whether that matters.
 */
export async function logOrderEvent(event: OrderEvent, options: EventLogOptions): Promise<string> {
  const now = (options.now ?? (() => new Date()))();
  const collection = options.collection ?? config.eventLog.collection;
  const document = {
    order_id: String(event.orderId),
    user_email: event.userEmail,
    event: event.event,
    payload: event.payload,
    created_at: now,
    created_at_iso: now.toISOString(),
  };

  return withRetry(() => options.sink.append(collection, document), {
    maxAttempts: config.eventLog.maxAttempts,
    baseDelayMs: config.eventLog.baseDelayMs,
    maxDelayMs: config.eventLog.maxDelayMs,
    isRetryable: isTransientSinkError,
    onRetry: (err, attempt, delayMs) =>
      logger.warn({ err, attempt, delayMs, orderId: event.orderId }, 'Event log write failed, retrying'),
    ...options.policy,
  });
}
