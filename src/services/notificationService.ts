import { logger } from '../lib/logger.js';
import { SecretResolver } from '../lib/secrets.js';
import { RetryPolicy } from '../utils/retry.js';
import { DeliveryDetails } from '../utils/validation.js';
import { EventSink, logOrderEvent } from './eventLog.js';
import { sendReceipt } from './receipt.js';

export interface NotificationDeps {
  eventSink: EventSink;
  secrets: SecretResolver;
  retryPolicy?: Partial<RetryPolicy>;
}

export interface OrderPlacedNotice {
  orderId: number;
  email: string;
  total: number;
  delivery: DeliveryDetails;
}

export interface DispatchOutcome {
  eventLog: 'logged' | 'failed';
  receipt: 'sent' | 'skipped' | 'failed';
}

/**
 * Fires the post-payment side channels for a committed order: the event
 * log append and the receipt request. They run independently; a failure in
 * either is logged and never rejects, so the order stands regardless.
 */
export const dispatchOrderNotifications = async (
  notice: OrderPlacedNotice,
  deps: NotificationDeps
): Promise<DispatchOutcome> => {
  const [eventLog, receipt] = await Promise.allSettled([
    logOrderEvent(
      {
        orderId: notice.orderId,
        userEmail: notice.email,
        event: 'PAYMENT_AUTHORISED',
        payload: { delivery: { ...notice.delivery } },
      },
      { sink: deps.eventSink, policy: deps.retryPolicy }
    ),
    sendReceipt({ orderId: notice.orderId, email: notice.email, total: notice.total }, deps.secrets),
  ]);

  const outcome: DispatchOutcome = { eventLog: 'logged', receipt: 'skipped' };

  if (eventLog.status === 'fulfilled') {
    logger.info({ orderId: notice.orderId, documentId: eventLog.value }, 'Order event logged');
  } else {
    outcome.eventLog = 'failed';
    logger.error({ err: eventLog.reason, orderId: notice.orderId }, 'Order event log failed');
  }

  if (receipt.status === 'fulfilled') {
    outcome.receipt = receipt.value.status;
  } else {
    outcome.receipt = 'failed';
    logger.error({ err: receipt.reason, orderId: notice.orderId }, 'Receipt request failed');
  }

  return outcome;
};
