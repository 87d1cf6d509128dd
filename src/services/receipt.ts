// src/services/receipt.ts
import axios from 'axios';
import { config } from '../lib/config.js';
import { logger } from '../lib/logger.js';
import { SECRET_NAMES, SecretResolver } from '../lib/secrets.js';

export interface ReceiptRequest {
  orderId: number;
  email: string;
  total: number;
}

export type ReceiptOutcome = { status: 'sent'; httpStatus: number } | { status: 'skipped' };

/**
 * Posts the receipt request once, with a timeout and no retry. Resolves to
 * `skipped` when no receipt endpoint is configured; HTTP and network errors
 * reject.
 */
export async function sendReceipt(receipt: ReceiptRequest, secrets: SecretResolver): Promise<ReceiptOutcome> {
  const url = await secrets.resolve(SECRET_NAMES.receiptUrl);
  if (!url) {
    logger.info({ orderId: receipt.orderId }, `${SECRET_NAMES.receiptUrl} not set; skipping receipt`);
    return { status: 'skipped' };
  }

  const response = await axios.post(
    url,
    {
      order_id: receipt.orderId,
      email: receipt.email,
      total: receipt.total,
    },
    { timeout: config.notificationTimeoutMs }
  );

  logger.info({ orderId: receipt.orderId, status: response.status }, 'Receipt requested');
  return { status: 'sent', httpStatus: response.status };
}
