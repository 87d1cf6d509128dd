// src/services/dailySummary.ts
import axios from 'axios';
import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';
import { config } from '../lib/config.js';
import { logger } from '../lib/logger.js';
import { SECRET_NAMES, SecretResolver } from '../lib/secrets.js';
import { OrderStore } from './orderStore.js';

export interface DailySummary {
  date: string; // YYYY-MM-DD, UTC
  orderCount: number;
  totalSales: number;
  sent: boolean;
}

dayjs.extend(utc);

export function utcDayRange(now: Date): { date: string; from: Date; to: Date } {
  const start = dayjs.utc(now).startOf('day');
  return { date: start.format('YYYY-MM-DD'), from: start.toDate(), to: start.add(1, 'day').toDate() };
}

/**
 * Totals today's orders from their frozen item prices and forwards the
 * figures to the summary endpoint. Delivery problems are logged; the
 * computed summary is returned either way.
 */
export async function runDailySummary(
  store: OrderStore,
  secrets: SecretResolver,
  now: Date = new Date()
): Promise<DailySummary> {
  const { date, from, to } = utcDayRange(now);
  const { orderCount, totalSales } = await store.summarizeSales(from, to);
  const summary: DailySummary = { date, orderCount, totalSales, sent: false };

  const url = await secrets.resolve(SECRET_NAMES.dailySummaryUrl);
  if (!url) {
    logger.info(`${SECRET_NAMES.dailySummaryUrl} not set; skipping daily summary`);
    return summary;
  }

  try {
    await axios.post(
      url,
      { date, total_sales: totalSales, order_count: orderCount },
      { timeout: config.notificationTimeoutMs }
    );
    summary.sent = true;
  } catch (err) {
    logger.error({ err, date }, 'Daily summary request failed');
  }
  return summary;
}
