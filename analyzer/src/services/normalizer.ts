import { Logger } from '../utils/logger';
import { MissingMidPriceError } from '../utils/errors';
import type { MidPrices, NormalizedOrder, RawOrder, SkippedOrder } from '../types';

export interface NormalizationResult {
  normalized: NormalizedOrder[];
  skipped: SkippedOrder[];
}

export const BPS = 10000;

export function distanceBps(price: number, mid: number): number {
  return ((price - mid) / mid) * BPS;
}

/**
 * Joins one order with its market's mid.
 * Throws MissingMidPriceError when the snapshot has no usable mid for the market.
 */
export function normalizeOrder(order: RawOrder, mids: MidPrices): NormalizedOrder {
  const mid = Object.prototype.hasOwnProperty.call(mids, order.market) ? mids[order.market] : undefined;
  if (mid === undefined || !(mid > 0)) {
    throw new MissingMidPriceError(order.market, order.orderId);
  }

  return {
    ...order,
    mid,
    distanceBps: distanceBps(order.price, mid),
    notional: order.price * order.size,
  };
}

/**
 * Orders without a mid are moved to `skipped` and logged; they never fail the run.
 * Output order is not significant, consumers sort for themselves.
 */
export function normalizeOrders(orders: RawOrder[], mids: MidPrices): NormalizationResult {
  const normalized: NormalizedOrder[] = [];
  const skipped: SkippedOrder[] = [];

  for (const order of orders) {
    try {
      normalized.push(normalizeOrder(order, mids));
    } catch (err) {
      if (!(err instanceof MissingMidPriceError)) throw err;
      Logger.warn(`[NORMALIZE] Skipping order: ${err.message}`);
      skipped.push({ order, reason: err.message });
    }
  }

  if (skipped.length > 0) {
    const markets = new Set(skipped.map(s => s.order.market));
    Logger.warn(`[NORMALIZE] ${skipped.length} order(s) in ${markets.size} market(s) excluded for missing mid prices`);
  }

  return { normalized, skipped };
}
