import { ORDER_SIDES, type NormalizedOrder, type OrderSide, type Tier, type TierOptions } from '../types';
import { DEFAULTS } from '../config/defaults';

export const DEFAULT_TIER_OPTIONS: TierOptions = {
  ratioThreshold: DEFAULTS.TIER_RATIO_THRESHOLD,
};

const magnitude = (order: NormalizedOrder) => Math.abs(order.distanceBps);

/**
 * Closest to mid first. Ties fall back to price, then order id, so the output
 * never depends on the order the API listed things in.
 */
export function compareByDistance(a: NormalizedOrder, b: NormalizedOrder): number {
  const byDistance = magnitude(a) - magnitude(b);
  if (byDistance !== 0) return byDistance;
  if (a.price !== b.price) return a.price - b.price;
  return a.orderId < b.orderId ? -1 : a.orderId > b.orderId ? 1 : 0;
}

function opensNewTier(distance: number, representative: number, ratioThreshold: number): boolean {
  if (representative === 0) return distance > 0;
  return distance / representative >= ratioThreshold;
}

function buildTier(group: NormalizedOrder[], levelIndex: number, prior: Tier | undefined): Tier {
  const totalSize = group.reduce((sum, o) => sum + o.size, 0);
  const totalNotional = group.reduce((sum, o) => sum + o.notional, 0);
  const first = group[0];
  const last = group[group.length - 1];

  return {
    market: first.market,
    side: first.side,
    levelIndex,
    distanceLowBps: magnitude(first),
    distanceHighBps: magnitude(last),
    totalSize,
    totalNotional,
    orderCount: group.length,
    sizeMultipleVsPrior: prior && prior.totalSize > 0 ? totalSize / prior.totalSize : null,
    orders: group,
  };
}

/**
 * Splits one side of one market into tiers.
 *
 * Walking outwards from mid, an order starts a new tier once its distance is at
 * least `ratioThreshold` times the distance of the current tier's closest order.
 */
export function tiersForSide(orders: NormalizedOrder[], options: TierOptions = DEFAULT_TIER_OPTIONS): Tier[] {
  if (!(options.ratioThreshold > 1)) {
    throw new RangeError(`ratioThreshold must be > 1 (got ${options.ratioThreshold})`);
  }

  const sorted = [...orders].sort(compareByDistance);
  const groups: NormalizedOrder[][] = [];

  for (const order of sorted) {
    const current = groups[groups.length - 1];
    if (current === undefined || opensNewTier(magnitude(order), magnitude(current[0]), options.ratioThreshold)) {
      groups.push([order]);
    } else {
      current.push(order);
    }
  }

  const tiers: Tier[] = [];
  groups.forEach((group, idx) => {
    tiers.push(buildTier(group, idx + 1, tiers[idx - 1]));
  });
  return tiers;
}

/**
 * Tiers for a single market: bid ladder first, then ask ladder, each indexed from 1.
 */
export function aggregateTiers(orders: NormalizedOrder[], options: TierOptions = DEFAULT_TIER_OPTIONS): Tier[] {
  const markets = new Set(orders.map(o => o.market));
  if (markets.size > 1) {
    throw new Error(`aggregateTiers expects a single market, got ${[...markets].sort().join(', ')}`);
  }

  return ORDER_SIDES.flatMap((side: OrderSide) =>
    tiersForSide(orders.filter(o => o.side === side), options)
  );
}
