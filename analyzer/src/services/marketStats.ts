import { Logger } from '../utils/logger';
import { BPS } from './normalizer';
import { aggregateTiers, compareByDistance, DEFAULT_TIER_OPTIONS } from './tierAggregator';
import {
  ORDER_SIDES,
  type MarketSummary,
  type NormalizedOrder,
  type QuotingAnalysis,
  type QuotingOverview,
  type Tier,
  type TierOptions,
} from '../types';

const sum = (values: number[]) => values.reduce((acc, v) => acc + v, 0);

/**
 * Consecutive distance deltas within each side, pooled, then averaged.
 * Null when no side has two orders.
 */
export function averageSpacingBps(orders: NormalizedOrder[]): number | null {
  const deltas: number[] = [];

  for (const side of ORDER_SIDES) {
    const ladder = orders.filter(o => o.side === side).sort(compareByDistance);
    for (let i = 1; i < ladder.length; i++) {
      deltas.push(Math.abs(ladder[i].distanceBps) - Math.abs(ladder[i - 1].distanceBps));
    }
  }

  return deltas.length > 0 ? sum(deltas) / deltas.length : null;
}

export function computeMarketSummary(market: string, orders: NormalizedOrder[], mid: number): MarketSummary {
  const bids = orders.filter(o => o.side === 'bid');
  const asks = orders.filter(o => o.side === 'ask');

  const bestBid = bids.length > 0 ? Math.max(...bids.map(o => o.price)) : null;
  const bestAsk = asks.length > 0 ? Math.min(...asks.map(o => o.price)) : null;
  const spreadBps = bestBid !== null && bestAsk !== null ? ((bestAsk - bestBid) / mid) * BPS : null;

  const bidNotional = sum(bids.map(o => o.notional));
  const askNotional = sum(asks.map(o => o.notional));

  return {
    market,
    spreadBps,
    bidNotional,
    askNotional,
    orderCount: orders.length,
    avgSpacingBps: averageSpacingBps(orders),

    mid,
    bestBid,
    bestAsk,
    bidCount: bids.length,
    askCount: asks.length,
    bidSize: sum(bids.map(o => o.size)),
    askSize: sum(asks.map(o => o.size)),
    totalNotional: bidNotional + askNotional,
  };
}

export function groupByMarket(orders: NormalizedOrder[]): Map<string, NormalizedOrder[]> {
  const markets = new Map<string, NormalizedOrder[]>();
  for (const order of orders) {
    const bucket = markets.get(order.market);
    if (bucket) bucket.push(order);
    else markets.set(order.market, [order]);
  }
  return markets;
}

/**
 * Per-market summaries (largest total notional first) and every market's tiers in the same market order.
 */
export function summarizeQuoting(orders: NormalizedOrder[], options: TierOptions = DEFAULT_TIER_OPTIONS): QuotingAnalysis {
  const summaries: MarketSummary[] = [];
  const tiersByMarket = new Map<string, Tier[]>();

  for (const [market, marketOrders] of groupByMarket(orders)) {
    summaries.push(computeMarketSummary(market, marketOrders, marketOrders[0].mid));
    tiersByMarket.set(market, aggregateTiers(marketOrders, options));
  }

  summaries.sort((a, b) =>
    b.totalNotional !== a.totalNotional ? b.totalNotional - a.totalNotional : a.market < b.market ? -1 : 1
  );

  const tiers = summaries.flatMap(s => tiersByMarket.get(s.market) ?? []);
  Logger.info(`[STATS] ${summaries.length} markets, ${tiers.length} tiers`);

  return { summaries, tiers };
}

export function computeQuotingOverview(summaries: MarketSummary[], topN: number = 10): QuotingOverview {
  const spreads = summaries
    .map(s => s.spreadBps)
    .filter((s): s is number => s !== null && s > 0);

  return {
    totalOrders: sum(summaries.map(s => s.orderCount)),
    marketsQuoted: summaries.length,
    totalNotional: sum(summaries.map(s => s.totalNotional)),
    bidNotional: sum(summaries.map(s => s.bidNotional)),
    askNotional: sum(summaries.map(s => s.askNotional)),
    topMarkets: [...summaries].sort((a, b) => b.totalNotional - a.totalNotional).slice(0, topN),
    spread:
      spreads.length > 0
        ? { avgBps: sum(spreads) / spreads.length, minBps: Math.min(...spreads), maxBps: Math.max(...spreads) }
        : null,
  };
}
