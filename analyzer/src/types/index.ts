/**
 * types/index.ts
 *
 * Shared shapes of the snapshot → report pipeline.
 * Everything here lives for a single run and is discarded once the tables are written.
 */

export type OrderSide = 'bid' | 'ask';

export const ORDER_SIDES: readonly OrderSide[] = ['bid', 'ask'];

export interface RawOrder {
  market: string;
  side: OrderSide;
  price: number;
  size: number;
  orderId: string;
  timestamp: number;
}

// market symbol -> mid price, one snapshot per run
export type MidPrices = Record<string, number>;

export interface NormalizedOrder extends RawOrder {
  mid: number;
  // Signed: (price - mid) / mid * 10000. Bids below mid are negative.
  distanceBps: number;
  notional: number;
}

export interface SkippedOrder {
  order: RawOrder;
  reason: string;
}

export interface Tier {
  market: string;
  side: OrderSide;
  levelIndex: number;        // 1 = closest to mid
  distanceLowBps: number;    // magnitude
  distanceHighBps: number;   // magnitude
  totalSize: number;
  totalNotional: number;
  orderCount: number;
  sizeMultipleVsPrior: number | null;
  orders: NormalizedOrder[];
}

export interface TierOptions {
  ratioThreshold: number;
}

export interface MarketSummary {
  market: string;
  spreadBps: number | null;
  bidNotional: number;
  askNotional: number;
  orderCount: number;
  avgSpacingBps: number | null;

  mid: number;
  bestBid: number | null;
  bestAsk: number | null;
  bidCount: number;
  askCount: number;
  bidSize: number;
  askSize: number;
  totalNotional: number;
}

export interface QuotingAnalysis {
  summaries: MarketSummary[];
  tiers: Tier[];
}

export interface QuotingOverview {
  totalOrders: number;
  marketsQuoted: number;
  totalNotional: number;
  bidNotional: number;
  askNotional: number;
  topMarkets: MarketSummary[];
  spread: { avgBps: number; minBps: number; maxBps: number } | null;
}

export type WarningSource = 'positions' | 'balances';

export interface RunWarning {
  source: WarningSource;
  message: string;
}
