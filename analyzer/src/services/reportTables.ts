/**
 * Column layouts of every table the analyzer writes.
 * Leading columns are fixed; trailing columns carry extra context and may grow.
 */
import type { MarketSummary, NormalizedOrder, RunWarning, SkippedOrder, Tier } from '../types';
import type { AccountOverview, BalanceRow, PositionRow } from '../types/accounts';
import { renderTable, type RenderedTable, type TableSpec } from './reportWriter';

export const FILES = {
  SUMMARY: 'quoting_strategy_summary.csv',
  DETAILED: 'quoting_strategy_detailed.csv',
  TIERS: 'quoting_strategy_tiers.csv',
  SKIPPED: 'quoting_strategy_skipped.csv',
  POSITIONS: 'positions.csv',
  BALANCES: 'balances.csv',
  ACCOUNT: 'account_summary.csv',
  WARNINGS: 'run_warnings.csv',
} as const;

export const SUMMARY_TABLE: TableSpec<MarketSummary> = {
  file: FILES.SUMMARY,
  columns: [
    { header: 'market', value: s => s.market },
    { header: 'spread_bps', value: s => s.spreadBps },
    { header: 'bid_notional', value: s => s.bidNotional },
    { header: 'ask_notional', value: s => s.askNotional },
    { header: 'order_count', value: s => s.orderCount },
    { header: 'avg_spacing_bps', value: s => s.avgSpacingBps },
    { header: 'mid_price', value: s => s.mid },
    { header: 'best_bid', value: s => s.bestBid },
    { header: 'best_ask', value: s => s.bestAsk },
    { header: 'num_bids', value: s => s.bidCount },
    { header: 'num_asks', value: s => s.askCount },
    { header: 'bid_size', value: s => s.bidSize },
    { header: 'ask_size', value: s => s.askSize },
    { header: 'total_notional', value: s => s.totalNotional },
  ],
};

export interface DetailRow {
  order: NormalizedOrder;
  levelIndex: number;
}

export const DETAIL_TABLE: TableSpec<DetailRow> = {
  file: FILES.DETAILED,
  columns: [
    { header: 'market', value: r => r.order.market },
    { header: 'side', value: r => r.order.side },
    { header: 'price', value: r => r.order.price },
    { header: 'size', value: r => r.order.size },
    { header: 'notional', value: r => r.order.notional },
    { header: 'distance_bps', value: r => r.order.distanceBps },
    { header: 'level_index', value: r => r.levelIndex },
    { header: 'order_id', value: r => r.order.orderId },
    { header: 'timestamp', value: r => r.order.timestamp },
  ],
};

export const TIER_TABLE: TableSpec<Tier> = {
  file: FILES.TIERS,
  columns: [
    { header: 'market', value: t => t.market },
    { header: 'level_index', value: t => t.levelIndex },
    { header: 'distance_low_bps', value: t => t.distanceLowBps },
    { header: 'distance_high_bps', value: t => t.distanceHighBps },
    { header: 'total_size', value: t => t.totalSize },
    { header: 'total_notional', value: t => t.totalNotional },
    { header: 'order_count', value: t => t.orderCount },
    { header: 'size_multiple_vs_prior_tier', value: t => t.sizeMultipleVsPrior },
    { header: 'side', value: t => t.side },
  ],
};

export const SKIPPED_TABLE: TableSpec<SkippedOrder> = {
  file: FILES.SKIPPED,
  columns: [
    { header: 'market', value: s => s.order.market },
    { header: 'side', value: s => s.order.side },
    { header: 'price', value: s => s.order.price },
    { header: 'size', value: s => s.order.size },
    { header: 'order_id', value: s => s.order.orderId },
    { header: 'reason', value: s => s.reason },
  ],
};

export const POSITIONS_TABLE: TableSpec<PositionRow> = {
  file: FILES.POSITIONS,
  columns: [
    { header: 'coin', value: p => p.coin },
    { header: 'side', value: p => p.side },
    { header: 'size', value: p => p.size },
    { header: 'entry_price', value: p => p.entryPrice },
    { header: 'position_value', value: p => p.positionValue },
    { header: 'unrealized_pnl', value: p => p.unrealizedPnl },
    { header: 'return_on_equity', value: p => p.returnOnEquity },
    { header: 'leverage', value: p => p.leverage },
    { header: 'margin_used', value: p => p.marginUsed },
    { header: 'liquidation_price', value: p => p.liquidationPrice },
    { header: 'cumulative_funding', value: p => p.cumulativeFunding },
  ],
};

export const BALANCES_TABLE: TableSpec<BalanceRow> = {
  file: FILES.BALANCES,
  columns: [
    { header: 'coin', value: b => b.coin },
    { header: 'total', value: b => b.total },
    { header: 'hold', value: b => b.hold },
    { header: 'available', value: b => b.available },
    { header: 'entry_notional', value: b => b.entryNotional },
  ],
};

type Metric = [string, number];

export const ACCOUNT_TABLE: TableSpec<Metric> = {
  file: FILES.ACCOUNT,
  columns: [
    { header: 'metric', value: ([name]) => name },
    { header: 'value', value: ([, value]) => value },
  ],
};

export const WARNINGS_TABLE: TableSpec<RunWarning> = {
  file: FILES.WARNINGS,
  columns: [
    { header: 'source', value: w => w.source },
    { header: 'message', value: w => w.message },
  ],
};

/**
 * One detail row per order, in tier order: market, then side, then level, then distance.
 */
export function detailRows(tiers: Tier[]): DetailRow[] {
  return tiers.flatMap(tier => tier.orders.map(order => ({ order, levelIndex: tier.levelIndex })));
}

export function accountMetrics(overview: AccountOverview): Metric[] {
  return [
    ['position_count', overview.positionCount],
    ['long_exposure', overview.longExposure],
    ['short_exposure', overview.shortExposure],
    ['net_exposure', overview.netExposure],
    ['unrealized_pnl', overview.unrealizedPnl],
    ['margin_used', overview.marginUsed],
    ['perp_account_value', overview.perpAccountValue],
    ['spot_value', overview.spotValue],
    ['total_account_value', overview.totalAccountValue],
  ];
}

export const renderSummary = (rows: MarketSummary[]): RenderedTable => renderTable(SUMMARY_TABLE, rows);
export const renderDetail = (tiers: Tier[]): RenderedTable => renderTable(DETAIL_TABLE, detailRows(tiers));
export const renderTiers = (tiers: Tier[]): RenderedTable => renderTable(TIER_TABLE, tiers);
export const renderSkipped = (rows: SkippedOrder[]): RenderedTable => renderTable(SKIPPED_TABLE, rows);
export const renderPositions = (rows: PositionRow[]): RenderedTable => renderTable(POSITIONS_TABLE, rows);
export const renderBalances = (rows: BalanceRow[]): RenderedTable => renderTable(BALANCES_TABLE, rows);
export const renderAccount = (overview: AccountOverview): RenderedTable =>
  renderTable(ACCOUNT_TABLE, accountMetrics(overview));
export const renderWarnings = (rows: RunWarning[]): RenderedTable => renderTable(WARNINGS_TABLE, rows);
