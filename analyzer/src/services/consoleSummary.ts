import { Logger } from '../utils/logger';
import type { QuotingOverview } from '../types';
import type { BalanceRow, PositionRow } from '../types/accounts';

const usd = (value: number, digits = 0) =>
  `$${value.toLocaleString('en-US', { minimumFractionDigits: digits, maximumFractionDigits: digits })}`;

const pct = (part: number, whole: number) => (whole > 0 ? `${((part / whole) * 100).toFixed(1)}%` : 'n/a');

export function logQuotingOverview(overview: QuotingOverview) {
  if (overview.totalOrders === 0) {
    Logger.info('[SUMMARY] No open orders found.');
    return;
  }

  Logger.info('[SUMMARY] QUOTING STRATEGY');
  Logger.info(`  Total Orders:    ${overview.totalOrders.toLocaleString('en-US')}`);
  Logger.info(`  Markets Quoted:  ${overview.marketsQuoted}`);
  Logger.info(`  Total Notional:  ${usd(overview.totalNotional)}`);
  Logger.info(`  Bid Notional:    ${usd(overview.bidNotional)} (${pct(overview.bidNotional, overview.totalNotional)})`);
  Logger.info(`  Ask Notional:    ${usd(overview.askNotional)} (${pct(overview.askNotional, overview.totalNotional)})`);

  Logger.info('[SUMMARY] TOP MARKETS BY NOTIONAL');
  for (const m of overview.topMarkets) {
    const spread = m.spreadBps === null ? '   n/a' : m.spreadBps.toFixed(2).padStart(6);
    Logger.info(`  ${m.market.padEnd(8)} ${usd(m.totalNotional).padStart(14)}  ${String(m.orderCount).padStart(3)} orders  ${spread} bps spread`);
  }

  if (overview.spread) {
    Logger.info('[SUMMARY] SPREAD STATISTICS');
    Logger.info(`  Average Spread:  ${overview.spread.avgBps.toFixed(2)} bps`);
    Logger.info(`  Tightest Spread: ${overview.spread.minBps.toFixed(2)} bps`);
    Logger.info(`  Widest Spread:   ${overview.spread.maxBps.toFixed(2)} bps`);
  }
}

export function logPositionsSummary(positions: PositionRow[]) {
  if (positions.length === 0) {
    Logger.info('[SUMMARY] No positions found.');
    return;
  }
  const long = positions.filter(p => p.side === 'LONG').reduce((acc, p) => acc + p.positionValue, 0);
  const short = positions.filter(p => p.side === 'SHORT').reduce((acc, p) => acc + p.positionValue, 0);
  const pnl = positions.reduce((acc, p) => acc + p.unrealizedPnl, 0);

  Logger.info(`[SUMMARY] ${positions.length} positions`);
  Logger.info(`  Total Long Exposure:  ${usd(long, 2)}`);
  Logger.info(`  Total Short Exposure: ${usd(short, 2)}`);
  Logger.info(`  Net Exposure:         ${usd(long - short, 2)}`);
  Logger.info(`  Unrealized PnL:       ${usd(pnl, 2)}`);
}

export function logBalancesSummary(balances: BalanceRow[]) {
  if (balances.length === 0) {
    Logger.info('[SUMMARY] No balances found.');
    return;
  }
  Logger.info('[SUMMARY] Top balances by entry value:');
  for (const b of balances.slice(0, 10)) {
    if (b.entryNotional > 1000) {
      Logger.info(`  ${b.coin}: ${b.total.toLocaleString('en-US', { maximumFractionDigits: 2 })} (${usd(b.entryNotional, 2)})`);
    }
  }
}
