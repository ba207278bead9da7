/**
 * Snapshot → tables. Nothing in here touches the network or the disk, so the same
 * frozen snapshot always renders the same bytes.
 */
import { normalizeOrders } from '../services/normalizer';
import { computeQuotingOverview, summarizeQuoting } from '../services/marketStats';
import { DEFAULT_TIER_OPTIONS } from '../services/tierAggregator';
import { buildBalanceRows, buildPositionRows, computeAccountOverview } from '../services/accountReport';
import {
  renderAccount,
  renderBalances,
  renderDetail,
  renderPositions,
  renderSkipped,
  renderSummary,
  renderTiers,
  renderWarnings,
} from '../services/reportTables';
import type { RenderedTable } from '../services/reportWriter';
import type { Snapshot } from '../services/snapshot';
import type { ClearinghouseState, SpotClearinghouseState } from '../schemas/info';
import type { MidPrices, QuotingAnalysis, QuotingOverview, RawOrder, SkippedOrder, TierOptions } from '../types';
import type { AccountOverview, BalanceRow, PositionRow } from '../types/accounts';

export interface QuotingReport {
  analysis: QuotingAnalysis;
  skipped: SkippedOrder[];
  overview: QuotingOverview;
}

export interface AccountReport {
  positions: PositionRow[] | null;
  balances: BalanceRow[] | null;
  overview: AccountOverview | null;
}

export function buildQuotingReport(
  orders: RawOrder[],
  mids: MidPrices,
  options: TierOptions = DEFAULT_TIER_OPTIONS
): QuotingReport {
  const { normalized, skipped } = normalizeOrders(orders, mids);
  const analysis = summarizeQuoting(normalized, options);
  return { analysis, skipped, overview: computeQuotingOverview(analysis.summaries) };
}

export function buildAccountReport(
  clearinghouse: ClearinghouseState | null,
  spot: SpotClearinghouseState | null
): AccountReport {
  const positions = clearinghouse ? buildPositionRows(clearinghouse) : null;
  const balances = spot ? buildBalanceRows(spot) : null;
  const overview =
    clearinghouse && positions && balances ? computeAccountOverview(positions, balances, clearinghouse) : null;
  return { positions, balances, overview };
}

export function quotingTables(report: QuotingReport): RenderedTable[] {
  const { summaries, tiers } = report.analysis;
  return [renderSummary(summaries), renderDetail(tiers), renderTiers(tiers), renderSkipped(report.skipped)];
}

export function accountTables(report: AccountReport): RenderedTable[] {
  const tables: RenderedTable[] = [];
  if (report.positions) tables.push(renderPositions(report.positions));
  if (report.balances) tables.push(renderBalances(report.balances));
  if (report.overview) tables.push(renderAccount(report.overview));
  return tables;
}

export interface SnapshotReport {
  quoting: QuotingReport;
  account: AccountReport;
  tables: RenderedTable[];
}

/**
 * Every table of an `all` run. Rendering finishes before the caller writes anything.
 */
export function buildSnapshotReport(snapshot: Snapshot, options: TierOptions = DEFAULT_TIER_OPTIONS): SnapshotReport {
  const quoting = buildQuotingReport(snapshot.orders, snapshot.mids, options);
  const account = buildAccountReport(snapshot.clearinghouse, snapshot.spot);
  const tables = [...quotingTables(quoting), ...accountTables(account), renderWarnings(snapshot.warnings)];
  return { quoting, account, tables };
}
