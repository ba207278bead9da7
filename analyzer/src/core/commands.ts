import { Logger } from '../utils/logger';
import type { InfoClient } from '../services/infoClient';
import { fetchMandatory, fetchSnapshot } from '../services/snapshot';
import { writeTables } from '../services/reportWriter';
import { renderBalances, renderPositions } from '../services/reportTables';
import { buildBalanceRows, buildPositionRows } from '../services/accountReport';
import { logBalancesSummary, logPositionsSummary, logQuotingOverview } from '../services/consoleSummary';
import { buildQuotingReport, buildSnapshotReport, quotingTables } from './pipeline';
import type { RunWarning, TierOptions } from '../types';

export interface CommandContext {
  client: InfoClient;
  user: string;
  outputDir: string;
  tierOptions: TierOptions;
}

export interface RunResult {
  written: string[];
  warnings: RunWarning[];
}

export const COMMAND_NAMES = ['orders', 'positions', 'balances', 'all'] as const;
export type CommandName = (typeof COMMAND_NAMES)[number];

export async function runOrders(ctx: CommandContext): Promise<RunResult> {
  Logger.info(`[ORDERS] Fetching open orders for ${ctx.user}...`);

  const [orders, mids] = await Promise.all([
    fetchMandatory('openOrders', () => ctx.client.openOrders(ctx.user)),
    fetchMandatory('allMids', () => ctx.client.allMids()),
  ]);

  const report = buildQuotingReport(orders, mids, ctx.tierOptions);
  const written = await writeTables(ctx.outputDir, quotingTables(report));
  logQuotingOverview(report.overview);
  return { written, warnings: [] };
}

export async function runPositions(ctx: CommandContext): Promise<RunResult> {
  Logger.info(`[POSITIONS] Fetching positions for ${ctx.user}...`);

  const state = await fetchMandatory('clearinghouseState', () => ctx.client.clearinghouseState(ctx.user));
  const rows = buildPositionRows(state);
  const written = await writeTables(ctx.outputDir, [renderPositions(rows)]);
  logPositionsSummary(rows);
  return { written, warnings: [] };
}

export async function runBalances(ctx: CommandContext): Promise<RunResult> {
  Logger.info(`[BALANCES] Fetching spot balances for ${ctx.user}...`);

  const state = await fetchMandatory('spotClearinghouseState', () => ctx.client.spotClearinghouseState(ctx.user));
  const rows = buildBalanceRows(state);
  const written = await writeTables(ctx.outputDir, [renderBalances(rows)]);
  logBalancesSummary(rows);
  return { written, warnings: [] };
}

/**
 * Orders and mids are mandatory; positions and balances degrade to a warning row.
 */
export async function runAll(ctx: CommandContext): Promise<RunResult> {
  const snapshot = await fetchSnapshot(ctx.client, ctx.user);
  const report = buildSnapshotReport(snapshot, ctx.tierOptions);
  const written = await writeTables(ctx.outputDir, report.tables);

  logQuotingOverview(report.quoting.overview);
  if (report.account.positions) logPositionsSummary(report.account.positions);
  if (report.account.balances) logBalancesSummary(report.account.balances);
  if (snapshot.warnings.length > 0) {
    Logger.warn(`[ALL] Partial report: ${snapshot.warnings.map(w => w.message).join('; ')}`);
  }

  return { written, warnings: snapshot.warnings };
}

export const COMMANDS: Record<CommandName, (ctx: CommandContext) => Promise<RunResult>> = {
  orders: runOrders,
  positions: runPositions,
  balances: runBalances,
  all: runAll,
};
