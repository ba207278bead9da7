import { describe, it, expect } from 'vitest';
import { buildAccountReport, buildQuotingReport, buildSnapshotReport, quotingTables } from '../core/pipeline';
import { FILES } from '../services/reportTables';
import { OpenOrdersSchema, AllMidsSchema, ClearinghouseStateSchema, SpotClearinghouseStateSchema } from '../schemas/info';
import type { Snapshot } from '../services/snapshot';
import type { RenderedTable } from '../services/reportWriter';
import { CLEARINGHOUSE_STATE, ETH_MIDS, ETH_ORDERS, SPOT_STATE, WALLET, rawOrder } from './fixtures';

const frozenSnapshot = (): Snapshot => ({
  user: WALLET,
  orders: OpenOrdersSchema.parse(ETH_ORDERS),
  mids: AllMidsSchema.parse(ETH_MIDS),
  clearinghouse: ClearinghouseStateSchema.parse(CLEARINGHOUSE_STATE),
  spot: SpotClearinghouseStateSchema.parse(SPOT_STATE),
  warnings: [],
});

const contentOf = (tables: RenderedTable[], file: string) => tables.find(t => t.file === file)?.content;

describe('quotingTables', () => {
  const report = buildQuotingReport(OpenOrdersSchema.parse(ETH_ORDERS), AllMidsSchema.parse(ETH_MIDS));
  const tables = quotingTables(report);

  it('renders the summary table', () => {
    expect(contentOf(tables, FILES.SUMMARY)).toBe(
      'market,spread_bps,bid_notional,ask_notional,order_count,avg_spacing_bps,mid_price,best_bid,best_ask,num_bids,num_asks,bid_size,ask_size,total_notional\n' +
        'ETH,19.53125,3055,4145,4,107.421875,1024,1023,1025,2,2,3,4,7200\n'
    );
  });

  it('renders one detail row per order with its tier level', () => {
    expect(contentOf(tables, FILES.DETAILED)).toBe(
      'market,side,price,size,notional,distance_bps,level_index,order_id,timestamp\n' +
        'ETH,bid,1023,1,1023,-9.765625,1,11,1700000000011\n' +
        'ETH,bid,1016,2,2032,-78.125,2,12,1700000000012\n' +
        'ETH,ask,1025,1,1025,9.765625,1,13,1700000000013\n' +
        'ETH,ask,1040,3,3120,156.25,2,14,1700000000014\n'
    );
  });

  it('renders the tier table with an empty multiple for the first tier', () => {
    expect(contentOf(tables, FILES.TIERS)).toBe(
      'market,level_index,distance_low_bps,distance_high_bps,total_size,total_notional,order_count,size_multiple_vs_prior_tier,side\n' +
        'ETH,1,9.765625,9.765625,1,1023,1,,bid\n' +
        'ETH,2,78.125,78.125,2,2032,1,2,bid\n' +
        'ETH,1,9.765625,9.765625,1,1025,1,,ask\n' +
        'ETH,2,156.25,156.25,3,3120,1,3,ask\n'
    );
  });

  it('renders an empty skipped table when every market has a mid', () => {
    expect(contentOf(tables, FILES.SKIPPED)).toBe('market,side,price,size,order_id,reason\n');
  });
});

describe('buildQuotingReport', () => {
  it('keeps orders without a mid out of the summary but lists them as skipped', () => {
    const orders = [...OpenOrdersSchema.parse(ETH_ORDERS), rawOrder('DOGE', 'bid', 0.1, 1000, '99')];

    const report = buildQuotingReport(orders, AllMidsSchema.parse(ETH_MIDS));

    expect(report.analysis.summaries.map(s => s.market)).toEqual(['ETH']);
    expect(contentOf(quotingTables(report), FILES.SKIPPED)).toBe(
      'market,side,price,size,order_id,reason\n' + 'DOGE,bid,0.1,1000,99,No mid price for market DOGE (order 99)\n'
    );
  });
});

describe('buildAccountReport', () => {
  it('skips the overview when balances are missing', () => {
    const report = buildAccountReport(ClearinghouseStateSchema.parse(CLEARINGHOUSE_STATE), null);

    expect(report.positions).toHaveLength(2);
    expect(report.balances).toBeNull();
    expect(report.overview).toBeNull();
  });
});

describe('buildSnapshotReport', () => {
  it('renders every table of a full snapshot', () => {
    const { tables } = buildSnapshotReport(frozenSnapshot());

    expect(tables.map(t => t.file)).toEqual([
      FILES.SUMMARY,
      FILES.DETAILED,
      FILES.TIERS,
      FILES.SKIPPED,
      FILES.POSITIONS,
      FILES.BALANCES,
      FILES.ACCOUNT,
      FILES.WARNINGS,
    ]);
    expect(contentOf(tables, FILES.POSITIONS)).toBe(
      'coin,side,size,entry_price,position_value,unrealized_pnl,return_on_equity,leverage,margin_used,liquidation_price,cumulative_funding\n' +
        'BTC,LONG,0.5,60000,30000,250,0.02,1,0,,0\n' +
        'ETH,SHORT,-10,2000,20000,-150.5,-0.01,5,4000,2500,12.5\n'
    );
    expect(contentOf(tables, FILES.BALANCES)).toBe(
      'coin,total,hold,available,entry_notional\n' + 'HYPE,100,0,100,2500\n' + 'USDC,5000,1000,4000,0\n'
    );
    expect(contentOf(tables, FILES.ACCOUNT)).toBe(
      'metric,value\n' +
        'position_count,2\n' +
        'long_exposure,30000\n' +
        'short_exposure,20000\n' +
        'net_exposure,10000\n' +
        'unrealized_pnl,99.5\n' +
        'margin_used,4000\n' +
        'perp_account_value,100000\n' +
        'spot_value,7500\n' +
        'total_account_value,107500\n'
    );
    expect(contentOf(tables, FILES.WARNINGS)).toBe('source,message\n');
  });

  it('lists degraded data in the warnings table', () => {
    const snapshot = {
      ...frozenSnapshot(),
      spot: null,
      warnings: [{ source: 'balances' as const, message: 'spotClearinghouseState unavailable: [NETWORK] spotClearinghouseState: HTTP 500' }],
    };

    const { tables } = buildSnapshotReport(snapshot);

    expect(tables.map(t => t.file)).not.toContain(FILES.BALANCES);
    expect(tables.map(t => t.file)).not.toContain(FILES.ACCOUNT);
    expect(contentOf(tables, FILES.WARNINGS)).toBe(
      'source,message\n' + 'balances,spotClearinghouseState unavailable: [NETWORK] spotClearinghouseState: HTTP 500\n'
    );
  });

  it('renders byte-identical tables for the same frozen snapshot', () => {
    const first = buildSnapshotReport(frozenSnapshot()).tables;
    const second = buildSnapshotReport(frozenSnapshot()).tables;

    expect(second).toEqual(first);
  });
});
