import type { AccountOverview, BalanceRow, PositionRow } from '../types/accounts';
import type { ClearinghouseState, SpotClearinghouseState } from '../schemas/info';

// Quote asset: its entry notional is reported as 0, so it counts at face value.
const QUOTE_COIN = 'USDC';

export function buildPositionRows(state: ClearinghouseState): PositionRow[] {
  const rows = state.assetPositions.map(({ position: p }): PositionRow => ({
    coin: p.coin,
    side: p.szi > 0 ? 'LONG' : 'SHORT',
    size: p.szi,
    entryPrice: p.entryPx,
    positionValue: Math.abs(p.szi) * p.entryPx,
    unrealizedPnl: p.unrealizedPnl,
    returnOnEquity: p.returnOnEquity,
    leverage: p.leverage?.value ?? 1,
    marginUsed: p.marginUsed ?? 0,
    liquidationPrice: p.liquidationPx ?? null,
    cumulativeFunding: p.cumFunding?.allTime ?? 0,
  }));

  return rows.sort((a, b) => b.positionValue - a.positionValue || (a.coin < b.coin ? -1 : 1));
}

export function buildBalanceRows(state: SpotClearinghouseState): BalanceRow[] {
  const rows = state.balances.map((b): BalanceRow => {
    const hold = b.hold ?? 0;
    return {
      coin: b.coin,
      total: b.total,
      hold,
      available: b.total - hold,
      entryNotional: b.entryNtl ?? 0,
    };
  });

  return rows.sort((a, b) => b.entryNotional - a.entryNotional || (a.coin < b.coin ? -1 : 1));
}

export function computeAccountOverview(
  positions: PositionRow[],
  balances: BalanceRow[],
  state: ClearinghouseState
): AccountOverview {
  let longExposure = 0;
  let shortExposure = 0;
  let unrealizedPnl = 0;
  let marginUsed = 0;

  for (const p of positions) {
    if (p.side === 'LONG') longExposure += p.positionValue;
    else shortExposure += p.positionValue;
    unrealizedPnl += p.unrealizedPnl;
    marginUsed += p.marginUsed;
  }

  let spotValue = balances.reduce((acc, b) => acc + b.entryNotional, 0);
  const quote = balances.find(b => b.coin === QUOTE_COIN);
  if (quote) spotValue += quote.total;

  const perpAccountValue = state.marginSummary.accountValue;

  return {
    positionCount: positions.length,
    longExposure,
    shortExposure,
    netExposure: longExposure - shortExposure,
    unrealizedPnl,
    marginUsed,
    perpAccountValue,
    spotValue,
    totalAccountValue: perpAccountValue + spotValue,
  };
}
