export type PositionSide = 'LONG' | 'SHORT';

export interface PositionRow {
  coin: string;
  side: PositionSide;
  size: number;
  entryPrice: number;
  positionValue: number;
  unrealizedPnl: number;
  returnOnEquity: number;
  leverage: number;
  marginUsed: number;
  liquidationPrice: number | null;
  cumulativeFunding: number;
}

export interface BalanceRow {
  coin: string;
  total: number;
  hold: number;
  available: number;
  entryNotional: number;
}

export interface AccountOverview {
  positionCount: number;
  longExposure: number;
  shortExposure: number;
  netExposure: number;
  unrealizedPnl: number;
  marginUsed: number;
  perpAccountValue: number;
  spotValue: number;
  totalAccountValue: number;
}
