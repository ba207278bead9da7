import { vi } from 'vitest';
import { InfoClient, type InfoRequest, type InfoTransport } from '../services/infoClient';
import { normalizeOrder } from '../services/normalizer';
import type { MidPrices, NormalizedOrder, OrderSide, RawOrder } from '../types';

export const WALLET = '0x1111111111111111111111111111111111111111';
export const INFO_URL = 'https://info.test/info';

let nextId = 1;

export function rawOrder(market: string, side: OrderSide, price: number, size: number, orderId?: string): RawOrder {
  return { market, side, price, size, orderId: orderId ?? String(nextId++), timestamp: 0 };
}

export function normalized(order: RawOrder, mid: number): NormalizedOrder {
  return normalizeOrder(order, { [order.market]: mid });
}

export function apiOrder(coin: string, side: 'B' | 'A', limitPx: string, sz: string, oid: number) {
  return { coin, side, limitPx, sz, oid, timestamp: 1700000000000 + oid, origSz: sz };
}

// mid is a power of two so every distance and spread below is exact in binary floating point
export const ETH_MIDS = { ETH: '1024' };
export const ETH_ORDERS = [
  apiOrder('ETH', 'B', '1023', '1', 11),
  apiOrder('ETH', 'B', '1016', '2', 12),
  apiOrder('ETH', 'A', '1025', '1', 13),
  apiOrder('ETH', 'A', '1040', '3', 14),
];

export const BTC_MIDS: MidPrices = { BTC: 100000 };
export const BTC_BOOK: RawOrder[] = [
  rawOrder('BTC', 'bid', 99999, 1, 'b1'),
  rawOrder('BTC', 'bid', 99900, 2, 'b2'),
  rawOrder('BTC', 'ask', 100010, 1, 'a1'),
  rawOrder('BTC', 'ask', 100200, 2, 'a2'),
];

export const CLEARINGHOUSE_STATE = {
  marginSummary: { accountValue: '100000', totalNtlPos: '50000', totalMarginUsed: '4000' },
  withdrawable: '96000',
  assetPositions: [
    {
      type: 'oneWay',
      position: {
        coin: 'ETH',
        szi: '-10',
        entryPx: '2000',
        unrealizedPnl: '-150.5',
        returnOnEquity: '-0.01',
        leverage: { type: 'cross', value: 5 },
        marginUsed: '4000',
        liquidationPx: '2500',
        cumFunding: { allTime: '12.5', sinceOpen: '1' },
      },
    },
    {
      type: 'oneWay',
      position: {
        coin: 'BTC',
        szi: '0.5',
        entryPx: '60000',
        unrealizedPnl: '250',
        returnOnEquity: '0.02',
        liquidationPx: null,
      },
    },
  ],
};

export const SPOT_STATE = {
  balances: [
    { coin: 'USDC', token: 0, total: '5000', hold: '1000', entryNtl: '0' },
    { coin: 'HYPE', token: 150, total: '100', entryNtl: '2500' },
  ],
};

export type InfoHandler = (request: InfoRequest) => unknown;

export const happyHandler: InfoHandler = request => {
  switch (request.type) {
    case 'openOrders':
      return ETH_ORDERS;
    case 'allMids':
      return ETH_MIDS;
    case 'clearinghouseState':
      return CLEARINGHOUSE_STATE;
    case 'spotClearinghouseState':
      return SPOT_STATE;
  }
};

/**
 * In-process stand-in for the axios instance. A handler that throws behaves like a failed request.
 */
export function fakeTransport(handler: InfoHandler = happyHandler) {
  const post = vi.fn(async (_url: string, body: InfoRequest) => ({ data: handler(body) }));
  const transport: InfoTransport = { post };
  return { transport, post };
}

export function fakeClient(handler: InfoHandler = happyHandler, maxRetries = 0) {
  const { transport, post } = fakeTransport(handler);
  const client = new InfoClient({ url: INFO_URL, timeoutMs: 50, maxRetries, transport });
  return { client, post };
}
