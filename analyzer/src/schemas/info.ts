/**
 * Response schemas for the exchange `info` endpoint.
 *
 * Uses Zod for runtime validation at the edge: every numeric field arrives as a
 * decimal string and must parse to a finite number, otherwise the whole
 * response is rejected.
 */
import { z } from 'zod';
import type { RawOrder } from '../types';
import { MalformedResponseError } from '../utils/errors';

const DECIMAL_PATTERN = /^-?\d+(\.\d+)?([eE][-+]?\d+)?$/;

export const DecimalSchema = z
  .union([z.string(), z.number()])
  .transform((value, ctx) => {
    const parsed = typeof value === 'number' ? value : DECIMAL_PATTERN.test(value) ? Number(value) : NaN;
    if (!Number.isFinite(parsed)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a finite decimal: '${value}'` });
      return z.NEVER;
    }
    return parsed;
  });

export const OpenOrderSchema = z
  .object({
    coin: z.string().min(1),
    side: z.enum(['B', 'A']),
    limitPx: DecimalSchema,
    sz: DecimalSchema,
    oid: z.union([z.number().int(), z.string().min(1)]),
    timestamp: z.number().optional(),
  })
  .transform(
    (o): RawOrder => ({
      market: o.coin,
      side: o.side === 'B' ? 'bid' : 'ask',
      price: o.limitPx,
      size: o.sz,
      orderId: String(o.oid),
      timestamp: o.timestamp ?? 0,
    })
  );

export const OpenOrdersSchema = z.array(OpenOrderSchema);

export const AllMidsSchema = z.record(z.string(), DecimalSchema);

export const AssetPositionSchema = z.object({
  position: z.object({
    coin: z.string().min(1),
    szi: DecimalSchema,
    entryPx: DecimalSchema,
    unrealizedPnl: DecimalSchema,
    returnOnEquity: DecimalSchema,
    leverage: z.object({ type: z.string().optional(), value: z.number() }).optional(),
    marginUsed: DecimalSchema.optional(),
    liquidationPx: DecimalSchema.nullable().optional(),
    cumFunding: z.object({ allTime: DecimalSchema }).optional(),
  }),
});

export const ClearinghouseStateSchema = z.object({
  marginSummary: z.object({
    accountValue: DecimalSchema,
    totalNtlPos: DecimalSchema.optional(),
    totalMarginUsed: DecimalSchema.optional(),
  }),
  withdrawable: DecimalSchema.optional(),
  assetPositions: z.array(AssetPositionSchema),
});

export const SpotBalanceSchema = z.object({
  coin: z.string().min(1),
  total: DecimalSchema,
  hold: DecimalSchema.optional(),
  entryNtl: DecimalSchema.optional(),
});

export const SpotClearinghouseStateSchema = z.object({
  balances: z.array(SpotBalanceSchema),
});

export type ClearinghouseState = z.infer<typeof ClearinghouseStateSchema>;
export type AssetPosition = z.infer<typeof AssetPositionSchema>;
export type SpotClearinghouseState = z.infer<typeof SpotClearinghouseStateSchema>;
export type SpotBalance = z.infer<typeof SpotBalanceSchema>;

export function parseInfoResponse<S extends z.ZodTypeAny>(call: string, schema: S, data: unknown): z.output<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map(issue => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '<root>';
      return `${path}: ${issue.message}`;
    });
    throw new MalformedResponseError(call, issues);
  }
  return result.data;
}
