import axios, { type AxiosRequestConfig } from 'axios';
import type { z } from 'zod';
import { Logger } from '../utils/logger';
import { NetworkError, describeError } from '../utils/errors';
import type { MidPrices, RawOrder } from '../types';
import {
  AllMidsSchema,
  ClearinghouseStateSchema,
  OpenOrdersSchema,
  SpotClearinghouseStateSchema,
  parseInfoResponse,
  type ClearinghouseState,
  type SpotClearinghouseState,
} from '../schemas/info';

export type InfoRequest =
  | { type: 'openOrders'; user: string }
  | { type: 'allMids' }
  | { type: 'clearinghouseState'; user: string }
  | { type: 'spotClearinghouseState'; user: string };

export type InfoCall = InfoRequest['type'];

/**
 * The slice of an axios instance the client needs. Tests hand in a fake.
 */
export interface InfoTransport {
  post(url: string, body: InfoRequest, config: AxiosRequestConfig): Promise<{ data: unknown }>;
}

export interface InfoClientOptions {
  url: string;
  timeoutMs: number;
  maxRetries: number;
  transport?: InfoTransport;
}

const TRANSIENT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT', 'ECONNRESET', 'ECONNREFUSED', 'EAI_AGAIN', 'EPIPE', 'ERR_NETWORK']);

/**
 * Classifies a transport failure. Anything without an HTTP response, plus 429 and 5xx,
 * is worth one more try; other statuses are not.
 */
export function toNetworkError(call: InfoCall, err: unknown): NetworkError {
  if (axios.isAxiosError(err)) {
    const status = err.response?.status;
    if (status !== undefined) {
      const transient = status === 429 || status >= 500;
      return new NetworkError(call, `HTTP ${status}`, transient, status);
    }
    const code = err.code ?? 'UNKNOWN';
    return new NetworkError(call, `${code} ${err.message}`.trim(), TRANSIENT_CODES.has(code));
  }
  return new NetworkError(call, describeError(err), false);
}

/**
 * Read-only client for the exchange `info` endpoint.
 * Every request is a JSON POST to the same URL, discriminated by `type`.
 */
export class InfoClient {
  private readonly transport: InfoTransport;

  constructor(private readonly options: InfoClientOptions) {
    this.transport = options.transport ?? axios.create({ headers: { 'Content-Type': 'application/json' } });
  }

  public async openOrders(user: string): Promise<RawOrder[]> {
    return this.query({ type: 'openOrders', user }, OpenOrdersSchema);
  }

  public async allMids(): Promise<MidPrices> {
    return this.query({ type: 'allMids' }, AllMidsSchema);
  }

  public async clearinghouseState(user: string): Promise<ClearinghouseState> {
    return this.query({ type: 'clearinghouseState', user }, ClearinghouseStateSchema);
  }

  public async spotClearinghouseState(user: string): Promise<SpotClearinghouseState> {
    return this.query({ type: 'spotClearinghouseState', user }, SpotClearinghouseStateSchema);
  }

  private async query<S extends z.ZodTypeAny>(request: InfoRequest, schema: S): Promise<z.output<S>> {
    const data = await this.post(request);
    return parseInfoResponse(request.type, schema, data);
  }

  private async post(request: InfoRequest): Promise<unknown> {
    const attempts = 1 + this.options.maxRetries;

    for (let attempt = 1; ; attempt++) {
      try {
        const res = await this.transport.post(this.options.url, request, { timeout: this.options.timeoutMs });
        return res.data;
      } catch (err) {
        const failure = toNetworkError(request.type, err);
        if (!failure.transient || attempt >= attempts) throw failure;
        Logger.warn(`[FETCH] ${request.type} attempt ${attempt}/${attempts} failed, retrying: ${failure.message}`);
      }
    }
  }
}
