/**
 * utils/errors.ts
 *
 * Error taxonomy for a snapshot run.
 * Fatal vs. non-fatal is decided by the caller (see services/snapshot.ts),
 * not by the error class.
 */

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Transport failure of an info call (timeout, refused connection, non-2xx status).
 */
export class NetworkError extends Error {
  constructor(
    public readonly call: string,
    message: string,
    public readonly transient: boolean,
    public readonly status?: number
  ) {
    super(`[NETWORK] ${call}: ${message}`);
    this.name = 'NetworkError';
  }
}

/**
 * The API answered, but not with the shape we expect.
 */
export class MalformedResponseError extends Error {
  constructor(
    public readonly call: string,
    public readonly issues: string[]
  ) {
    super(`[MALFORMED_RESPONSE] ${call}: ${issues.join('; ')}`);
    this.name = 'MalformedResponseError';
  }
}

export class MissingMidPriceError extends Error {
  constructor(
    public readonly market: string,
    public readonly orderId: string
  ) {
    super(`No mid price for market ${market} (order ${orderId})`);
    this.name = 'MissingMidPriceError';
  }
}

export class OutputWriteError extends Error {
  constructor(
    public readonly file: string,
    message: string
  ) {
    super(`[OUTPUT_FATAL] ${file}: ${message}`);
    this.name = 'OutputWriteError';
  }
}

/**
 * Raised when openOrders or allMids (or the single call of a one-shot command)
 * cannot be completed. Downstream computation has nothing to work on.
 */
export class MandatoryFetchError extends Error {
  constructor(
    public readonly call: string,
    public readonly failure: Error
  ) {
    super(`[FETCH_FATAL] Mandatory call '${call}' failed: ${failure.message}`);
    this.name = 'MandatoryFetchError';
  }
}

export const describeError = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);
