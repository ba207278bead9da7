import { Logger } from '../utils/logger';
import { MalformedResponseError, MandatoryFetchError, NetworkError } from '../utils/errors';
import type { MidPrices, RawOrder, RunWarning, WarningSource } from '../types';
import type { ClearinghouseState, SpotClearinghouseState } from '../schemas/info';
import type { InfoCall, InfoClient } from './infoClient';

export interface Snapshot {
  user: string;
  orders: RawOrder[];
  mids: MidPrices;
  clearinghouse: ClearinghouseState | null;
  spot: SpotClearinghouseState | null;
  warnings: RunWarning[];
}

const asError = (reason: unknown): Error => (reason instanceof Error ? reason : new Error(String(reason)));

/**
 * Runs a call the current command cannot do without.
 * Malformed responses surface as they are; everything else is wrapped with the call name.
 */
export async function fetchMandatory<T>(call: InfoCall, task: () => Promise<T>): Promise<T> {
  try {
    return await task();
  } catch (err) {
    throw mandatoryFailure(call, err);
  }
}

function mandatoryFailure(call: InfoCall, reason: unknown): Error {
  if (reason instanceof MalformedResponseError) return reason;
  return new MandatoryFetchError(call, asError(reason));
}

function optionalOutcome<T>(
  source: WarningSource,
  call: InfoCall,
  outcome: PromiseSettledResult<T>,
  warnings: RunWarning[]
): T | null {
  if (outcome.status === 'fulfilled') return outcome.value;

  const reason = outcome.reason;
  if (reason instanceof NetworkError) {
    const message = `${call} unavailable: ${reason.message}`;
    Logger.warn(`[FETCH] ${message}. Continuing without ${source}.`);
    warnings.push({ source, message });
    return null;
  }
  // Shape errors are never degraded.
  throw asError(reason);
}

/**
 * Issues the four info calls concurrently. Each lands in its own slot and nothing
 * is returned until all of them have settled, so normalization always sees a
 * complete mid-price snapshot.
 */
export async function fetchSnapshot(client: InfoClient, user: string): Promise<Snapshot> {
  Logger.info(`[FETCH] Fetching snapshot for ${user}...`);

  const [orders, mids, clearinghouse, spot] = await Promise.allSettled([
    client.openOrders(user),
    client.allMids(),
    client.clearinghouseState(user),
    client.spotClearinghouseState(user),
  ]);

  if (orders.status === 'rejected') throw mandatoryFailure('openOrders', orders.reason);
  if (mids.status === 'rejected') throw mandatoryFailure('allMids', mids.reason);

  const warnings: RunWarning[] = [];
  const snapshot: Snapshot = {
    user,
    orders: orders.value,
    mids: mids.value,
    clearinghouse: optionalOutcome('positions', 'clearinghouseState', clearinghouse, warnings),
    spot: optionalOutcome('balances', 'spotClearinghouseState', spot, warnings),
    warnings,
  };

  Logger.info(
    `[FETCH] ${snapshot.orders.length} orders, ${Object.keys(snapshot.mids).length} mids` +
      (warnings.length > 0 ? `, ${warnings.length} warning(s)` : '')
  );
  return snapshot;
}
