/**
 * config/defaults.ts
 *
 * Responsibilities:
 * 1. Store fallback values for non-critical configuration.
 * 2. Define constant timeouts and intervals.
 */

export const DEFAULTS = {
  INFO_URL: 'https://api.hyperliquid.xyz/info',
  OUTPUT_DIR: './data',
  REQUEST_TIMEOUT_MS: 10000,  // Per info call
  MAX_RETRIES: 1,             // Transient network failures only
  TIER_RATIO_THRESHOLD: 1.5,  // Distance ratio that opens a new tier
  POLL_INTERVAL_MS: 60000,    // Watch mode
};
