import { describe, it, expect } from 'vitest';
import { readEnv, validateEnv } from '../config/env';
import { DEFAULTS } from '../config/defaults';
import { ConfigError } from '../utils/errors';
import { WALLET } from './fixtures';

describe('readEnv', () => {
  it('falls back to defaults for everything optional', () => {
    expect(readEnv({ WALLET_ADDRESS: ` ${WALLET} ` })).toEqual({
      WALLET_ADDRESS: WALLET,
      INFO_URL: DEFAULTS.INFO_URL,
      OUTPUT_DIR: './data',
      REQUEST_TIMEOUT_MS: 10000,
      MAX_RETRIES: 1,
      TIER_RATIO_THRESHOLD: 1.5,
      POLL_INTERVAL_MS: 60000,
    });
  });

  it('reads overrides', () => {
    const env = readEnv({
      WALLET_ADDRESS: WALLET,
      HL_INFO_URL: 'http://localhost:3001/info',
      OUTPUT_DIR: '/tmp/out',
      REQUEST_TIMEOUT_MS: '2500',
      MAX_RETRIES: '0',
      TIER_RATIO_THRESHOLD: '2.5',
      POLL_INTERVAL_MS: '5000',
    });

    expect(env).toMatchObject({
      INFO_URL: 'http://localhost:3001/info',
      OUTPUT_DIR: '/tmp/out',
      REQUEST_TIMEOUT_MS: 2500,
      MAX_RETRIES: 0,
      TIER_RATIO_THRESHOLD: 2.5,
      POLL_INTERVAL_MS: 5000,
    });
  });
});

describe('validateEnv', () => {
  it('accepts a complete configuration', () => {
    const env = readEnv({ WALLET_ADDRESS: WALLET });

    expect(validateEnv(env)).toBe(env);
  });

  it('requires a wallet address', () => {
    expect(() => validateEnv(readEnv({}))).toThrow(
      '[CONFIG_FATAL] Invalid configuration: WALLET_ADDRESS is required'
    );
  });

  it('reports every problem at once', () => {
    const env = readEnv({ WALLET_ADDRESS: '0x123', TIER_RATIO_THRESHOLD: '1', MAX_RETRIES: '-1', REQUEST_TIMEOUT_MS: 'soon' });

    let caught: unknown;
    try {
      validateEnv(env);
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught instanceof Error && caught.message).toBe(
      '[CONFIG_FATAL] Invalid configuration: ' +
        'WALLET_ADDRESS is not a 0x-prefixed 20-byte hex address: 0x123, ' +
        'TIER_RATIO_THRESHOLD must be a number > 1 (got 1), ' +
        'REQUEST_TIMEOUT_MS must be a positive integer (got NaN), ' +
        'MAX_RETRIES must be a non-negative integer (got -1)'
    );
  });
});
