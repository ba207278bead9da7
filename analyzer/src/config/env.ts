import dotenv from 'dotenv';
import { DEFAULTS } from './defaults';
import { ConfigError } from '../utils/errors';

dotenv.config();

export interface AnalyzerEnv {
  WALLET_ADDRESS: string;
  INFO_URL: string;
  OUTPUT_DIR: string;
  REQUEST_TIMEOUT_MS: number;
  MAX_RETRIES: number;
  TIER_RATIO_THRESHOLD: number;
  POLL_INTERVAL_MS: number;
}

const ADDRESS_PATTERN = /^0x[a-fA-F0-9]{40}$/;

const num = (raw: string | undefined, fallback: number): number =>
  raw === undefined || raw.trim() === '' ? fallback : Number(raw);

export function readEnv(source: NodeJS.ProcessEnv = process.env): AnalyzerEnv {
  return {
    // ---- Required ----
    WALLET_ADDRESS: (source.WALLET_ADDRESS || '').trim(),

    // ---- Optional ----
    INFO_URL: source.HL_INFO_URL || DEFAULTS.INFO_URL,
    OUTPUT_DIR: source.OUTPUT_DIR || DEFAULTS.OUTPUT_DIR,
    REQUEST_TIMEOUT_MS: num(source.REQUEST_TIMEOUT_MS, DEFAULTS.REQUEST_TIMEOUT_MS),
    MAX_RETRIES: num(source.MAX_RETRIES, DEFAULTS.MAX_RETRIES),
    TIER_RATIO_THRESHOLD: num(source.TIER_RATIO_THRESHOLD, DEFAULTS.TIER_RATIO_THRESHOLD),
    POLL_INTERVAL_MS: num(source.POLL_INTERVAL_MS, DEFAULTS.POLL_INTERVAL_MS),
  };
}

export const ENV = readEnv();

/**
 * Collects every problem before failing, so one run reports all of them.
 */
export function validateEnv(env: AnalyzerEnv = ENV): AnalyzerEnv {
  const problems: string[] = [];

  if (!env.WALLET_ADDRESS) {
    problems.push('WALLET_ADDRESS is required');
  } else if (!ADDRESS_PATTERN.test(env.WALLET_ADDRESS)) {
    problems.push(`WALLET_ADDRESS is not a 0x-prefixed 20-byte hex address: ${env.WALLET_ADDRESS}`);
  }

  if (!Number.isFinite(env.TIER_RATIO_THRESHOLD) || env.TIER_RATIO_THRESHOLD <= 1) {
    problems.push(`TIER_RATIO_THRESHOLD must be a number > 1 (got ${env.TIER_RATIO_THRESHOLD})`);
  }
  if (!Number.isInteger(env.REQUEST_TIMEOUT_MS) || env.REQUEST_TIMEOUT_MS <= 0) {
    problems.push(`REQUEST_TIMEOUT_MS must be a positive integer (got ${env.REQUEST_TIMEOUT_MS})`);
  }
  if (!Number.isInteger(env.MAX_RETRIES) || env.MAX_RETRIES < 0) {
    problems.push(`MAX_RETRIES must be a non-negative integer (got ${env.MAX_RETRIES})`);
  }
  if (!Number.isInteger(env.POLL_INTERVAL_MS) || env.POLL_INTERVAL_MS <= 0) {
    problems.push(`POLL_INTERVAL_MS must be a positive integer (got ${env.POLL_INTERVAL_MS})`);
  }

  if (problems.length > 0) {
    throw new ConfigError(`[CONFIG_FATAL] Invalid configuration: ${problems.join(', ')}`);
  }

  return env;
}
