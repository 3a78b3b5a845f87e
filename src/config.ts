import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import { parse as parseYaml } from 'yaml';
import { config as dotenvConfig } from 'dotenv';
import { errorMessage, isRecord } from './utils/helpers.js';
import { ConfigError } from './errors.js';
import { BIRDEYE_API_BASE, FIRST_N_TRANSACTIONS, MORALIS_EVM_BASE, MORALIS_SOLANA_BASE, SECONDS_PER_DAY } from './constants.js';
import type { EngineConfig, OhlcvGranularity, TransactionSource } from './types.js';

dotenvConfig();

type Section = Record<string, unknown>;

const GRANULARITIES: readonly OhlcvGranularity[] = ['1m', '5m', '15m', '30m', '1H', '4H', '1D'];
const TRANSACTION_SOURCES: readonly TransactionSource[] = ['moralis', 'birdeye'];

// Missing file → built-in defaults; a file that exists must parse
function loadYaml(filePath: string): Section {
  if (!existsSync(filePath)) return {};
  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Cannot parse ${filePath}: ${errorMessage(err)}`);
  }
  return isRecord(parsed) ? parsed : {};
}

function section(root: Section, key: string): Section {
  const value = root[key];
  return isRecord(value) ? value : {};
}

function num(sec: Section, key: string, fallback: number): number {
  const value = sec[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function oneOf<T extends string>(allowed: readonly T[], value: unknown, fallback: T): T {
  return allowed.find((a) => a === value) ?? fallback;
}

function env(key: string, fallback = ''): string {
  const val = process.env[key];
  return val === undefined || val === '' ? fallback : val;
}

function envNum(key: string, fallback: number): number {
  const val = process.env[key];
  if (val === undefined || val === '') return fallback;
  const n = Number(val);
  return isNaN(n) ? fallback : n;
}

export function loadConfig(yamlPath = resolve(process.cwd(), 'config', 'default.yaml')): EngineConfig {
  const yaml = loadYaml(yamlPath);
  const detection = section(yaml, 'detection');
  const priceAction = section(yaml, 'price_action');
  const upstream = section(yaml, 'upstream');

  return {
    detection: {
      windowSeconds: envNum('BUNDLE_WINDOW_SECONDS', num(detection, 'window_seconds', 2.0)),
      minTradesInCluster: num(detection, 'min_trades_in_cluster', 3),
      maxWalletDiversity: num(detection, 'max_wallet_diversity', 0.7),
      scoreAcceptThreshold: num(detection, 'score_accept_threshold', 0.5),
      maxTransactions: num(detection, 'max_transactions', FIRST_N_TRANSACTIONS),
      creationDriftSeconds: num(detection, 'creation_drift_seconds', SECONDS_PER_DAY),
    },
    priceAction: {
      windowDays: num(priceAction, 'window_days', 3),
      granularity: oneOf(GRANULARITIES, priceAction.granularity, '1D'),
    },
    upstream: {
      transactionSource: oneOf(TRANSACTION_SOURCES, env('TRANSACTION_SOURCE', String(upstream.transaction_source ?? '')), 'moralis'),
      timeoutMs: num(upstream, 'timeout_ms', 30_000),
      analysisTimeoutMs: num(upstream, 'analysis_timeout_ms', 30_000),
      requestsPerSecond: num(upstream, 'requests_per_second', 5),
      maxConcurrentPages: num(upstream, 'max_concurrent_pages', 3),
      pageSize: num(upstream, 'page_size', 25),
      maxRetries: num(upstream, 'max_retries', 2),
    },
    apiKeys: {
      birdeye: env('BIRDEYE_API_KEY'),
      moralis: env('MORALIS_API_KEY'),
    },
    endpoints: {
      birdeye: env('BIRDEYE_API_BASE', BIRDEYE_API_BASE),
      moralisSolana: env('MORALIS_SOLANA_BASE', MORALIS_SOLANA_BASE),
      moralisEvm: env('MORALIS_EVM_BASE', MORALIS_EVM_BASE),
    },
  };
}

/** Problems that would make an analysis run meaningless. Empty when the config is usable. */
export function validateConfig(config: EngineConfig, opts: { requireApiKeys?: boolean } = {}): string[] {
  const errors: string[] = [];
  const { detection, upstream } = config;

  if (!(detection.windowSeconds >= 0)) errors.push('detection.window_seconds must be >= 0');
  if (!Number.isInteger(detection.minTradesInCluster) || detection.minTradesInCluster < 1) {
    errors.push('detection.min_trades_in_cluster must be a positive integer');
  }
  if (!(detection.maxWalletDiversity > 0 && detection.maxWalletDiversity <= 1)) {
    errors.push('detection.max_wallet_diversity must be in (0, 1]');
  }
  if (detection.maxTransactions < 1) errors.push('detection.max_transactions must be >= 1');
  if (config.priceAction.windowDays <= 0) errors.push('price_action.window_days must be > 0');
  if (upstream.requestsPerSecond <= 0) errors.push('upstream.requests_per_second must be > 0');
  if (upstream.maxConcurrentPages < 1) errors.push('upstream.max_concurrent_pages must be >= 1');

  if (opts.requireApiKeys ?? true) {
    if (!config.apiKeys.birdeye) errors.push('BIRDEYE_API_KEY is required');
    if (upstream.transactionSource === 'moralis' && !config.apiKeys.moralis) {
      errors.push('MORALIS_API_KEY is required when transaction_source is moralis');
    }
  }

  return errors;
}
