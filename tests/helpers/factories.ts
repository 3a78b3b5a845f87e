import { RateLimiter } from '../../src/utils/rate-limiter.js';
import type { BundleCluster, Candle, EngineConfig, Transaction } from '../../src/types.js';

export const TOKEN = 'So11111111111111111111111111111111111111112';

export function makeTx(
  txHash: string,
  wallet: string,
  timestamp: number,
  overrides: Partial<Transaction> = {},
): Transaction {
  return {
    txHash,
    wallet,
    timestamp,
    txType: 'buy',
    tokenAmount: 100,
    volumeUsd: 10,
    ...overrides,
  };
}

export function makeCluster(overrides: Partial<BundleCluster> = {}): BundleCluster {
  return {
    clusterSize: 3,
    windowSeconds: 2,
    uniqueWallets: 2,
    walletDiversityRatio: 2 / 3,
    score: 0.7,
    sampleTxHashes: [],
    firstUnix: 0,
    ...overrides,
  };
}

export function makeCandle(unixTime: number, open: number, high: number, low: number, close: number, volumeUsd = 100): Candle {
  return { unixTime, open, high, low, close, volumeUsd };
}

/** `count` organic buys, one per `spacing` seconds from `start`, each from its own wallet. */
export function organicTxs(count: number, start: number, spacing = 10, prefix = 'org'): Transaction[] {
  return Array.from({ length: count }, (_, i) =>
    makeTx(`${prefix}-${i}`, `${prefix}-wallet-${i}`, start + i * spacing),
  );
}

export function testConfig(overrides: { analysisTimeoutMs?: number; windowSeconds?: number } = {}): EngineConfig {
  return {
    detection: {
      windowSeconds: overrides.windowSeconds ?? 2,
      minTradesInCluster: 3,
      maxWalletDiversity: 0.7,
      scoreAcceptThreshold: 0.5,
      maxTransactions: 300,
      creationDriftSeconds: 86_400,
    },
    priceAction: { windowDays: 3, granularity: '1D' },
    upstream: {
      transactionSource: 'moralis',
      timeoutMs: 1_000,
      analysisTimeoutMs: overrides.analysisTimeoutMs ?? 5_000,
      requestsPerSecond: 100,
      maxConcurrentPages: 2,
      pageSize: 25,
      maxRetries: 2,
    },
    apiKeys: { birdeye: 'test-key', moralis: 'test-key' },
    endpoints: {
      birdeye: 'https://birdeye.test',
      moralisSolana: 'https://moralis-solana.test',
      moralisEvm: 'https://moralis-evm.test/api/v2.2',
    },
  };
}

export function fastLimiter(): RateLimiter {
  return new RateLimiter('test', 1_000, 1_000);
}
