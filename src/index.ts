import { RateLimiter } from './utils/rate-limiter.js';
import { BirdeyeClient } from './data/birdeye-client.js';
import { MoralisClient } from './data/moralis-client.js';
import { BundlerAnalyzer, type BundlerCollaborators } from './analysis/bundler-analyzer.js';
import type { EngineConfig } from './types.js';

export { loadConfig, validateConfig } from './config.js';
export { BundlerError, ConfigError, UpstreamError } from './errors.js';
export { logger } from './utils/logger.js';
export { detectChain, isValidSolanaAddress } from './utils/helpers.js';
export { AnalysisEmitter } from './detection/event-emitter.js';

export { clusterWindows, DEFAULT_DETECTION_OPTIONS } from './analysis/window-clusterer.js';
export { computeClusterScore, scoreWindows } from './analysis/cluster-scorer.js';
export { filterClusters, totalBundledTokens } from './analysis/cluster-filter.js';
export { detectBundles } from './analysis/bundle-detector.js';
export { calculateRiskMetrics } from './analysis/risk-metrics.js';
export { analyzePresentImpact, calculatePatternRisk, calculateHolderRisk } from './analysis/present-impact.js';
export { analyzePriceAction } from './analysis/price-action.js';
export { BundlerAnalyzer } from './analysis/bundler-analyzer.js';
export type { BundlerCollaborators } from './analysis/bundler-analyzer.js';

export { BirdeyeClient } from './data/birdeye-client.js';
export { MoralisClient } from './data/moralis-client.js';
export { normalizeBirdeyeTx, normalizeMoralisSwap, normalizeTransactions } from './data/ingest.js';

export { toSerializable } from './report/serialize.js';
export { formatBundlerReport } from './report/formatters.js';

export type * from './types.js';

/**
 * Wires the HTTP collaborators from configuration. Birdeye always supplies
 * the creation anchor and candles; the early-buy feed comes from the
 * configured transaction source. Subscribe to progress on `analyzer.events`.
 */
export function createBundlerAnalyzer(
  config: EngineConfig,
  overrides: Partial<BundlerCollaborators> = {},
): BundlerAnalyzer {
  const { upstream, apiKeys, endpoints } = config;
  // Each provider gets its own budget; they are separate API keys
  const http = (name: string) => ({
    timeoutMs: upstream.timeoutMs,
    maxRetries: upstream.maxRetries,
    limiter: new RateLimiter(name, upstream.requestsPerSecond, upstream.requestsPerSecond),
  });

  const birdeye = new BirdeyeClient({
    ...http('birdeye'),
    apiKey: apiKeys.birdeye,
    baseUrl: endpoints.birdeye,
    maxConcurrentPages: upstream.maxConcurrentPages,
  });
  const moralis = apiKeys.moralis
    ? new MoralisClient({
      ...http('moralis'),
      apiKey: apiKeys.moralis,
      solanaBaseUrl: endpoints.moralisSolana,
      evmBaseUrl: endpoints.moralisEvm,
      pageSize: upstream.pageSize,
    })
    : null;

  const useMoralisFeed = upstream.transactionSource === 'moralis' && moralis !== null;
  const collaborators: BundlerCollaborators = {
    creationInfo: birdeye.asCreationInfoProvider(),
    transactions: moralis && useMoralisFeed ? moralis.asTransactionFeed() : birdeye.asTransactionFeed(),
    holders: moralis?.asHolderStatsProvider() ?? null,
    ohlcv: birdeye.asOhlcvProvider(),
    source: useMoralisFeed
      ? 'Moralis for transactions and holders, Birdeye for creation info and OHLCV'
      : 'Birdeye for transactions, creation info and OHLCV',
    ...overrides,
  };

  return new BundlerAnalyzer(collaborators, config);
}
