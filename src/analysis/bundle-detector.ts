import { logger } from '../utils/logger.js';
import { clusterWindows, resolveDetectionOptions } from './window-clusterer.js';
import { scoreWindows } from './cluster-scorer.js';
import { filterClusters } from './cluster-filter.js';
import { SECONDS_PER_DAY } from '../constants.js';
import type { BundleDetectionResult, DetectionOptions, LaunchReference, Transaction } from '../types.js';

export interface DetectBundlesOptions extends Partial<DetectionOptions> {
  /** Token creation time; only used to pick the launch reference. */
  creationTs?: number;
  /** Creation anchor further than this from the first buy is considered unreliable. */
  creationDriftSeconds?: number;
}

/** Buys only, ascending by timestamp. Stable, so equal timestamps keep feed order. */
export function sortedBuys(transactions: readonly Transaction[]): Transaction[] {
  return transactions
    .filter((tx) => tx.txType === 'buy')
    .map((tx, i) => ({ tx, i }))
    .sort((a, b) => a.tx.timestamp - b.tx.timestamp || a.i - b.i)
    .map(({ tx }) => tx);
}

export function resolveLaunchReference(
  creationTs: number | undefined,
  earliestTxTime: number,
  driftSeconds = SECONDS_PER_DAY,
): { launchTime: number; launchReference: LaunchReference } {
  if (creationTs && Math.abs(creationTs - earliestTxTime) <= driftSeconds) {
    return { launchTime: creationTs, launchReference: 'creation' };
  }
  return { launchTime: earliestTxTime, launchReference: 'earliest_transaction' };
}

/**
 * Detects coordinated ("bundled") buying among a token's earliest trades.
 *
 * Pipeline: buys sorted ascending → overlapping time windows → per-window
 * diversity/coherence score → accept on low diversity or high score →
 * token-volume rollup deduplicated by transaction.
 *
 * Pure: the same input always yields the same clusters.
 */
export function detectBundles(
  transactions: readonly Transaction[],
  opts: DetectBundlesOptions = {},
): BundleDetectionResult {
  const { creationTs, creationDriftSeconds, ...detectionOpts } = opts;
  const options = resolveDetectionOptions(detectionOpts);
  const buys = sortedBuys(transactions);

  if (buys.length === 0) {
    return {
      bundledDetected: false,
      clusters: [],
      totalBundledTokens: 0,
      candidateCount: 0,
      transactions: buys,
      launchTime: creationTs ?? 0,
      launchReference: creationTs ? 'creation' : 'earliest_transaction',
    };
  }

  const { launchTime, launchReference } = resolveLaunchReference(creationTs, buys[0].timestamp, creationDriftSeconds);
  if (creationTs && launchReference === 'earliest_transaction') {
    logger.warn(`[bundle] Creation time ${creationTs} is far from first buy ${buys[0].timestamp}, using earliest transaction as launch reference`);
  }

  const windows = clusterWindows(buys, options);
  const candidates = scoreWindows(windows, options);
  const { accepted, totalBundledTokens } = filterClusters(candidates, buys, options);

  logger.debug(
    `[bundle] ${buys.length} buys → ${candidates.length} candidate windows → ${accepted.length} accepted (tokens=${totalBundledTokens.toFixed(2)})`,
  );

  return {
    bundledDetected: accepted.length > 0,
    clusters: accepted,
    totalBundledTokens,
    candidateCount: candidates.length,
    transactions: buys,
    launchTime,
    launchReference,
  };
}
