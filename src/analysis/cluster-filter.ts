import type { BundleCluster, DetectionOptions, Transaction } from '../types.js';

/** Either low wallet diversity or a high composite score is enough. */
export function isAcceptedCluster(
  cluster: BundleCluster,
  opts: Pick<DetectionOptions, 'maxWalletDiversity' | 'scoreAcceptThreshold'>,
): boolean {
  return cluster.walletDiversityRatio <= opts.maxWalletDiversity || cluster.score >= opts.scoreAcceptThreshold;
}

export function inClusterWindow(cluster: BundleCluster, timestamp: number): boolean {
  return cluster.firstUnix <= timestamp && timestamp <= cluster.firstUnix + cluster.windowSeconds;
}

/**
 * Indices of transactions falling inside any cluster window, each counted once.
 * Scans at most `limit` leading transactions.
 */
export function bundledTransactionIndices(
  clusters: readonly BundleCluster[],
  transactions: readonly Transaction[],
  limit = transactions.length,
): Set<number> {
  const indices = new Set<number>();
  const n = Math.min(limit, transactions.length);
  for (let i = 0; i < n; i++) {
    const ts = transactions[i].timestamp;
    if (clusters.some((c) => inClusterWindow(c, ts))) indices.add(i);
  }
  return indices;
}

/**
 * Tokens received by transactions inside accepted cluster windows.
 * Overlapping windows share members, so each transaction index contributes once.
 */
export function totalBundledTokens(
  accepted: readonly BundleCluster[],
  transactions: readonly Transaction[],
): number {
  const processed = new Set<number>();
  let total = 0;

  for (const cluster of accepted) {
    for (let idx = 0; idx < transactions.length; idx++) {
      if (processed.has(idx)) continue;
      const tx = transactions[idx];
      if (inClusterWindow(cluster, tx.timestamp)) {
        total += tx.tokenAmount;
        processed.add(idx);
      }
    }
  }

  return total;
}

export function filterClusters(
  candidates: readonly BundleCluster[],
  transactions: readonly Transaction[],
  opts: Pick<DetectionOptions, 'maxWalletDiversity' | 'scoreAcceptThreshold'>,
): { accepted: BundleCluster[]; totalBundledTokens: number } {
  const accepted = candidates.filter((c) => isAcceptedCluster(c, opts));
  return { accepted, totalBundledTokens: totalBundledTokens(accepted, transactions) };
}
