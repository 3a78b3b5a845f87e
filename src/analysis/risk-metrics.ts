import { logger } from '../utils/logger.js';
import { clamp, round } from '../utils/helpers.js';
import { coefficientOfVariation, gaps } from './stats.js';
import { bundledTransactionIndices } from './cluster-filter.js';
import { FIRST_N_TRANSACTIONS } from '../constants.js';
import type { BundleCluster, RiskMetrics, SophisticationLevel, Transaction } from '../types.js';

export const EMPTY_RISK_METRICS: RiskMetrics = {
  bundleIntensityScore: 0,
  walletConcentrationRisk: 0,
  bundleTimingConsistency: 0,
  earlyTradingDominance: 0,
  coordinationSophistication: 'LOW',
};

/** First occurrence wins when a hash repeats. */
export function indexByHash(transactions: readonly Transaction[]): Map<string, Transaction> {
  const index = new Map<string, Transaction>();
  for (const tx of transactions) {
    if (!index.has(tx.txHash)) index.set(tx.txHash, tx);
  }
  return index;
}

/** Distinct wallets behind a cluster's sample transactions. */
export function clusterSampleWallets(cluster: BundleCluster, byHash: ReadonlyMap<string, Transaction>): Set<string> {
  const wallets = new Set<string>();
  for (const hash of cluster.sampleTxHashes) {
    const wallet = byHash.get(hash)?.wallet;
    if (wallet) wallets.add(wallet);
  }
  return wallets;
}

export interface WalletReuse {
  bundledWallets: Set<string>;
  multiClusterWallets: number;
}

/** How many sampled wallets show up in more than one cluster. */
export function walletReuse(clusters: readonly BundleCluster[], byHash: ReadonlyMap<string, Transaction>): WalletReuse {
  const appearances = new Map<string, number>();
  for (const cluster of clusters) {
    for (const wallet of clusterSampleWallets(cluster, byHash)) {
      appearances.set(wallet, (appearances.get(wallet) ?? 0) + 1);
    }
  }
  let multiClusterWallets = 0;
  for (const count of appearances.values()) {
    if (count > 1) multiClusterWallets++;
  }
  return { bundledWallets: new Set(appearances.keys()), multiClusterWallets };
}

export function clusterStartGaps(clusters: readonly BundleCluster[]): number[] {
  const starts = clusters.map((c) => c.firstUnix).sort((a, b) => a - b);
  return gaps(starts);
}

export function classifySophistication(intensity: number, concentration: number): SophisticationLevel {
  if (intensity > 60 && concentration > 0.5) return 'HIGH';
  if (intensity > 30 || concentration > 0.3) return 'MEDIUM';
  return 'LOW';
}

/**
 * Aggregates accepted clusters into intensity, wallet concentration, timing
 * regularity and early-trading dominance.
 */
export function calculateRiskMetrics(
  clusters: readonly BundleCluster[],
  transactions: readonly Transaction[],
  totalTransactionsAnalyzed: number,
): RiskMetrics {
  if (clusters.length === 0 || transactions.length === 0) {
    return { ...EMPTY_RISK_METRICS };
  }

  const n = Math.max(totalTransactionsAnalyzed, 1);

  // 1. Intensity: how often, how large, and how much of the flow is bundled
  const totalBundledTxs = clusters.reduce((s, c) => s + c.clusterSize, 0);
  const frequency = clusters.length / n;
  const avgClusterSize = totalBundledTxs / clusters.length;
  const density = totalBundledTxs / n;
  const intensity = clamp(frequency * 200 + (avgClusterSize - 3) * 10 + density * 150, 0, 100);

  // 2. Concentration: share of bundled wallets reused across clusters
  const { bundledWallets, multiClusterWallets } = walletReuse(clusters, indexByHash(transactions));
  const concentration = bundledWallets.size > 0
    ? clamp(multiClusterWallets / bundledWallets.size, 0, 1)
    : 0;

  // 3. Timing: regular spacing between cluster starts reads as scripted
  const startGaps = clusterStartGaps(clusters);
  const timingConsistency = startGaps.length > 0
    ? Math.max(0, 1 - Math.min(1, coefficientOfVariation(startGaps) / 2))
    : 0;

  // 4. Early dominance: share of the earliest trades inside any cluster window
  const window = Math.min(FIRST_N_TRANSACTIONS, transactions.length);
  const earlyBundled = bundledTransactionIndices(clusters, transactions, window).size;
  const earlyDominance = window > 0 ? (earlyBundled / window) * 100 : 0;

  const metrics: RiskMetrics = {
    bundleIntensityScore: round(intensity, 1),
    walletConcentrationRisk: round(concentration, 3),
    bundleTimingConsistency: round(timingConsistency, 3),
    earlyTradingDominance: round(earlyDominance, 1),
    coordinationSophistication: classifySophistication(intensity, concentration),
  };

  logger.debug(
    `[risk] intensity=${metrics.bundleIntensityScore} concentration=${metrics.walletConcentrationRisk} timing=${metrics.bundleTimingConsistency} early=${metrics.earlyTradingDominance}% level=${metrics.coordinationSophistication}`,
  );

  return metrics;
}
