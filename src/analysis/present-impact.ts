import { logger } from '../utils/logger.js';
import { errorMessage, round, shortenAddress } from '../utils/helpers.js';
import { clusterStartGaps, indexByHash, walletReuse } from './risk-metrics.js';
import { mean } from './stats.js';
import type {
  BundleCluster,
  Chain,
  HolderStats,
  HolderStatsProvider,
  ImpactRisk,
  PatternRisk,
  PresentImpactResult,
  Transaction,
} from '../types.js';

// Below both of these the data is too thin to score
const MIN_CLUSTERS_FOR_SCORING = 3;
const MIN_BUNDLED_TXS_FOR_SCORING = 15;
const MINIMAL_ACTIVITY_SCORE = 5;

const CLUSTER_VOLUME_TIERS: Array<{ above: number; points: number; label: string }> = [
  { above: 100, points: 40, label: 'Extreme' },
  { above: 50, points: 30, label: 'Very high' },
  { above: 25, points: 20, label: 'High' },
  { above: 10, points: 15, label: 'Moderate' },
  { above: 5, points: 10, label: 'Some' },
  { above: 3, points: 5, label: 'Low' },
];

/**
 * Pattern-only present risk (0-100), independent of holder data.
 *   cluster volume     ≤40
 *   wallet reuse       ≤30
 *   bundle size        ≤20
 *   timing cadence     ≤10
 * Minimal activity (≤3 clusters and ≤15 bundled txs) is pinned at 5.
 */
export function calculatePatternRisk(
  clusters: readonly BundleCluster[],
  transactions: readonly Transaction[],
): PatternRisk {
  const factors: string[] = [];
  const bundleCount = clusters.length;
  const totalBundledTxs = clusters.reduce((s, c) => s + c.clusterSize, 0);

  if (bundleCount <= MIN_CLUSTERS_FOR_SCORING && totalBundledTxs <= MIN_BUNDLED_TXS_FOR_SCORING) {
    factors.push(`Minimal bundle activity (${bundleCount} clusters, ${totalBundledTxs} transactions)`);
    return { score: MINIMAL_ACTIVITY_SCORE, factors };
  }

  let score = 0;

  const tier = CLUSTER_VOLUME_TIERS.find((t) => bundleCount > t.above);
  if (tier) {
    score += tier.points;
    factors.push(`${tier.label} bundle activity (${bundleCount} clusters)`);
  }

  const { bundledWallets, multiClusterWallets } = walletReuse(clusters, indexByHash(transactions));
  const walletCount = bundledWallets.size;
  if (multiClusterWallets > walletCount * 0.5) {
    score += 30;
    factors.push('High wallet reuse across bundles (>50%)');
  } else if (multiClusterWallets > walletCount * 0.3) {
    score += 20;
    factors.push('Significant wallet reuse across bundles (>30%)');
  } else if (multiClusterWallets > 0) {
    score += 10;
    factors.push('Some wallet reuse detected');
  }

  const large = clusters.filter((c) => c.clusterSize > 15).length;
  const veryLarge = clusters.filter((c) => c.clusterSize > 25).length;
  if (veryLarge > 0) {
    score += 20;
    factors.push(`Very large bundle clusters detected (${veryLarge} clusters >25 txs)`);
  } else if (large > bundleCount * 0.4) {
    score += 15;
    factors.push('Many large bundle clusters (>15 transactions)');
  } else if (large > bundleCount * 0.2) {
    score += 10;
    factors.push('Some large bundle clusters detected');
  } else if (large > 0) {
    score += 5;
    factors.push('Few large bundle clusters');
  }

  if (bundleCount > 5) {
    const startGaps = clusterStartGaps(clusters);
    if (startGaps.length > 0) {
      const avgGap = mean(startGaps);
      if (avgGap < 10) {
        score += 10;
        factors.push('Rapid-fire bundle execution (<10s average)');
      } else if (avgGap < 30) {
        score += 5;
        factors.push('Quick bundle succession (<30s average)');
      }
    }
  }

  return { score, factors };
}

export function patternRiskLevel(score: number): ImpactRisk {
  if (score >= 80) return 'CRITICAL';
  if (score >= 60) return 'HIGH';
  if (score >= 35) return 'MEDIUM';
  return 'LOW';
}

// Holder data adds evidence, so MEDIUM needs a higher combined score
export function combinedRiskLevel(score: number): ImpactRisk {
  if (score >= 80) return 'CRITICAL';
  if (score >= 60) return 'HIGH';
  if (score >= 40) return 'MEDIUM';
  return 'LOW';
}

export function calculateHolderRisk(
  bundledWalletsCount: number,
  holders: HolderStats,
): PatternRisk & { penetrationPct: number } {
  const factors: string[] = [];
  let score = 0;

  const penetrationPct = holders.totalHolders > 0 ? (bundledWalletsCount / holders.totalHolders) * 100 : 0;
  if (penetrationPct > 15) {
    score += 30;
    factors.push(`High bundled wallet presence (${penetrationPct.toFixed(1)}%)`);
  } else if (penetrationPct > 10) {
    score += 20;
    factors.push(`Significant bundled wallet presence (${penetrationPct.toFixed(1)}%)`);
  }

  const top10 = holders.top10ConcentrationPct ?? 0;
  if (top10 > 50) {
    score += 20;
    factors.push(`Very high top-10 concentration (${top10.toFixed(1)}%)`);
  }

  const change = holders.holderChange24hPct ?? 0;
  if (change < -10) {
    score += 20;
    factors.push(`Significant holder exodus (${change.toFixed(1)}% in 24h)`);
  }

  return { score, factors, penetrationPct };
}

export interface PresentImpactInput {
  clusters: readonly BundleCluster[];
  transactions: readonly Transaction[];
  tokenAddress: string;
  chain: Chain;
  holders?: HolderStatsProvider | null;
}

/**
 * Present-day risk from historically bundled wallets.
 *
 * Always computes the pattern score; when a holder provider is available and
 * returns data, adds the holder score on top. A failing provider degrades to
 * PATTERN_ONLY_FALLBACK, it never throws. Returns null when no bundled wallet
 * can be resolved from the cluster samples.
 */
export async function analyzePresentImpact(input: PresentImpactInput): Promise<PresentImpactResult | null> {
  const { clusters, transactions, tokenAddress, chain, holders } = input;
  const byHash = indexByHash(transactions);

  const bundledWallets = new Set<string>();
  const initialBuys = new Map<string, number>();
  for (const cluster of clusters) {
    for (const hash of cluster.sampleTxHashes) {
      const tx = byHash.get(hash);
      if (!tx) continue;
      bundledWallets.add(tx.wallet);
      initialBuys.set(tx.wallet, (initialBuys.get(tx.wallet) ?? 0) + tx.tokenAmount);
    }
  }
  if (bundledWallets.size === 0) return null;

  const totalInitialTokensBought = round([...initialBuys.values()].reduce((s, v) => s + v, 0), 2);
  const pattern = calculatePatternRisk(clusters, transactions);
  const patternLevel = patternRiskLevel(pattern.score);

  const patternOnly = (): PresentImpactResult => ({
    bundledWalletsCount: bundledWallets.size,
    totalInitialTokensBought,
    patternRiskScore: pattern.score,
    patternRiskFactors: pattern.factors,
    currentImpactRisk: patternLevel,
    analysisMethod: 'PATTERN_ONLY',
    analysisNote: `Pattern-Based Risk: ${patternLevel} (Score: ${pattern.score}/100). Based on ${clusters.length} bundle clusters and ${bundledWallets.size} unique bundled wallets.`,
  });

  if (!holders) {
    return { ...patternOnly(), dataLimitation: 'Holder data provider not configured' };
  }

  let stats: HolderStats | null;
  try {
    stats = await holders.fetch(chain, tokenAddress);
  } catch (err) {
    const msg = errorMessage(err);
    logger.warn(`[impact] Holder data failed for ${shortenAddress(tokenAddress)}: ${msg.slice(0, 100)}`);
    return {
      ...patternOnly(),
      analysisMethod: 'PATTERN_ONLY_FALLBACK',
      errorNote: `Holder data fetch failed: ${msg}`,
      analysisNote: `Pattern-Based Risk: ${patternLevel} (Score: ${pattern.score}/100). Fallback analysis due to data access issues.`,
    };
  }

  if (!stats) {
    return { ...patternOnly(), dataLimitation: 'Holder data unavailable' };
  }

  const holder = calculateHolderRisk(bundledWallets.size, stats);
  const combined = Math.min(100, pattern.score + holder.score);
  const level = combinedRiskLevel(combined);

  logger.debug(`[impact] ${shortenAddress(tokenAddress)} pattern=${pattern.score} holder=${holder.score} combined=${combined} → ${level}`);

  return {
    bundledWalletsCount: bundledWallets.size,
    totalInitialTokensBought,
    patternRiskScore: pattern.score,
    patternRiskFactors: pattern.factors,
    holderRiskScore: holder.score,
    holderRiskFactors: holder.factors,
    combinedRiskScore: combined,
    totalCurrentHolders: stats.totalHolders,
    bundledWalletPenetrationPct: round(holder.penetrationPct, 2),
    top10ConcentrationPct: stats.top10ConcentrationPct ?? 0,
    holderChange24hPct: stats.holderChange24hPct ?? 0,
    currentImpactRisk: level,
    analysisMethod: 'PATTERN_AND_HOLDER_DATA',
    analysisNote: `Combined Risk: ${level} (Pattern: ${pattern.score}, Holder: ${holder.score})`,
  };
}
