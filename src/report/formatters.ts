import { ENGINE_VERSION } from '../constants.js';
import { shortenAddress } from '../utils/helpers.js';
import type { BundleCluster, BundlerAnalysisReport, ImpactRisk, SelloffSeverity } from '../types.js';

const RISK_ICON: Record<ImpactRisk, string> = {
  LOW: '🟢',
  MEDIUM: '🟡',
  HIGH: '🟠',
  CRITICAL: '🔴',
};

const SEVERITY_ICON: Record<SelloffSeverity, string> = {
  NONE: '➖',
  MILD: '📉',
  MODERATE: '📉',
  SEVERE: '💥',
  EXTREME: '💥',
  UNKNOWN: '❔',
};

const TOP_CLUSTERS = 5;

function formatCluster(c: BundleCluster, i: number): string {
  return `  ${i + 1}. ${c.clusterSize} txs | ${c.uniqueWallets} wallets | diversity ${c.walletDiversityRatio.toFixed(2)} | score ${c.score.toFixed(2)} | t=${c.firstUnix}`;
}

/** Top clusters by size; ties keep detection order. */
export function topClusters(clusters: readonly BundleCluster[], limit = TOP_CLUSTERS): BundleCluster[] {
  return clusters
    .map((c, i) => ({ c, i }))
    .sort((a, b) => b.c.clusterSize - a.c.clusterSize || a.i - b.i)
    .slice(0, limit)
    .map(({ c }) => c);
}

export function formatBundlerReport(report: BundlerAnalysisReport): string {
  const { meta } = report;
  const lines = [
    `🔍 Bundle Analysis: ${shortenAddress(meta.tokenAddress)} (${meta.chain})`,
    ``,
  ];

  if (meta.error) {
    lines.push(`⚠️ Analysis incomplete: ${meta.error}`);
  }

  if (report.creationInfo) {
    lines.push(`Created: ${report.creationInfo.createdAt}`);
  }

  if (report.bundledDetected) {
    lines.push(`🚨 Bundle detected: ${report.bundleClusterCount} clusters, ${meta.bundledTransactionPercentage.toFixed(1)}% of ${meta.transactionsAnalyzed} txs`);
    if (report.totalBundledTokens !== null) {
      lines.push(`Bundled tokens: ${report.totalBundledTokens.toLocaleString('en-US', { maximumFractionDigits: 2 })}`);
    }
    lines.push(`Top clusters:`);
    topClusters(report.bundleClusters).forEach((c, i) => lines.push(formatCluster(c, i)));
  } else if (!meta.error) {
    lines.push(`✅ No bundles detected in ${meta.transactionsAnalyzed} txs`);
  }

  const risk = report.riskMetrics;
  if (risk) {
    lines.push(``);
    lines.push(`Intensity: ${risk.bundleIntensityScore}/100 | Coordination: ${risk.coordinationSophistication}`);
    lines.push(`Wallet reuse: ${(risk.walletConcentrationRisk * 100).toFixed(1)}% | Timing: ${risk.bundleTimingConsistency.toFixed(3)} | Early dominance: ${risk.earlyTradingDominance}%`);
  }

  const impact = report.presentImpact;
  if (impact) {
    lines.push(``);
    lines.push(`${RISK_ICON[impact.currentImpactRisk]} Present impact: ${impact.currentImpactRisk} (${impact.analysisMethod})`);
    lines.push(`  ${impact.analysisNote}`);
    if (impact.dataLimitation) lines.push(`  Note: ${impact.dataLimitation}`);
  }

  const price = report.priceAction;
  if (price) {
    lines.push(``);
    lines.push(`${SEVERITY_ICON[price.selloffSeverity]} Sell-off: ${price.selloffSeverity} (-${price.priceDeclineFromPeakPct.toFixed(1)}% from peak) | Mitigation: ${price.riskMitigationFactor}`);
    for (const factor of price.riskFactors) lines.push(`  • ${factor}`);
  }

  if (meta.errors.length > 0) {
    lines.push(``);
    lines.push(`Stage notes:`);
    for (const note of meta.errors) lines.push(`  [${note.stage}] ${note.message}`);
  }

  lines.push(``);
  lines.push(`${meta.analysisTime} | ${meta.source} | v${ENGINE_VERSION}`);
  return lines.join('\n');
}
