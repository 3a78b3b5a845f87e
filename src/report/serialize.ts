import { round } from '../utils/helpers.js';
import type {
  BundleCluster,
  BundlerAnalysisReport,
  CreationInfo,
  PresentImpactResult,
  PriceActionResult,
  ReportMeta,
  RiskMetrics,
} from '../types.js';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

/** Drops undefined fields so optional result fields stay absent in JSON. */
function compact(fields: Record<string, JsonValue | undefined>): JsonObject {
  const out: JsonObject = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}

function serializeCluster(c: BundleCluster): JsonObject {
  return {
    cluster_size: c.clusterSize,
    window_seconds: c.windowSeconds,
    unique_wallets: c.uniqueWallets,
    wallet_diversity_ratio: round(c.walletDiversityRatio, 3),
    score: round(c.score, 3),
    sample_tx_hashes: [...c.sampleTxHashes],
    first_unix: c.firstUnix,
  };
}

function serializeCreation(info: CreationInfo): JsonObject {
  return {
    created_at: info.createdAt,
    creation_tx: info.creationTx,
    block_unix_time: info.blockUnixTime,
  };
}

function serializeRisk(m: RiskMetrics): JsonObject {
  return {
    bundle_intensity_score: m.bundleIntensityScore,
    wallet_concentration_risk: m.walletConcentrationRisk,
    bundle_timing_consistency: m.bundleTimingConsistency,
    early_trading_dominance: m.earlyTradingDominance,
    coordination_sophistication: m.coordinationSophistication,
  };
}

function serializeImpact(p: PresentImpactResult): JsonObject {
  return compact({
    bundled_wallets_count: p.bundledWalletsCount,
    total_initial_tokens_bought: p.totalInitialTokensBought,
    pattern_risk_score: p.patternRiskScore,
    pattern_risk_factors: [...p.patternRiskFactors],
    holder_risk_score: p.holderRiskScore,
    holder_risk_factors: p.holderRiskFactors ? [...p.holderRiskFactors] : undefined,
    combined_risk_score: p.combinedRiskScore,
    total_current_holders: p.totalCurrentHolders,
    bundled_wallet_penetration_pct: p.bundledWalletPenetrationPct,
    top10_concentration_pct: p.top10ConcentrationPct,
    holder_change_24h_pct: p.holderChange24hPct,
    current_impact_risk: p.currentImpactRisk,
    analysis_method: p.analysisMethod,
    data_limitation: p.dataLimitation,
    error_note: p.errorNote,
    analysis_note: p.analysisNote,
  });
}

function serializePriceAction(p: PriceActionResult): JsonObject {
  return {
    selloff_detected: p.selloffDetected,
    selloff_severity: p.selloffSeverity,
    price_decline_from_peak_pct: p.priceDeclineFromPeakPct,
    peak_price: p.peakPrice,
    current_price: p.currentPrice,
    large_drops: p.largeDrops.map((d) => ({ index: d.index, drop_pct: d.dropPct, unix_time: d.unixTime })),
    large_drops_count: p.largeDrops.length,
    high_volume_selloffs: p.highVolumeSelloffs,
    avg_daily_volatility_pct: p.avgDailyVolatilityPct,
    max_daily_volatility_pct: p.maxDailyVolatilityPct,
    risk_mitigation_factor: p.riskMitigationFactor,
    risk_factors: [...p.riskFactors],
    data_points: p.dataPoints,
    analysis_note: p.analysisNote,
  };
}

function serializeMeta(m: ReportMeta): JsonObject {
  return compact({
    token_address: m.tokenAddress,
    chain: m.chain,
    analysis_time: m.analysisTime,
    source: m.source,
    transactions_analyzed: m.transactionsAnalyzed,
    candidate_clusters: m.candidateClusters,
    skipped_records: m.skippedRecords,
    first_n_transactions: m.firstNTransactions,
    ohlcv_window_days: m.ohlcvWindowDays,
    bundled_transaction_percentage: m.bundledTransactionPercentage,
    launch_reference: m.launchReference,
    error: m.error,
    errors: m.errors.map((e) => ({ stage: e.stage, message: e.message })),
  });
}

/** Plain snake_case JSON form of a report. No class instances or undefined values survive. */
export function toSerializable(report: BundlerAnalysisReport): JsonObject {
  return {
    bundled_detected: report.bundledDetected,
    bundle_cluster_count: report.bundleClusterCount,
    bundle_clusters: report.bundleClusters.map(serializeCluster),
    creation_info: report.creationInfo ? serializeCreation(report.creationInfo) : null,
    risk_metrics: report.riskMetrics ? serializeRisk(report.riskMetrics) : null,
    total_bundled_tokens: report.totalBundledTokens === null ? null : round(report.totalBundledTokens, 6),
    present_impact_analysis: report.presentImpact ? serializeImpact(report.presentImpact) : null,
    price_action_analysis: report.priceAction ? serializePriceAction(report.priceAction) : null,
    meta: serializeMeta(report.meta),
  };
}
