// ─── Transactions ────────────────────────────────────────────────────

export type TxType = 'buy' | 'sell';

/** Normalized early trade. Built once at the ingestion boundary, never mutated. */
export interface Transaction {
  txHash: string;
  wallet: string;
  timestamp: number;      // unix seconds
  txType: TxType;
  tokenAmount: number;    // tokens received
  volumeUsd: number;
}

// ─── Clustering ──────────────────────────────────────────────────────

export interface DetectionOptions {
  windowSeconds: number;
  minTradesInCluster: number;
  maxWalletDiversity: number;
  scoreAcceptThreshold: number;
}

/** Contiguous slice of the sorted transaction list anchored at `startIndex`. */
export interface TransactionWindow {
  startIndex: number;
  endIndex: number;       // exclusive
  firstUnix: number;
  transactions: readonly Transaction[];
}

export interface BundleCluster {
  clusterSize: number;
  windowSeconds: number;
  uniqueWallets: number;
  walletDiversityRatio: number;  // uniqueWallets / clusterSize, in (0, 1]
  score: number;
  sampleTxHashes: string[];      // up to 5
  firstUnix: number;
}

export interface BundleDetectionResult {
  bundledDetected: boolean;
  clusters: BundleCluster[];
  totalBundledTokens: number;
  candidateCount: number;
  transactions: Transaction[];   // buys only, ascending
  launchTime: number;
  launchReference: LaunchReference;
}

// ─── Risk metrics ────────────────────────────────────────────────────

export type SophisticationLevel = 'LOW' | 'MEDIUM' | 'HIGH';

export interface RiskMetrics {
  bundleIntensityScore: number;       // 0-100
  walletConcentrationRisk: number;    // 0-1
  bundleTimingConsistency: number;    // 0-1
  earlyTradingDominance: number;      // % of first 300 txs
  coordinationSophistication: SophisticationLevel;
}

// ─── Upstream data ───────────────────────────────────────────────────

export interface CreationInfo {
  createdAt: string;      // ISO
  creationTx: string;
  blockUnixTime: number;
}

export interface HolderStats {
  totalHolders: number;
  top10ConcentrationPct: number | null;
  holderChange24hPct: number | null;
}

export interface Candle {
  unixTime: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volumeUsd: number;
}

export type OhlcvGranularity = '1m' | '5m' | '15m' | '30m' | '1H' | '4H' | '1D';

export type Chain = 'solana' | 'ethereum' | 'base' | 'bsc' | 'shibarium';

export interface TransactionFeed {
  fetch(tokenAddress: string, fromTime: number, limit: number): Promise<Transaction[]>;
}

export interface CreationInfoProvider {
  fetch(tokenAddress: string): Promise<CreationInfo | null>;
}

export interface HolderStatsProvider {
  fetch(chain: Chain, tokenAddress: string): Promise<HolderStats | null>;
}

export interface OHLCVProvider {
  fetch(tokenAddress: string, timeFrom: number, timeTo: number, granularity: OhlcvGranularity): Promise<Candle[]>;
}

// ─── Present impact ──────────────────────────────────────────────────

export type ImpactRisk = 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

export type ImpactMethod = 'PATTERN_ONLY' | 'PATTERN_AND_HOLDER_DATA' | 'PATTERN_ONLY_FALLBACK';

export interface PatternRisk {
  score: number;
  factors: string[];
}

export interface PresentImpactResult {
  bundledWalletsCount: number;
  totalInitialTokensBought: number;
  patternRiskScore: number;
  patternRiskFactors: string[];
  holderRiskScore?: number;
  holderRiskFactors?: string[];
  combinedRiskScore?: number;
  totalCurrentHolders?: number;
  bundledWalletPenetrationPct?: number;
  top10ConcentrationPct?: number;
  holderChange24hPct?: number;
  currentImpactRisk: ImpactRisk;
  analysisMethod: ImpactMethod;
  dataLimitation?: string;
  errorNote?: string;
  analysisNote: string;
}

// ─── Price action ────────────────────────────────────────────────────

export type SelloffSeverity = 'NONE' | 'MILD' | 'MODERATE' | 'SEVERE' | 'EXTREME' | 'UNKNOWN';

export type MitigationFactor = 'NONE' | 'LOW' | 'MEDIUM' | 'HIGH';

export interface LargeDrop {
  index: number;
  dropPct: number;
  unixTime: number;
}

export interface PriceActionResult {
  selloffDetected: boolean;
  selloffSeverity: SelloffSeverity;
  priceDeclineFromPeakPct: number;
  peakPrice: number;
  currentPrice: number;
  largeDrops: LargeDrop[];
  highVolumeSelloffs: number;
  avgDailyVolatilityPct: number;
  maxDailyVolatilityPct: number;
  riskMitigationFactor: MitigationFactor;
  riskFactors: string[];
  dataPoints: number;
  analysisNote: string;
}

// ─── Report ──────────────────────────────────────────────────────────

export type AnalysisStage =
  | 'address'
  | 'creation'
  | 'transactions'
  | 'detection'
  | 'present_impact'
  | 'price_action'
  | 'unexpected';

export interface StageNote {
  stage: AnalysisStage;
  message: string;
}

export type LaunchReference = 'creation' | 'earliest_transaction';

export interface ReportMeta {
  tokenAddress: string;
  chain: Chain;
  analysisTime: string;
  source: string;
  transactionsAnalyzed: number;
  candidateClusters: number;
  skippedRecords: number;
  firstNTransactions: number;
  ohlcvWindowDays: number;
  bundledTransactionPercentage: number;
  launchReference?: LaunchReference;
  error?: string;
  errors: StageNote[];
}

export interface BundlerAnalysisReport {
  bundledDetected: boolean;
  bundleClusterCount: number;
  bundleClusters: BundleCluster[];
  creationInfo: CreationInfo | null;
  riskMetrics: RiskMetrics | null;
  totalBundledTokens: number | null;
  presentImpact: PresentImpactResult | null;
  priceAction: PriceActionResult | null;
  meta: ReportMeta;
}

// ─── Configuration ───────────────────────────────────────────────────

export type TransactionSource = 'moralis' | 'birdeye';

export interface EngineConfig {
  detection: DetectionOptions & {
    maxTransactions: number;
    creationDriftSeconds: number;
  };
  priceAction: {
    windowDays: number;
    granularity: OhlcvGranularity;
  };
  upstream: {
    transactionSource: TransactionSource;
    timeoutMs: number;
    analysisTimeoutMs: number;
    requestsPerSecond: number;
    maxConcurrentPages: number;
    pageSize: number;
    maxRetries: number;
  };
  apiKeys: {
    birdeye: string;
    moralis: string;
  };
  endpoints: {
    birdeye: string;
    moralisSolana: string;
    moralisEvm: string;
  };
}

// ─── Events ──────────────────────────────────────────────────────────

export interface AnalysisEvents {
  analysisStarted: (tokenAddress: string, chain: Chain) => void;
  stageFailed: (tokenAddress: string, note: StageNote) => void;
  bundlesDetected: (tokenAddress: string, clusters: BundleCluster[]) => void;
  analysisCompleted: (report: BundlerAnalysisReport) => void;
}
