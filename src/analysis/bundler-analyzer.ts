import { logger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';
import { detectChain, errorMessage, isValidSolanaAddress, isoTimestamp, nowUnix, round, shortenAddress } from '../utils/helpers.js';
import { sanitizeTransactions } from '../data/ingest.js';
import { AnalysisEmitter } from '../detection/event-emitter.js';
import { resolveDetectionOptions } from './window-clusterer.js';
import { bundledTransactionIndices } from './cluster-filter.js';
import { detectBundles } from './bundle-detector.js';
import { calculateRiskMetrics } from './risk-metrics.js';
import { analyzePresentImpact } from './present-impact.js';
import { analyzePriceAction } from './price-action.js';
import { SECONDS_PER_DAY } from '../constants.js';
import type {
  AnalysisEvents,
  AnalysisStage,
  BundlerAnalysisReport,
  Chain,
  CreationInfo,
  CreationInfoProvider,
  EngineConfig,
  HolderStatsProvider,
  OHLCVProvider,
  PresentImpactResult,
  PriceActionResult,
  ReportMeta,
  StageNote,
  TransactionFeed,
} from '../types.js';

export interface BundlerCollaborators {
  creationInfo: CreationInfoProvider;
  transactions: TransactionFeed;
  holders?: HolderStatsProvider | null;
  ohlcv?: OHLCVProvider | null;
  /** Label recorded in `meta.source`. */
  source?: string;
  /** Defaults to a fresh emitter owned by the analyzer. */
  emitter?: AnalysisEmitter;
}

/** Mutable scratch state for one run. Never shared between runs. */
interface RunContext {
  tokenAddress: string;
  chain: Chain;
  notes: StageNote[];
}

/**
 * Runs one bundle analysis end to end:
 * creation anchor → early buys → clustering → risk engines → report.
 *
 * Every stage failure is folded into the report as a note. The only error
 * that escapes is ConfigError, raised at construction for bad detection options.
 */
export class BundlerAnalyzer {
  /** Lifecycle events for this analyzer only. */
  readonly events: AnalysisEmitter;
  private readonly source: string;

  constructor(
    private readonly collaborators: BundlerCollaborators,
    private readonly config: EngineConfig,
  ) {
    resolveDetectionOptions(config.detection);
    this.events = collaborators.emitter ?? new AnalysisEmitter();
    this.source = collaborators.source ?? 'custom';
  }

  async analyze(tokenAddress: string, chain: Chain = detectChain(tokenAddress)): Promise<BundlerAnalysisReport> {
    const ctx: RunContext = { tokenAddress, chain, notes: [] };
    this.emit('analysisStarted', tokenAddress, chain);
    logger.info(`[bundler] Starting bundle analysis for ${shortenAddress(tokenAddress)} on ${chain}`);

    let report: BundlerAnalysisReport;
    try {
      report = await this.run(ctx);
    } catch (err) {
      // Stages catch their own failures; this covers bugs in assembly itself
      this.note(ctx, 'unexpected', errorMessage(err));
      report = this.degraded(ctx, null, `Bundle analysis failed: ${errorMessage(err)}`);
    }

    this.emit('analysisCompleted', report);
    return report;
  }

  private async run(ctx: RunContext): Promise<BundlerAnalysisReport> {
    const { tokenAddress } = ctx;
    const { detection, priceAction } = this.config;

    if (ctx.chain === 'solana' && !isValidSolanaAddress(tokenAddress)) {
      this.note(ctx, 'address', `Invalid Solana address: ${tokenAddress}`);
      return this.degraded(ctx, null, 'Invalid token address');
    }

    // 1. Creation anchor
    let creationInfo: CreationInfo | null;
    try {
      creationInfo = await this.collaborators.creationInfo.fetch(tokenAddress);
    } catch (err) {
      this.note(ctx, 'creation', errorMessage(err));
      creationInfo = null;
    }
    if (!creationInfo) {
      logger.warn(`[bundler] Cannot analyze ${shortenAddress(tokenAddress)}: creation info unavailable`);
      return this.degraded(ctx, null, 'Creation info unavailable');
    }

    // 2. Earliest buys from the anchor
    let fetched: unknown[];
    try {
      fetched = await this.collaborators.transactions.fetch(
        tokenAddress,
        creationInfo.blockUnixTime - 1,
        detection.maxTransactions,
      );
    } catch (err) {
      this.note(ctx, 'transactions', errorMessage(err));
      fetched = [];
    }
    const { transactions: sanitized, skipped } = sanitizeTransactions(fetched);
    const snapshot = sanitized.slice(0, detection.maxTransactions);
    if (snapshot.length === 0) {
      logger.warn(`[bundler] No transaction history for ${shortenAddress(tokenAddress)}`);
      return this.degraded(ctx, creationInfo, 'No transaction history available', { skippedRecords: skipped });
    }

    // 3. Cluster, score, filter
    const detected = detectBundles(snapshot, {
      ...detection,
      creationTs: creationInfo.blockUnixTime,
      creationDriftSeconds: detection.creationDriftSeconds,
    });
    const { clusters, transactions } = detected;
    const analyzed = transactions.length;

    // 4. Risk engines
    let presentImpact: PresentImpactResult | null = null;
    let priceActionResult: PriceActionResult | null = null;
    const riskMetrics = calculateRiskMetrics(clusters, transactions, analyzed);

    if (detected.bundledDetected) {
      this.emit('bundlesDetected', tokenAddress, clusters);
      const totalBundledTxs = clusters.reduce((s, c) => s + c.clusterSize, 0);
      logger.info(`[bundler] Bundle detected: ${clusters.length} clusters, ${totalBundledTxs} transactions`);

      const firstTxTime = transactions[0].timestamp;
      [presentImpact, priceActionResult] = await Promise.all([
        this.guarded(ctx, 'present_impact', () => analyzePresentImpact({
          clusters,
          transactions,
          tokenAddress,
          chain: ctx.chain,
          holders: this.collaborators.holders,
        })),
        this.guarded(ctx, 'price_action', () => this.priceAction(
          tokenAddress,
          firstTxTime,
          firstTxTime + priceAction.windowDays * SECONDS_PER_DAY,
        )),
      ]);
    } else {
      logger.info(`[bundler] No bundles detected for ${shortenAddress(tokenAddress)}`);
    }

    // 5. One dedup pass over every analyzed index
    const bundledCount = detected.bundledDetected
      ? bundledTransactionIndices(clusters, transactions).size
      : 0;

    return {
      bundledDetected: detected.bundledDetected,
      bundleClusterCount: clusters.length,
      bundleClusters: clusters,
      creationInfo,
      riskMetrics,
      totalBundledTokens: detected.totalBundledTokens,
      presentImpact,
      priceAction: priceActionResult,
      meta: this.meta(ctx, {
        transactionsAnalyzed: analyzed,
        candidateClusters: detected.candidateCount,
        skippedRecords: skipped,
        bundledTransactionPercentage: analyzed > 0 ? round((bundledCount / analyzed) * 100, 1) : 0,
        launchReference: detected.launchReference,
      }),
    };
  }

  private async priceAction(tokenAddress: string, timeFrom: number, timeTo: number): Promise<PriceActionResult | null> {
    const { ohlcv } = this.collaborators;
    if (!ohlcv) {
      throw new Error('OHLCV provider not configured');
    }
    const candles = await ohlcv.fetch(tokenAddress, timeFrom, timeTo, this.config.priceAction.granularity);
    return analyzePriceAction(candles);
  }

  /** Runs a post-detection stage under the analysis timeout; failure → null plus a note. */
  private async guarded<T>(
    ctx: RunContext,
    stage: AnalysisStage,
    work: () => Promise<T | null>,
  ): Promise<T | null> {
    const timeoutMs = this.config.upstream.analysisTimeoutMs;
    try {
      return await withTimeout(work(), timeoutMs, () => {
        this.note(ctx, stage, `Timed out after ${timeoutMs}ms`);
        return null;
      });
    } catch (err) {
      this.note(ctx, stage, errorMessage(err));
      return null;
    }
  }

  private note(ctx: RunContext, stage: AnalysisStage, message: string): void {
    const note: StageNote = { stage, message };
    ctx.notes.push(note);
    logger.warn(`[bundler] ${stage} failed for ${shortenAddress(ctx.tokenAddress)}: ${message.slice(0, 160)}`);
    this.emit('stageFailed', ctx.tokenAddress, note);
  }

  // Listeners run synchronously; a throwing one must not cost the caller its report
  private emit<K extends keyof AnalysisEvents>(event: K, ...args: Parameters<AnalysisEvents[K]>): void {
    try {
      this.events.emit(event, ...args);
    } catch (err) {
      logger.warn(`[bundler] listener failed on ${event}: ${errorMessage(err)}`);
    }
  }

  private meta(ctx: RunContext, fields: Partial<ReportMeta> = {}): ReportMeta {
    return {
      tokenAddress: ctx.tokenAddress,
      chain: ctx.chain,
      analysisTime: isoTimestamp(nowUnix()),
      source: this.source,
      transactionsAnalyzed: 0,
      candidateClusters: 0,
      skippedRecords: 0,
      firstNTransactions: this.config.detection.maxTransactions,
      ohlcvWindowDays: this.config.priceAction.windowDays,
      bundledTransactionPercentage: 0,
      ...fields,
      errors: [...ctx.notes],
    };
  }

  private degraded(
    ctx: RunContext,
    creationInfo: CreationInfo | null,
    error: string,
    fields: Partial<ReportMeta> = {},
  ): BundlerAnalysisReport {
    return {
      bundledDetected: false,
      bundleClusterCount: 0,
      bundleClusters: [],
      creationInfo,
      riskMetrics: null,
      totalBundledTokens: null,
      presentImpact: null,
      priceAction: null,
      meta: this.meta(ctx, { ...fields, error }),
    };
  }
}
