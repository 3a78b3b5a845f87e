import { describe, it, expect } from 'vitest';
import { BundlerAnalyzer } from '../../src/analysis/bundler-analyzer.js';
import { AnalysisEmitter } from '../../src/detection/event-emitter.js';
import { toSerializable } from '../../src/report/serialize.js';
import { formatBundlerReport } from '../../src/report/formatters.js';
import { makeCandle, makeTx, organicTxs, testConfig, TOKEN } from '../helpers/factories.js';
import type { Transaction } from '../../src/types.js';

const LAUNCH = 1_700_000_000;

// Four buys from two wallets inside the first second, then 296 organic buys 10s apart
const feed: Transaction[] = [
  makeTx('burst-0', 'BW1', LAUNCH, { tokenAmount: 5_000 }),
  makeTx('burst-1', 'BW2', LAUNCH, { tokenAmount: 5_000 }),
  makeTx('burst-2', 'BW1', LAUNCH + 1, { tokenAmount: 5_000 }),
  makeTx('burst-3', 'BW2', LAUNCH + 1, { tokenAmount: 5_000 }),
  ...organicTxs(296, LAUNCH + 10, 10),
];

function analyzer() {
  return new BundlerAnalyzer({
    creationInfo: { fetch: async () => ({ createdAt: '2023-11-14T22:13:20Z', creationTx: 'ct', blockUnixTime: LAUNCH }) },
    transactions: { fetch: async (_address, _from, limit) => feed.slice(0, limit) },
    holders: { fetch: async () => null },
    ohlcv: {
      fetch: async () => [
        makeCandle(LAUNCH, 0.001, 0.004, 0.001, 0.003, 5_000),
        makeCandle(LAUNCH + 86_400, 0.003, 0.003, 0.0005, 0.0006, 9_000),
        makeCandle(LAUNCH + 2 * 86_400, 0.0006, 0.0007, 0.0004, 0.0005, 1_000),
      ],
    },
    source: 'e2e',
    emitter: new AnalysisEmitter(),
  }, testConfig());
}

describe('early bundle end to end', () => {
  it('should isolate the injected burst among 300 trades', async () => {
    const report = await analyzer().analyze(TOKEN);

    expect(report.bundledDetected).toBe(true);
    expect(report.meta.transactionsAnalyzed).toBe(300);
    // Overlapping windows report the burst from two anchors; both sit inside it
    expect(report.bundleClusters.map((c) => [c.clusterSize, c.firstUnix])).toEqual([[4, LAUNCH], [3, LAUNCH]]);
    expect(report.bundleClusters.every((c) => c.firstUnix - LAUNCH <= 1)).toBe(true);
    expect(report.totalBundledTokens).toBe(20_000);
    expect(report.meta.bundledTransactionPercentage).toBe(1.3);
  });

  it('should flag wallet reuse across the overlapping clusters', async () => {
    const report = await analyzer().analyze(TOKEN);
    const risk = report.riskMetrics;

    // 2/300·200 + 0.5·10 + 7/300·150
    expect(risk?.bundleIntensityScore).toBe(9.8);
    expect(risk?.walletConcentrationRisk).toBe(1);
    expect(risk?.bundleTimingConsistency).toBe(1);
    expect(risk?.earlyTradingDominance).toBe(1.3);
    expect(risk?.coordinationSophistication).toBe('MEDIUM');
  });

  it('should carry the pattern floor and the post-launch dump into the report', async () => {
    const report = await analyzer().analyze(TOKEN);

    expect(report.presentImpact).toMatchObject({
      patternRiskScore: 5,
      currentImpactRisk: 'LOW',
      analysisMethod: 'PATTERN_ONLY',
      dataLimitation: 'Holder data unavailable',
    });
    expect(report.priceAction).toMatchObject({
      selloffDetected: true,
      selloffSeverity: 'EXTREME',
      riskMitigationFactor: 'HIGH',
    });
    expect(report.meta.errors).toEqual([]);

    const json = toSerializable(report);
    expect(json.bundle_cluster_count).toBe(2);
    expect(formatBundlerReport(report)).toContain('🚨 Bundle detected: 2 clusters, 1.3% of 300 txs');
  });
});
