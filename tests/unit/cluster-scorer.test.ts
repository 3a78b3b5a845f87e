import { describe, it, expect } from 'vitest';
import { computeClusterScore, scoreWindow } from '../../src/analysis/cluster-scorer.js';
import { DEFAULT_DETECTION_OPTIONS } from '../../src/analysis/window-clusterer.js';
import { filterClusters } from '../../src/analysis/cluster-filter.js';
import { makeTx } from '../helpers/factories.js';
import type { Transaction, TransactionWindow } from '../../src/types.js';

function windowOf(transactions: Transaction[]): TransactionWindow {
  return { startIndex: 0, endIndex: transactions.length, firstUnix: transactions[0].timestamp, transactions };
}

describe('computeClusterScore', () => {
  it('should score a minimal, low-diversity, coherent cluster highly', () => {
    // 0.5·1 + 0.3·(1 − (1/3)/0.7) + 0.2·1
    const expected = 0.5 + 0.3 * (1 - (1 / 3) / 0.7) + 0.2;
    expect(computeClusterScore(3, 1 / 3, 0, DEFAULT_DETECTION_OPTIONS)).toBeCloseTo(expected, 10);
  });

  it('should floor every term at zero', () => {
    expect(computeClusterScore(6, 1, 0.5, DEFAULT_DETECTION_OPTIONS)).toBe(0);
  });
});

describe('scoreWindow', () => {
  it('should compute diversity and ignore zero volumes in the coherence term', () => {
    const txs = [
      makeTx('a', 'A', 0, { volumeUsd: 100 }),
      makeTx('b', 'A', 0, { volumeUsd: 100 }),
      makeTx('c', 'B', 1, { volumeUsd: 100 }),
      makeTx('d', 'C', 1, { volumeUsd: 0 }),
    ];
    const cluster = scoreWindow(windowOf(txs), 2, DEFAULT_DETECTION_OPTIONS);

    expect(cluster.clusterSize).toBe(4);
    expect(cluster.uniqueWallets).toBe(3);
    expect(cluster.walletDiversityRatio).toBe(0.75);
    // size term 1 − (4/3 − 1), diversity term 0, coherence term 1
    expect(cluster.score).toBeCloseTo(0.5 * (2 - 4 / 3) + 0.2, 10);
    expect(cluster.sampleTxHashes).toEqual(['a', 'b', 'c', 'd']);
    expect(cluster.firstUnix).toBe(0);
    expect(cluster.windowSeconds).toBe(2);
  });

  it('should keep at most five sample hashes', () => {
    const txs = Array.from({ length: 7 }, (_, i) => makeTx(`h${i}`, 'W', 0));
    expect(scoreWindow(windowOf(txs), 2, DEFAULT_DETECTION_OPTIONS).sampleTxHashes).toEqual(['h0', 'h1', 'h2', 'h3', 'h4']);
  });

  it('should score five distinct wallets in one second by the formula alone', () => {
    const txs = Array.from({ length: 5 }, (_, i) => makeTx(`h${i}`, `w${i}`, i * 0.2));
    const cluster = scoreWindow(windowOf(txs), 2, DEFAULT_DETECTION_OPTIONS);

    expect(cluster.walletDiversityRatio).toBe(1);
    // size term max(0, 1 − (5/3 − 1)) = 1/3, diversity term 0, coherence term 1
    expect(cluster.score).toBeCloseTo(0.5 / 3 + 0.2, 10);
    expect(cluster.score).toBeLessThan(0.5);
  });

  it('should reject five distinct wallets in one second at the filter', () => {
    const txs = Array.from({ length: 5 }, (_, i) => makeTx(`h${i}`, `w${i}`, i * 0.2));
    const cluster = scoreWindow(windowOf(txs), 2, DEFAULT_DETECTION_OPTIONS);

    // Diversity 1 > 0.7 and score 0.367 < 0.5
    expect(filterClusters([cluster], txs, DEFAULT_DETECTION_OPTIONS)).toEqual({ accepted: [], totalBundledTokens: 0 });

    // Same window at the score threshold is kept
    const passing = { ...cluster, score: 0.5 };
    expect(filterClusters([passing], txs, DEFAULT_DETECTION_OPTIONS).accepted).toEqual([passing]);
  });
});
