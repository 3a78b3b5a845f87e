import { describe, it, expect } from 'vitest';
import {
  bundledTransactionIndices,
  filterClusters,
  isAcceptedCluster,
  totalBundledTokens,
} from '../../src/analysis/cluster-filter.js';
import { DEFAULT_DETECTION_OPTIONS } from '../../src/analysis/window-clusterer.js';
import { makeCluster, makeTx } from '../helpers/factories.js';

const txs = [0, 1, 2, 3, 10].map((t, i) => makeTx(`h${i}`, `w${i}`, t, { tokenAmount: (i + 1) * 10 }));

describe('isAcceptedCluster', () => {
  it('should accept on diversity at the threshold', () => {
    expect(isAcceptedCluster(makeCluster({ walletDiversityRatio: 0.7, score: 0 }), DEFAULT_DETECTION_OPTIONS)).toBe(true);
  });

  it('should accept on score alone', () => {
    expect(isAcceptedCluster(makeCluster({ walletDiversityRatio: 0.8, score: 0.5 }), DEFAULT_DETECTION_OPTIONS)).toBe(true);
  });

  it('should reject when neither signal fires', () => {
    expect(isAcceptedCluster(makeCluster({ walletDiversityRatio: 0.8, score: 0.49 }), DEFAULT_DETECTION_OPTIONS)).toBe(false);
  });
});

describe('totalBundledTokens', () => {
  it('should count a transaction shared by overlapping windows once', () => {
    const clusters = [makeCluster({ firstUnix: 0 }), makeCluster({ firstUnix: 1 })];
    // first window: 10 + 20 + 30, second adds only index 3 (40)
    expect(totalBundledTokens(clusters, txs)).toBe(100);
  });

  it('should be 0 without clusters', () => {
    expect(totalBundledTokens([], txs)).toBe(0);
  });
});

describe('bundledTransactionIndices', () => {
  it('should collect indices inside any window', () => {
    const clusters = [makeCluster({ firstUnix: 0 }), makeCluster({ firstUnix: 1 })];
    expect([...bundledTransactionIndices(clusters, txs)].sort()).toEqual([0, 1, 2, 3]);
  });

  it('should only scan the leading transactions up to the limit', () => {
    expect([...bundledTransactionIndices([makeCluster({ firstUnix: 0 })], txs, 2)]).toEqual([0, 1]);
  });
});

describe('filterClusters', () => {
  it('should keep accepted clusters and total their tokens', () => {
    const keep = makeCluster({ firstUnix: 0, walletDiversityRatio: 0.5 });
    const drop = makeCluster({ firstUnix: 10, walletDiversityRatio: 1, score: 0.1 });
    const { accepted, totalBundledTokens: total } = filterClusters([keep, drop], txs, DEFAULT_DETECTION_OPTIONS);
    expect(accepted).toEqual([keep]);
    expect(total).toBe(60);
  });
});
