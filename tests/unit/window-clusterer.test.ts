import { describe, it, expect } from 'vitest';
import { clusterWindows, resolveDetectionOptions } from '../../src/analysis/window-clusterer.js';
import { ConfigError } from '../../src/errors.js';
import { makeTx } from '../helpers/factories.js';

function atTimes(times: number[]) {
  return times.map((t, i) => makeTx(`h${i}`, `w${i}`, t));
}

describe('clusterWindows', () => {
  it('should return nothing for empty input', () => {
    expect(clusterWindows([])).toEqual([]);
  });

  it('should drop windows smaller than the minimum', () => {
    const windows = clusterWindows(atTimes([0, 1, 2, 5, 6]));
    expect(windows).toHaveLength(1);
    expect(windows[0].startIndex).toBe(0);
    expect(windows[0].endIndex).toBe(3);
    expect(windows[0].firstUnix).toBe(0);
    expect(windows[0].transactions.map((tx) => tx.txHash)).toEqual(['h0', 'h1', 'h2']);
  });

  it('should include transactions exactly at the window edge', () => {
    expect(clusterWindows(atTimes([0, 1, 2]))).toHaveLength(1);
    expect(clusterWindows(atTimes([0, 1, 2.5]))).toHaveLength(0);
  });

  it('should advance the anchor one transaction at a time so windows overlap', () => {
    const windows = clusterWindows(atTimes([0, 0, 1, 1]));
    expect(windows.map((w) => [w.startIndex, w.endIndex])).toEqual([[0, 4], [1, 4]]);
  });

  it('should treat a zero-second window as same-timestamp grouping', () => {
    const windows = clusterWindows(atTimes([5, 5, 5, 6]), { windowSeconds: 0 });
    expect(windows).toHaveLength(1);
    expect(windows[0].transactions).toHaveLength(3);
  });

  it('should never emit a window below min_trades_in_cluster', () => {
    const times = [0, 0.5, 0.7, 3, 3.1, 3.2, 3.3, 9, 20, 20.5];
    for (const min of [2, 3, 4]) {
      for (const w of clusterWindows(atTimes(times), { minTradesInCluster: min })) {
        expect(w.transactions.length).toBeGreaterThanOrEqual(min);
      }
    }
  });
});

describe('resolveDetectionOptions', () => {
  it('should fill defaults', () => {
    expect(resolveDetectionOptions()).toEqual({
      windowSeconds: 2,
      minTradesInCluster: 3,
      maxWalletDiversity: 0.7,
      scoreAcceptThreshold: 0.5,
    });
  });

  it('should reject a negative window', () => {
    expect(() => resolveDetectionOptions({ windowSeconds: -1 })).toThrow(ConfigError);
  });

  it('should reject min trades below 1 and diversity outside (0, 1]', () => {
    expect(() => resolveDetectionOptions({ minTradesInCluster: 0 })).toThrow(ConfigError);
    expect(() => resolveDetectionOptions({ maxWalletDiversity: 0 })).toThrow(ConfigError);
    expect(() => resolveDetectionOptions({ maxWalletDiversity: 1.2 })).toThrow(ConfigError);
  });
});
